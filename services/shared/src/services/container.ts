import { OrderService } from './order-service';
import { PaymentService } from './payment-service';
import { ProductService } from './product-service';
import { RefundService } from './refund-service';
import { ReservationExpiryService } from './reservation-expiry-service';
import { ReservationService, ReservationServiceOptions } from './reservation-service';
import { StockAlertService } from './stock-alert-service';
import { StockLedgerService } from './stock-ledger-service';

export interface CommerceServices {
     ledger: StockLedgerService;
     reservations: ReservationService;
     products: ProductService;
     refunds: RefundService;
     orders: OrderService;
     payments: PaymentService;
     alerts: StockAlertService;
     expiry: ReservationExpiryService;
}

export function createCommerceServices(
     options: ReservationServiceOptions = { reservationTtlMinutes: 0 }
): CommerceServices {
     const ledger = new StockLedgerService();
     const reservations = new ReservationService(ledger, options);
     const refunds = new RefundService(ledger);
     const orders = new OrderService(reservations, refunds, ledger);

     return {
          ledger,
          reservations,
          products: new ProductService(),
          refunds,
          orders,
          payments: new PaymentService(orders),
          alerts: new StockAlertService(),
          expiry: new ReservationExpiryService(reservations, orders),
     };
}

/** Lease length from RESERVATION_TTL_MINUTES; 0 turns expiry off */
export function reservationOptionsFromEnv(): ReservationServiceOptions {
     const ttl = parseInt(process.env.RESERVATION_TTL_MINUTES || '30', 10);
     return { reservationTtlMinutes: Number.isNaN(ttl) ? 30 : Math.max(ttl, 0) };
}
