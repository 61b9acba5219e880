import type { UnitOfWorkRunner } from '@backoffice/shared/src/db/unit-of-work';
import { CommerceServices, createCommerceServices } from '@backoffice/shared/src/services/container';
import type { CreatedOrder } from '@backoffice/shared/src/services/order-service';
import type { CaptureResult } from '@backoffice/shared/src/services/payment-service';
import type { ReservationServiceOptions } from '@backoffice/shared/src/services/reservation-service';
import type {
     DeliveryAddress,
     OrderLine,
     PaymentMethod,
     RequestContext,
} from '@backoffice/shared/src/types/commerce.types';
import { InMemoryDatabase } from './inMemoryUnitOfWork';

export const TEST_CONTEXT: RequestContext = { actor: 'test-user', origin: 'jest' };

export const TEST_ADDRESS: DeliveryAddress = {
     recipient: 'Test Customer',
     phone: '+10000000000',
     line1: '1 Test Street',
     city: 'Testville',
};

export interface TestHarness {
     db: InMemoryDatabase;
     run: UnitOfWorkRunner;
     services: CommerceServices;
}

export function createHarness(options?: ReservationServiceOptions): TestHarness {
     const db = new InMemoryDatabase();
     return { db, run: db.runUnitOfWork, services: createCommerceServices(options) };
}

export interface StockedProductOptions {
     sku: string;
     quantity: number;
     minQuantity?: number;
     maxQuantity?: number;
     reorderQuantity?: number;
     autoReorder?: boolean;
}

/** Create a product and receive its opening stock; returns the product id */
export async function createStockedProduct(h: TestHarness, options: StockedProductOptions): Promise<number> {
     return h.run(async (uow) => {
          const { product } = await h.services.products.createProduct(uow, TEST_CONTEXT, {
               sku: options.sku,
               name: `Product ${options.sku}`,
               thresholds: {
                    minQuantity: options.minQuantity,
                    maxQuantity: options.maxQuantity,
                    reorderQuantity: options.reorderQuantity,
               },
               autoReorder: options.autoReorder,
          });
          if (options.quantity > 0) {
               await h.services.ledger.add(uow, TEST_CONTEXT, product.id, options.quantity);
          }
          return product.id;
     });
}

export async function placeOrder(
     h: TestHarness,
     lines: OrderLine[],
     paymentMethod: PaymentMethod = 'mobile_money',
     deliveryFee: number = 0
): Promise<CreatedOrder> {
     return h.run((uow) =>
          h.services.orders.createOrder(uow, TEST_CONTEXT, {
               customerId: 'customer-1',
               paymentMethod,
               deliveryAddress: TEST_ADDRESS,
               deliveryFee,
               lines,
          })
     );
}

export async function captureOk(h: TestHarness, paymentId: number): Promise<CaptureResult> {
     return h.run((uow) =>
          h.services.payments.capturePayment(uow, TEST_CONTEXT, paymentId, {
               result: 'success',
               reference: `gw-${paymentId}`,
          })
     );
}
