import {
     InsufficientStockError,
     InvalidQuantityError,
     ProductNotFoundError,
     ReservationNotFoundError,
} from '@backoffice/shared/src/utils/errors';
import { createHarness, createStockedProduct, TestHarness, TEST_CONTEXT } from '../helpers/fixtures';

describe('ReservationService (Unit)', () => {
     let h: TestHarness;
     let productId: number;

     beforeEach(async () => {
          h = createHarness();
          productId = await createStockedProduct(h, { sku: 'RES-1', quantity: 10 });
     });

     describe('reserve', () => {
          it('should hold units without touching physical stock', async () => {
               const reservation = await h.run((uow) =>
                    h.services.reservations.reserve(uow, TEST_CONTEXT, productId, 3, 'cart-1')
               );

               expect(reservation).toEqual(
                    expect.objectContaining({ productId, orderRef: 'cart-1', quantity: 3, status: 'ACTIVE', expiresAt: null })
               );
               expect(h.db.stock(productId)).toEqual(
                    expect.objectContaining({ currentQuantity: 10, reservedQuantity: 3, availableQuantity: 7 })
               );
               expect(h.db.movementsFor(productId)).toHaveLength(1);
               expect(h.db.auditActions()).toEqual(
                    expect.arrayContaining(['stock.reserve', 'reservation.create'])
               );
          });

          it('should refuse more than the available quantity', async () => {
               await h.run((uow) => h.services.reservations.reserve(uow, TEST_CONTEXT, productId, 8, 'cart-1'));

               const attempt = h.run((uow) =>
                    h.services.reservations.reserve(uow, TEST_CONTEXT, productId, 3, 'cart-2')
               );

               await expect(attempt).rejects.toThrow(InsufficientStockError);
               await expect(attempt).rejects.toMatchObject({ productId, requested: 3, available: 2 });
               expect(h.db.reservationsFor('cart-2')).toHaveLength(0);
               expect(h.db.stock(productId).reservedQuantity).toBe(8);
          });

          it('should allow reserving exactly what is available', async () => {
               await h.run((uow) => h.services.reservations.reserve(uow, TEST_CONTEXT, productId, 10, 'cart-1'));
               expect(h.db.stock(productId).availableQuantity).toBe(0);
               expect(h.db.stock(productId).status).toBe('available');
          });

          it('should reject a zero quantity', async () => {
               await expect(
                    h.run((uow) => h.services.reservations.reserve(uow, TEST_CONTEXT, productId, 0, 'cart-1'))
               ).rejects.toThrow(InvalidQuantityError);
          });

          it('should reject an unknown product', async () => {
               await expect(
                    h.run((uow) => h.services.reservations.reserve(uow, TEST_CONTEXT, 404, 1, 'cart-1'))
               ).rejects.toThrow(ProductNotFoundError);
          });
     });

     describe('reserveMany', () => {
          it('should reserve nothing when one line is short', async () => {
               const scarce = await createStockedProduct(h, { sku: 'RES-2', quantity: 2 });

               await expect(
                    h.run((uow) =>
                         h.services.reservations.reserveMany(uow, TEST_CONTEXT, 'cart-1', [
                              { productId, quantity: 5 },
                              { productId: scarce, quantity: 3 },
                         ])
                    )
               ).rejects.toThrow(InsufficientStockError);

               expect(h.db.stock(productId).reservedQuantity).toBe(0);
               expect(h.db.stock(scarce).reservedQuantity).toBe(0);
               expect(h.db.reservations.size).toBe(0);
          });

          it('should add up repeated lines for the same product', async () => {
               await expect(
                    h.run((uow) =>
                         h.services.reservations.reserveMany(uow, TEST_CONTEXT, 'cart-1', [
                              { productId, quantity: 6 },
                              { productId, quantity: 6 },
                         ])
                    )
               ).rejects.toThrow(InsufficientStockError);
          });

          it('should return reservations in line order', async () => {
               const other = await createStockedProduct(h, { sku: 'RES-2', quantity: 5 });

               const reservations = await h.run((uow) =>
                    h.services.reservations.reserveMany(uow, TEST_CONTEXT, 'cart-1', [
                         { productId: other, quantity: 1 },
                         { productId, quantity: 2 },
                    ])
               );

               expect(reservations.map((r) => [r.productId, r.quantity])).toEqual([
                    [other, 1],
                    [productId, 2],
               ]);
          });

          it('should resolve a deferred reference only once every line fits', async () => {
               const orderRef = jest.fn<Promise<string>, []>().mockResolvedValue('CMD-2026-03-0007');

               await expect(
                    h.run((uow) =>
                         h.services.reservations.reserveMany(uow, TEST_CONTEXT, orderRef, [{ productId, quantity: 11 }])
                    )
               ).rejects.toThrow(InsufficientStockError);
               expect(orderRef).not.toHaveBeenCalled();

               const reservations = await h.run((uow) =>
                    h.services.reservations.reserveMany(uow, TEST_CONTEXT, orderRef, [
                         { productId, quantity: 1 },
                         { productId, quantity: 2 },
                    ])
               );

               expect(orderRef).toHaveBeenCalledTimes(1);
               expect(reservations.map((r) => r.orderRef)).toEqual(['CMD-2026-03-0007', 'CMD-2026-03-0007']);
          });

          it('should reject an empty request', async () => {
               await expect(
                    h.run((uow) => h.services.reservations.reserveMany(uow, TEST_CONTEXT, 'cart-1', []))
               ).rejects.toThrow(InvalidQuantityError);
          });
     });

     describe('release', () => {
          it('should give the units back', async () => {
               const reservation = await h.run((uow) =>
                    h.services.reservations.reserve(uow, TEST_CONTEXT, productId, 4, 'cart-1')
               );

               const result = await h.run((uow) => h.services.reservations.release(uow, TEST_CONTEXT, reservation.id));

               expect(result.released).toBe(true);
               expect(result.reservation?.status).toBe('RELEASED');
               expect(h.db.stock(productId).reservedQuantity).toBe(0);
               expect(h.db.stock(productId).availableQuantity).toBe(10);
          });

          it('should be a no-op the second time', async () => {
               const reservation = await h.run((uow) =>
                    h.services.reservations.reserve(uow, TEST_CONTEXT, productId, 4, 'cart-1')
               );
               await h.run((uow) => h.services.reservations.release(uow, TEST_CONTEXT, reservation.id));
               const auditCount = h.db.audit.length;

               const again = await h.run((uow) => h.services.reservations.release(uow, TEST_CONTEXT, reservation.id));

               expect(again.released).toBe(false);
               expect(again.reservation?.status).toBe('RELEASED');
               expect(h.db.stock(productId).reservedQuantity).toBe(0);
               expect(h.db.audit).toHaveLength(auditCount);
          });

          it('should treat an unknown handle as released', async () => {
               const result = await h.run((uow) => h.services.reservations.release(uow, TEST_CONTEXT, 12345));
               expect(result).toEqual({ released: false, reservation: null });
          });

          it('should mark expired reservations separately', async () => {
               const reservation = await h.run((uow) =>
                    h.services.reservations.reserve(uow, TEST_CONTEXT, productId, 2, 'cart-1')
               );

               const result = await h.run((uow) => h.services.reservations.expire(uow, TEST_CONTEXT, reservation.id));

               expect(result.reservation?.status).toBe('EXPIRED');
               expect(h.db.auditActions()).toContain('reservation.expire');
          });
     });

     describe('commit', () => {
          it('should turn the reservation into an outbound movement', async () => {
               const reservation = await h.run((uow) =>
                    h.services.reservations.reserve(uow, TEST_CONTEXT, productId, 3, 'CMD-2026-01-0001')
               );

               const result = await h.run((uow) => h.services.reservations.commit(uow, TEST_CONTEXT, reservation.id));

               expect(result.reservation.status).toBe('COMMITTED');
               expect(result.stock).toEqual(
                    expect.objectContaining({ currentQuantity: 7, reservedQuantity: 0, availableQuantity: 7 })
               );
               expect(result.movement).toEqual(
                    expect.objectContaining({
                         type: 'outbound',
                         tag: 'order_fulfillment',
                         quantity: -3,
                         quantityBefore: 10,
                         quantityAfter: 7,
                         reason: 'order fulfillment',
                         referenceId: 'CMD-2026-01-0001',
                    })
               );
          });

          it('should be single use', async () => {
               const reservation = await h.run((uow) =>
                    h.services.reservations.reserve(uow, TEST_CONTEXT, productId, 3, 'cart-1')
               );
               await h.run((uow) => h.services.reservations.commit(uow, TEST_CONTEXT, reservation.id));

               await expect(
                    h.run((uow) => h.services.reservations.commit(uow, TEST_CONTEXT, reservation.id))
               ).rejects.toThrow(ReservationNotFoundError);
               expect(h.db.stock(productId).currentQuantity).toBe(7);
          });

          it('should not commit a released reservation', async () => {
               const reservation = await h.run((uow) =>
                    h.services.reservations.reserve(uow, TEST_CONTEXT, productId, 3, 'cart-1')
               );
               await h.run((uow) => h.services.reservations.release(uow, TEST_CONTEXT, reservation.id));

               await expect(
                    h.run((uow) => h.services.reservations.commit(uow, TEST_CONTEXT, reservation.id))
               ).rejects.toThrow(ReservationNotFoundError);
          });
     });

     describe('leases', () => {
          it('should stamp an expiry when a TTL is configured', async () => {
               const leased = createHarness({ reservationTtlMinutes: 30 });
               const id = await createStockedProduct(leased, { sku: 'RES-TTL', quantity: 5 });
               const before = Date.now();

               const reservation = await leased.run((uow) =>
                    leased.services.reservations.reserve(uow, TEST_CONTEXT, id, 1, 'cart-1')
               );

               const expiresAt = reservation.expiresAt?.getTime() ?? 0;
               expect(expiresAt).toBeGreaterThanOrEqual(before + 30 * 60_000);
               expect(expiresAt).toBeLessThanOrEqual(Date.now() + 30 * 60_000);
          });
     });
});
