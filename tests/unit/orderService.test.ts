import {
     DomainError,
     InsufficientStockError,
     InvalidQuantityError,
     InvalidTransitionError,
     OrderNotFoundError,
} from '@backoffice/shared/src/utils/errors';
import {
     captureOk,
     createHarness,
     createStockedProduct,
     placeOrder,
     TestHarness,
     TEST_ADDRESS,
     TEST_CONTEXT,
} from '../helpers/fixtures';

describe('OrderService (Unit)', () => {
     let h: TestHarness;
     let mugId: number;
     let bowlId: number;

     beforeEach(async () => {
          h = createHarness();
          mugId = await createStockedProduct(h, { sku: 'MUG', quantity: 10 });
          bowlId = await createStockedProduct(h, { sku: 'BOWL', quantity: 10 });
     });

     describe('createOrder', () => {
          it('should reserve every line and open an initiated payment', async () => {
               const { order, payment } = await placeOrder(
                    h,
                    [
                         { productId: mugId, quantity: 2, unitPrice: 1500 },
                         { productId: bowlId, quantity: 1, unitPrice: 2500 },
                    ],
                    'mobile_money',
                    500
               );

               expect(order.orderNumber).toMatch(/^CMD-\d{4}-\d{2}-0001$/);
               expect(order.status).toBe('pending');
               expect(order.stockState).toBe('reserved');
               expect(order.subtotal).toBe(5500);
               expect(order.deliveryFee).toBe(500);
               expect(order.totalAmount).toBe(6000);
               expect(order.deliveryAddress).toEqual(TEST_ADDRESS);
               expect(order.items.every((item) => item.reservationId !== null)).toBe(true);

               expect(payment).toEqual(
                    expect.objectContaining({
                         orderId: order.id,
                         method: 'mobile_money',
                         status: 'initiated',
                         amount: 6000,
                    })
               );
               expect(h.db.stock(mugId).reservedQuantity).toBe(2);
               expect(h.db.stock(bowlId).reservedQuantity).toBe(1);
               expect(h.db.reservationsFor(order.orderNumber)).toHaveLength(2);
          });

          it('should number orders sequentially within the month', async () => {
               const first = await placeOrder(h, [{ productId: mugId, quantity: 1, unitPrice: 100 }]);
               const second = await placeOrder(h, [{ productId: mugId, quantity: 1, unitPrice: 100 }]);

               expect(first.order.orderNumber.slice(0, 11)).toBe(second.order.orderNumber.slice(0, 11));
               expect(second.order.orderNumber.endsWith('-0002')).toBe(true);
          });

          it('should roll everything back when a line is short', async () => {
               await expect(
                    placeOrder(h, [
                         { productId: mugId, quantity: 1, unitPrice: 100 },
                         { productId: bowlId, quantity: 11, unitPrice: 100 },
                    ])
               ).rejects.toThrow(InsufficientStockError);

               expect(h.db.orders.size).toBe(0);
               expect(h.db.payments.size).toBe(0);
               expect(h.db.stock(mugId).reservedQuantity).toBe(0);

               const next = await placeOrder(h, [{ productId: mugId, quantity: 1, unitPrice: 100 }]);
               expect(next.order.orderNumber.endsWith('-0001')).toBe(true);
          });

          it('should not hold up checkouts of other products while waiting for stock', async () => {
               let signalLocked = () => {};
               const locked = new Promise<void>((resolve) => {
                    signalLocked = () => resolve();
               });
               let releaseMug = () => {};
               const released = new Promise<void>((resolve) => {
                    releaseMug = () => resolve();
               });
               const holder = h.run(async (uow) => {
                    await uow.stocks.lockByProductIds([mugId]);
                    signalLocked();
                    await released;
               });
               await locked;

               const waiting = placeOrder(h, [{ productId: mugId, quantity: 1, unitPrice: 100 }]);
               const other = await placeOrder(h, [{ productId: bowlId, quantity: 1, unitPrice: 100 }]);

               expect(other.order.orderNumber.endsWith('-0001')).toBe(true);

               releaseMug();
               await holder;
               const mugOrder = await waiting;
               expect(mugOrder.order.orderNumber.endsWith('-0002')).toBe(true);
               expect(h.db.reservationsFor(mugOrder.order.orderNumber)).toHaveLength(1);
          });

          it('should not use up an order number when stock is short', async () => {
               await expect(placeOrder(h, [{ productId: mugId, quantity: 11, unitPrice: 100 }])).rejects.toThrow(
                    InsufficientStockError
               );
               expect(h.db.orderNumberCounters.size).toBe(0);
          });

          it('should reject a negative unit price', async () => {
               await expect(placeOrder(h, [{ productId: mugId, quantity: 1, unitPrice: -1 }])).rejects.toThrow(
                    InvalidQuantityError
               );
          });

          it('should reject a blank customer', async () => {
               await expect(
                    h.run((uow) =>
                         h.services.orders.createOrder(uow, TEST_CONTEXT, {
                              customerId: ' ',
                              paymentMethod: 'card',
                              deliveryAddress: TEST_ADDRESS,
                              lines: [{ productId: mugId, quantity: 1, unitPrice: 100 }],
                         })
                    )
               ).rejects.toThrow(DomainError);
          });
     });

     describe('lookups', () => {
          it('should find an order by id and by number', async () => {
               const { order } = await placeOrder(h, [{ productId: mugId, quantity: 1, unitPrice: 100 }]);

               const byId = await h.run((uow) => h.services.orders.getOrder(uow, order.id));
               const byNumber = await h.run((uow) => h.services.orders.getOrderByNumber(uow, order.orderNumber));

               expect(byId.id).toBe(order.id);
               expect(byNumber.id).toBe(order.id);
          });

          it('should report an unknown order', async () => {
               await expect(h.run((uow) => h.services.orders.getOrder(uow, 77))).rejects.toThrow(OrderNotFoundError);
          });
     });

     describe('lifecycle', () => {
          it('should not ship an unpaid order', async () => {
               const { order } = await placeOrder(h, [{ productId: mugId, quantity: 1, unitPrice: 100 }]);

               await expect(h.run((uow) => h.services.orders.ship(uow, TEST_CONTEXT, order.id))).rejects.toThrow(
                    InvalidTransitionError
               );
          });

          it('should ship, deliver and return a paid order', async () => {
               const { order, payment } = await placeOrder(h, [{ productId: mugId, quantity: 2, unitPrice: 1000 }]);
               await captureOk(h, payment.id);

               const shipped = await h.run((uow) => h.services.orders.ship(uow, TEST_CONTEXT, order.id));
               expect(shipped.status).toBe('shipped');
               expect(shipped.shippedAt).toBeInstanceOf(Date);

               const delivered = await h.run((uow) => h.services.orders.deliver(uow, TEST_CONTEXT, order.id));
               expect(delivered.status).toBe('delivered');

               const returned = await h.run((uow) =>
                    h.services.orders.returnOrder(uow, TEST_CONTEXT, order.id, {
                         reason: 'defective_product',
                         description: 'Cracked handle',
                    })
               );
               expect(returned.order.status).toBe('returned');
               expect(returned.order.stockState).toBe('committed');
               expect(returned.refund).toEqual(
                    expect.objectContaining({
                         status: 'pending',
                         amount: 2000,
                         reason: 'defective_product',
                         description: 'Cracked handle',
                    })
               );
               expect(h.db.stock(mugId).currentQuantity).toBe(8);
               expect(h.db.eventTypes()).toEqual([
                    'OrderConfirmed',
                    'OrderShipped',
                    'OrderDelivered',
                    'RefundRequested',
               ]);
          });

          it('should not return an order that was not delivered', async () => {
               const { order, payment } = await placeOrder(h, [{ productId: mugId, quantity: 1, unitPrice: 100 }]);
               await captureOk(h, payment.id);
               await h.run((uow) => h.services.orders.ship(uow, TEST_CONTEXT, order.id));

               await expect(
                    h.run((uow) => h.services.orders.returnOrder(uow, TEST_CONTEXT, order.id))
               ).rejects.toThrow(InvalidTransitionError);
          });
     });

     describe('cancel', () => {
          it('should release the reservations of a pending order', async () => {
               const { order, payment } = await placeOrder(h, [{ productId: mugId, quantity: 3, unitPrice: 100 }]);

               const { order: cancelled, refund } = await h.run((uow) =>
                    h.services.orders.cancel(uow, TEST_CONTEXT, order.id)
               );

               expect(cancelled.status).toBe('cancelled');
               expect(cancelled.stockState).toBe('released');
               expect(cancelled.cancelledAt).toBeInstanceOf(Date);
               expect(refund).toBeNull();
               expect(h.db.reservationsFor(order.orderNumber).map((r) => r.status)).toEqual(['RELEASED']);
               expect(h.db.stock(mugId)).toEqual(
                    expect.objectContaining({ currentQuantity: 10, reservedQuantity: 0 })
               );
               expect(h.db.movementsFor(mugId)).toHaveLength(1);
               expect(h.db.payments.get(payment.id)).toEqual(
                    expect.objectContaining({ status: 'failed', failureReason: 'order cancelled' })
               );
          });

          it('should leave reservations the order does not hold alone', async () => {
               const { order } = await placeOrder(h, [{ productId: mugId, quantity: 3, unitPrice: 100 }]);
               await h.run((uow) =>
                    h.services.reservations.reserve(uow, TEST_CONTEXT, mugId, 2, order.orderNumber)
               );

               await h.run((uow) => h.services.orders.cancel(uow, TEST_CONTEXT, order.id));

               expect(h.db.reservationsFor(order.orderNumber).map((r) => r.status)).toEqual(['RELEASED', 'ACTIVE']);
               expect(h.db.stock(mugId).reservedQuantity).toBe(2);
          });

          it('should be a no-op for a cancelled order', async () => {
               const { order } = await placeOrder(h, [{ productId: mugId, quantity: 3, unitPrice: 100 }]);
               await h.run((uow) => h.services.orders.cancel(uow, TEST_CONTEXT, order.id));
               const auditCount = h.db.audit.length;

               const again = await h.run((uow) => h.services.orders.cancel(uow, TEST_CONTEXT, order.id));

               expect(again.order.status).toBe('cancelled');
               expect(again.refund).toBeNull();
               expect(h.db.audit).toHaveLength(auditCount);
          });

          it('should restock a paid order and open a refund', async () => {
               const { order, payment } = await placeOrder(h, [{ productId: mugId, quantity: 2, unitPrice: 750 }]);
               await captureOk(h, payment.id);
               expect(h.db.stock(mugId).currentQuantity).toBe(8);

               const { order: cancelled, refund } = await h.run((uow) =>
                    h.services.orders.cancel(uow, TEST_CONTEXT, order.id, { reason: 'customer changed mind' })
               );

               expect(cancelled.stockState).toBe('restocked');
               expect(h.db.stock(mugId).currentQuantity).toBe(10);
               const movements = h.db.movementsFor(mugId);
               expect(movements[movements.length - 1]).toEqual(
                    expect.objectContaining({
                         type: 'return',
                         tag: 'order_cancellation',
                         quantity: 2,
                         quantityBefore: 8,
                         quantityAfter: 10,
                         reason: 'customer changed mind',
                         referenceId: order.orderNumber,
                    })
               );
               expect(refund).toEqual(
                    expect.objectContaining({
                         paymentId: payment.id,
                         amount: 1500,
                         reason: 'order_cancelled',
                         status: 'pending',
                    })
               );
               expect(h.db.payments.get(payment.id)?.status).toBe('captured');
               expect(h.db.eventTypes()).toEqual(['OrderConfirmed', 'RefundRequested']);
          });

          it('should not cancel a shipped order', async () => {
               const { order, payment } = await placeOrder(h, [{ productId: mugId, quantity: 1, unitPrice: 100 }]);
               await captureOk(h, payment.id);
               await h.run((uow) => h.services.orders.ship(uow, TEST_CONTEXT, order.id));

               await expect(h.run((uow) => h.services.orders.cancel(uow, TEST_CONTEXT, order.id))).rejects.toThrow(
                    InvalidTransitionError
               );
          });
     });
});
