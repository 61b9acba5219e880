import { FastifyInstance } from 'fastify';
import { ApiRouteOptions, resolveRouteDependencies } from '@backoffice/shared/src/http/route-options';
import { requestContext } from '@backoffice/shared/src/http/request-context';
import type { CreateOrderRequest, RefundReason } from '@backoffice/shared/src/types/commerce.types';
import {
     cancelOrderSchema,
     createOrderSchema,
     createPaymentSchema,
     getOrderByNumberSchema,
     getOrderSchema,
     listPaymentsSchema,
     orderTransitionSchema,
     returnOrderSchema,
} from '../schemas/order.schemas';

interface OrderParams {
     orderId: number;
}

export async function registerOrderRoutes(app: FastifyInstance, options: ApiRouteOptions) {
     const { run, services } = resolveRouteDependencies(options);
     const { orders, payments } = services;

     // Checkout: reserve stock and open the order
     app.post<{ Body: CreateOrderRequest }>('/', { schema: createOrderSchema }, async (request, reply) => {
          const ctx = requestContext(request, request.body.customerId);
          const created = await run((uow) => orders.createOrder(uow, ctx, request.body));
          reply.code(201);
          return created;
     });

     app.get<{ Params: OrderParams }>('/:orderId', { schema: getOrderSchema }, async (request) => {
          return run((uow) => orders.getOrder(uow, request.params.orderId));
     });

     app.get<{ Params: { orderNumber: string } }>(
          '/by-number/:orderNumber',
          { schema: getOrderByNumberSchema },
          async (request) => {
               return run((uow) => orders.getOrderByNumber(uow, request.params.orderNumber));
          }
     );

     app.post<{ Params: OrderParams }>(
          '/:orderId/ship',
          { schema: orderTransitionSchema },
          async (request) => {
               const ctx = requestContext(request);
               return run((uow) => orders.ship(uow, ctx, request.params.orderId));
          }
     );

     app.post<{ Params: OrderParams }>(
          '/:orderId/deliver',
          { schema: orderTransitionSchema },
          async (request) => {
               const ctx = requestContext(request);
               return run((uow) => orders.deliver(uow, ctx, request.params.orderId));
          }
     );

     app.post<{ Params: OrderParams; Body: { reason?: string } | undefined }>(
          '/:orderId/cancel',
          { schema: cancelOrderSchema },
          async (request) => {
               const ctx = requestContext(request);
               const reason = request.body?.reason;
               return run((uow) => orders.cancel(uow, ctx, request.params.orderId, { reason }));
          }
     );

     app.post<{
          Params: OrderParams;
          Body: { reason?: RefundReason; description?: string; amount?: number } | undefined;
     }>('/:orderId/return', { schema: returnOrderSchema }, async (request) => {
          const ctx = requestContext(request);
          const body = request.body ?? {};
          return run((uow) =>
               orders.returnOrder(uow, ctx, request.params.orderId, {
                    reason: body.reason,
                    description: body.description,
                    amount: body.amount,
               })
          );
     });

     app.get<{ Params: OrderParams }>(
          '/:orderId/payments',
          { schema: listPaymentsSchema },
          async (request) => {
               return run((uow) => payments.listPayments(uow, request.params.orderId));
          }
     );

     // Retry after a failed payment
     app.post<{ Params: OrderParams }>(
          '/:orderId/payments',
          { schema: createPaymentSchema },
          async (request, reply) => {
               const ctx = requestContext(request);
               const payment = await run((uow) => payments.createPayment(uow, ctx, request.params.orderId));
               reply.code(201);
               return payment;
          }
     );
}
