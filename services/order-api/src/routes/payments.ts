import { FastifyInstance } from 'fastify';
import { ApiRouteOptions, resolveRouteDependencies } from '@backoffice/shared/src/http/route-options';
import { requestContext } from '@backoffice/shared/src/http/request-context';
import type { GatewayOutcome } from '@backoffice/shared/src/types/commerce.types';
import {
     authorizePaymentSchema,
     capturePaymentSchema,
     confirmCashSchema,
     getPaymentSchema,
} from '../schemas/order.schemas';

interface PaymentParams {
     paymentId: number;
}

interface CaptureBody {
     result: 'success' | 'failure';
     reference?: string;
     reason?: string;
}

export function toGatewayOutcome(body: CaptureBody): GatewayOutcome {
     if (body.result === 'failure') {
          return { result: 'failure', reason: body.reason ?? 'declined by gateway' };
     }
     return { result: 'success', reference: body.reference };
}

export async function registerPaymentRoutes(app: FastifyInstance, options: ApiRouteOptions) {
     const { run, services } = resolveRouteDependencies(options);
     const { payments } = services;

     app.get<{ Params: PaymentParams }>('/:paymentId', { schema: getPaymentSchema }, async (request) => {
          return run((uow) => payments.getPayment(uow, request.params.paymentId));
     });

     app.post<{ Params: PaymentParams; Body: { gatewayReference?: string } | undefined }>(
          '/:paymentId/authorize',
          { schema: authorizePaymentSchema },
          async (request) => {
               const ctx = requestContext(request, 'payment-gateway');
               const reference = request.body?.gatewayReference;
               return run((uow) => payments.authorize(uow, ctx, request.params.paymentId, reference));
          }
     );

     // Gateway callback: OK or FAILED, both answered with 200
     app.post<{ Params: PaymentParams; Body: CaptureBody }>(
          '/:paymentId/capture',
          { schema: capturePaymentSchema },
          async (request) => {
               const ctx = requestContext(request, 'payment-gateway');
               const outcome = toGatewayOutcome(request.body);
               return run((uow) => payments.capturePayment(uow, ctx, request.params.paymentId, outcome));
          }
     );

     app.post<{ Params: PaymentParams; Body: { cashReceived?: number } | undefined }>(
          '/:paymentId/confirm-cash',
          { schema: confirmCashSchema },
          async (request) => {
               const ctx = requestContext(request, 'courier');
               const cashReceived = request.body?.cashReceived;
               return run((uow) =>
                    payments.confirmCashOnDelivery(uow, ctx, request.params.paymentId, cashReceived)
               );
          }
     );
}
