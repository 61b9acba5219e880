import { FastifyInstance } from 'fastify';
import { ApiRouteOptions, resolveRouteDependencies } from '@backoffice/shared/src/http/route-options';
import { requestContext } from '@backoffice/shared/src/http/request-context';
import {
     commitReservationSchema,
     releaseReservationSchema,
     reserveSchema,
} from '../schemas/order.schemas';

interface ReservationParams {
     reservationId: number;
}

interface ReserveBody {
     productId: number;
     quantity: number;
     orderRef: string;
}

export async function registerReservationRoutes(app: FastifyInstance, options: ApiRouteOptions) {
     const { run, services } = resolveRouteDependencies(options);
     const { reservations } = services;

     app.post<{ Body: ReserveBody }>('/', { schema: reserveSchema }, async (request, reply) => {
          const ctx = requestContext(request);
          const { productId, quantity, orderRef } = request.body;
          const reservation = await run((uow) =>
               reservations.reserve(uow, ctx, productId, quantity, orderRef)
          );
          reply.code(201);
          return reservation;
     });

     app.post<{ Params: ReservationParams }>(
          '/:reservationId/release',
          { schema: releaseReservationSchema },
          async (request) => {
               const ctx = requestContext(request);
               return run((uow) => reservations.release(uow, ctx, request.params.reservationId));
          }
     );

     app.post<{ Params: ReservationParams }>(
          '/:reservationId/commit',
          { schema: commitReservationSchema },
          async (request) => {
               const ctx = requestContext(request);
               return run((uow) => reservations.commit(uow, ctx, request.params.reservationId));
          }
     );
}
