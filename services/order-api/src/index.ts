import Fastify from 'fastify';
import swagger from '@fastify/swagger';
import swaggerUi from '@fastify/swagger-ui';
import cors from '@fastify/cors';
import * as dotenv from 'dotenv';
import { registerOrderRoutes } from './routes/orders';
import { registerPaymentRoutes } from './routes/payments';
import { registerRefundRoutes } from './routes/refunds';
import { registerReservationRoutes } from './routes/reservations';
import { checkConnection, closePool } from '@backoffice/shared/src/db/client';
import { withUnitOfWork } from '@backoffice/shared/src/db/unit-of-work';
import { errorHandlerPlugin } from '@backoffice/shared/src/http/error-handler';
import { registerHealthRoutes } from '@backoffice/shared/src/http/health';
import {
     createCommerceServices,
     reservationOptionsFromEnv,
} from '@backoffice/shared/src/services/container';
import { logger } from '@backoffice/shared/src/utils/logger';

// Load environment variables
dotenv.config();

const PORT = parseInt(process.env.ORDER_API_PORT || '3000', 10);
const HOST = process.env.ORDER_API_HOST || '0.0.0.0';

async function main() {
     const app = Fastify({
          logger: true,
          requestIdHeader: 'x-correlation-id',
          genReqId: (req) => {
               const header = req.headers['x-correlation-id'];
               return typeof header === 'string' && header ? header : `req-${Date.now()}`;
          },
          ajv: {
               customOptions: {
                    removeAdditional: 'all',
                    coerceTypes: true,
                    useDefaults: true,
                    strict: false,
               },
          },
     });

     await app.register(cors, {
          origin: true,
     });

     await app.register(swagger, {
          openapi: {
               info: {
                    title: 'Order API',
                    description: 'Checkout, payment callbacks, refunds and stock reservations',
                    version: '1.0.0',
               },
               servers: [{ url: `http://localhost:${PORT}`, description: 'Development' }],
               tags: [
                    { name: 'orders', description: 'Order lifecycle' },
                    { name: 'payments', description: 'Payment attempts and gateway callbacks' },
                    { name: 'refunds', description: 'Refund workflow' },
                    { name: 'reservations', description: 'Stock reservations against in-flight orders' },
                    { name: 'health', description: 'Health and readiness checks' },
               ],
          },
     });

     await app.register(swaggerUi, {
          routePrefix: '/docs',
          uiConfig: {
               docExpansion: 'list',
               deepLinking: true,
          },
     });

     await app.register(errorHandlerPlugin);
     await app.register(registerHealthRoutes, { checkDatabase: checkConnection });

     const services = createCommerceServices(reservationOptionsFromEnv());
     const routeOptions = { unitOfWork: withUnitOfWork, services };

     await app.register(registerOrderRoutes, { prefix: '/orders', ...routeOptions });
     await app.register(registerPaymentRoutes, { prefix: '/payments', ...routeOptions });
     await app.register(registerRefundRoutes, { prefix: '/refunds', ...routeOptions });
     await app.register(registerReservationRoutes, { prefix: '/reservations', ...routeOptions });

     try {
          await app.listen({ port: PORT, host: HOST });
          logger.info(`Order API listening on ${HOST}:${PORT}`);
          logger.info(`OpenAPI docs available at http://${HOST}:${PORT}/docs`);
     } catch (err) {
          logger.error({ err }, 'Failed to start server');
          process.exit(1);
     }

     // Graceful shutdown
     const shutdown = async () => {
          logger.info('Shutting down gracefully...');
          await app.close();
          await closePool();
          process.exit(0);
     };

     process.on('SIGINT', shutdown);
     process.on('SIGTERM', shutdown);
}

main().catch((err) => {
     logger.fatal({ err }, 'Fatal error in order API');
     process.exit(1);
});
