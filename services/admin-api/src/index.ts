import Fastify from 'fastify';
import swagger from '@fastify/swagger';
import swaggerUi from '@fastify/swagger-ui';
import cors from '@fastify/cors';
import * as dotenv from 'dotenv';
import { registerAdminRoutes } from './routes/admin';
import { checkConnection, closePool } from '@backoffice/shared/src/db/client';
import { withUnitOfWork } from '@backoffice/shared/src/db/unit-of-work';
import { errorHandlerPlugin } from '@backoffice/shared/src/http/error-handler';
import { registerHealthRoutes } from '@backoffice/shared/src/http/health';
import {
     createCommerceServices,
     reservationOptionsFromEnv,
} from '@backoffice/shared/src/services/container';
import { logger } from '@backoffice/shared/src/utils/logger';

dotenv.config();

const PORT = parseInt(process.env.ADMIN_API_PORT || '3100', 10);
const HOST = process.env.ADMIN_API_HOST || '0.0.0.0';

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
                    title: 'Back Office Admin API',
                    description: 'Catalog, stock ledger operations and stock alerts',
                    version: '1.0.0',
               },
               servers: [{ url: `http://localhost:${PORT}`, description: 'Development' }],
               tags: [
                    { name: 'products', description: 'Catalog entries and their stock rows' },
                    { name: 'stock', description: 'Ledger mutations, thresholds and verification' },
                    { name: 'movements', description: 'Movement history' },
                    { name: 'alerts', description: 'Stock level alerts' },
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
     await app.register(registerAdminRoutes, {
          prefix: '/admin',
          unitOfWork: withUnitOfWork,
          services: createCommerceServices(reservationOptionsFromEnv()),
     });

     try {
          await app.listen({ port: PORT, host: HOST });
          logger.info(`Admin API listening on ${HOST}:${PORT}`);
          logger.info(`OpenAPI docs available at http://${HOST}:${PORT}/docs`);
     } catch (err) {
          logger.error({ err }, 'Failed to start server');
          process.exit(1);
     }

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
     logger.fatal({ err }, 'Fatal error in admin API');
     process.exit(1);
});
