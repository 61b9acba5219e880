import type { FastifyPluginAsync } from 'fastify';
import fp from 'fastify-plugin';
import { DomainError } from '../utils/errors';
import { logger } from '../utils/logger';

export interface ErrorResponse {
     error: string;
     message: string;
}

const errorHandlerPluginAsync: FastifyPluginAsync = async (fastify) => {
     fastify.setErrorHandler((error, request, reply) => {
          if (error instanceof DomainError) {
               const context = { code: error.code, message: error.message, url: request.url };
               if (error.statusCode >= 500) {
                    logger.error(context, 'Domain error');
               } else {
                    logger.warn(context, 'Domain error');
               }

               const body: ErrorResponse = { error: error.code, message: error.message };
               return reply.status(error.statusCode).send(body);
          }

          // Schema validation
          if (error.validation) {
               const body: ErrorResponse = { error: 'VALIDATION_ERROR', message: error.message };
               return reply.status(400).send(body);
          }

          // Malformed bodies, unsupported media types and similar client errors from Fastify
          if (error.statusCode !== undefined && error.statusCode >= 400 && error.statusCode < 500) {
               const body: ErrorResponse = { error: error.code || 'BAD_REQUEST', message: error.message };
               return reply.status(error.statusCode).send(body);
          }

          logger.error({ err: error, method: request.method, url: request.url }, 'Unhandled error');

          const body: ErrorResponse = {
               error: 'INTERNAL_ERROR',
               message: 'An unexpected error occurred',
          };
          return reply.status(500).send(body);
     });

     fastify.setNotFoundHandler((request, reply) => {
          const body: ErrorResponse = {
               error: 'NOT_FOUND',
               message: `Route ${request.method} ${request.url} not found`,
          };
          return reply.status(404).send(body);
     });
};

export const errorHandlerPlugin = fp(errorHandlerPluginAsync, {
     name: 'error-handler-plugin',
});
