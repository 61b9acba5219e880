import type { FastifyRequest } from 'fastify';
import type { RequestContext } from '../types/commerce.types';

function headerValue(request: FastifyRequest, name: string): string | undefined {
     const value = request.headers[name];
     const first = Array.isArray(value) ? value[0] : value;
     const trimmed = first?.trim();
     return trimmed ? trimmed : undefined;
}

/**
 * Actor and origin recorded in the audit trail. Callers identify themselves with
 * `x-actor`; `x-request-origin` overrides the default `METHOD url` origin.
 */
export function requestContext(request: FastifyRequest, defaultActor: string = 'anonymous'): RequestContext {
     return {
          actor: headerValue(request, 'x-actor') ?? defaultActor,
          origin: headerValue(request, 'x-request-origin') ?? `${request.method} ${request.url}`,
     };
}
