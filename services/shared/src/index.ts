// Database
export * from './db/client';
export * from './db/unit-of-work';

// Messaging
export * from './messaging/client';

// Domain
export * from './domain/stock-status';
export * from './domain/state-machines';
export * from './domain/invariants';
export * from './domain/order-number';

// Repositories
export * from './repositories/types';

// Services
export * from './services/container';
export * from './services/stock-ledger-service';
export * from './services/reservation-service';
export * from './services/product-service';
export * from './services/order-service';
export * from './services/payment-service';
export * from './services/refund-service';
export * from './services/stock-alert-service';
export * from './services/outbox-dispatcher';
export * from './services/reservation-expiry-service';

// HTTP
export * from './http/error-handler';
export * from './http/request-context';
export * from './http/route-options';
export * from './http/health';

// Types
export * from './types/commerce.types';

// Utils
export * from './utils/logger';
export * from './utils/errors';
