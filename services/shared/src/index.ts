// Database
export * from './db/client';

// Messaging
export * from './messaging/client';

// Services
export * from './services/product-catalog';
export * from './services/invoice-sequencer';
export * from './services/invoice-calculator';
export * from './services/invoice-service';
export * from './services/damaged-stock-ledger';
export * from './services/report-service';
export * from './services/stock-movements';
export * from './services/domain-events';

// HTTP
export * from './http/api-key';
export * from './http/errors';
export * from './http/health';
export * from './http/schemas';
export * from './http/server-options';

// Types
export * from './types/billing.types';

// Utils
export * from './utils/config';
export * from './utils/logger';
export * from './utils/errors';
export * from './utils/money';
export * from './utils/product-key';
