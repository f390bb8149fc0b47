// Middleware - Barrel Export
export { errorHandler, notFoundHandler } from './error.middleware.js';
export { requestLogger } from './request-logger.middleware.js';
