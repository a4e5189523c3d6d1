/**
 * Middleware Index
 */

export { AppError, errorHandler, notFoundHandler } from './error-handler';
export { asyncHandler } from './async-wrapper';
export { parseBody, parseQuery, requireParam } from './validation';
