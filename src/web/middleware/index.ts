/**
 * Middleware exports
 */

export { createCorsMiddleware } from './cors.js';
export { createAuthMiddleware, getCredential, type AuthContext } from './auth.js';
export {
  ApiError,
  handleError,
  unauthorized,
  notFound,
  methodNotAllowed,
  conflict,
  payloadTooLarge,
} from './error.js';
