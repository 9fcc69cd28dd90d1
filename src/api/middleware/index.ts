export { basicAuthMiddleware, parseBasicAuthorization, isAuthorized, AUTH_REALM } from './basicAuth.js';
export type { BasicCredentials } from './basicAuth.js';
export { requestIdMiddleware, REQUEST_ID_HEADER } from './requestId.js';
export { asyncHandler, errorHandler, notFoundHandler, requestPath, sendNotFound } from './errorHandler.js';
