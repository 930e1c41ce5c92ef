export { registerCors, getAllowedOriginsSet, isLocalhostOrigin } from './cors.js';
export { registerSecurityHeaders } from './security-headers.js';
