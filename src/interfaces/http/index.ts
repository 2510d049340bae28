export { default as statusRoutes } from './status-routes.js';
export type { StatusRoutesOptions, StatusSource } from './status-routes.js';
