/**
 * Centralized route exports
 */
export { BaseRouteHandler, type RouteContext, type RouteServices, type ErrorOptions } from './RouteContext.js';
export { HealthRoutes } from './HealthRoutes.js';
export { VideoRoutes } from './VideoRoutes.js';
export { SearchRoutes } from './SearchRoutes.js';
export { SessionRoutes } from './SessionRoutes.js';
