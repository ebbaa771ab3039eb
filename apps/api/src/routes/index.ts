/**
 * Routes Index
 *
 * Barrel export for all API routes.
 */

export { healthRoutes, type Toolchain, type ToolCheck, type HealthRouteOptions } from './health.js';
export { limitsRoutes, type LimitsRouteOptions } from './limits.js';
export { splitRoutes, type SplitRunner, type SplitRouteOptions } from './split.js';
