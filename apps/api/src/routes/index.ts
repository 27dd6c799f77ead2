/**
 * Routes Index
 *
 * Barrel export for all API routes.
 */

export { healthRoutes, type HealthRouteOptions } from './health.js';
export { analyzeRoutes, type AnalyzeRouteOptions } from './analyze.js';
