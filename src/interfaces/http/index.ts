export { default as ingestRoutes } from './ingest-routes.js';
export { default as searchRoutes } from './search-routes.js';
export { default as healthRoutes } from './health.js';
