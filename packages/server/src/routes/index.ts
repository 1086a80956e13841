export { createHealthRoutes, type HealthRouteOptions } from './health/index.js';
export { createOAuthRoutes, type OAuthRouteOptions } from './oauth/index.js';
export { createDeviceRoutes, type DeviceRouteOptions } from './devices/index.js';
