export { createJobRoutes } from './job-routes';
export { createSessionRoutes } from './session-routes';
export { createSongListRoutes } from './song-list-routes';
export { createFileRoutes } from './file-routes';
export { createHealthRoutes, type HealthRouteDeps } from './health-routes';
