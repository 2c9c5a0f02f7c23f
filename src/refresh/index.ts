export { RefreshCoordinator } from './coordinator.js';
export type { TokenRefreshHandler, RefreshState } from './coordinator.js';
