export { loadDiscoveryConfig } from './discovery';
export type { DiscoveryConfig } from './discovery';
