export { StorageSweepScheduler } from './StorageSweepScheduler';
