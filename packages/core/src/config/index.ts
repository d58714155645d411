export {
  configureWatch,
  getLogger,
  getWatchConfig,
  resetWatchConfig,
  type WatchConfig,
} from './watch-config.js';
