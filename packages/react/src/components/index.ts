export { Watch, WatchCombined, type WatchCombinedProps, type WatchProps } from './watch.js';
