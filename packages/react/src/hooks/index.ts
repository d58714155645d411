export {
  useCombine,
  useCombine2,
  useCombine3,
  useCombine4,
  useCombine5,
  useCombine6,
  type UseCombineOptions,
} from './use-combine.js';
export { useWatch, type UseWatchOptions } from './use-watch.js';
export { useWatchable } from './use-watchable.js';
