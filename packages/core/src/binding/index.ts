export {
  Binding,
  defaultShouldRebuild,
  withBinding,
  type BindingOptions,
  type BindingState,
  type RebuildContext,
  type ShouldRebuild,
} from './binding.js';
