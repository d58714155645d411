export {
  identical,
  resolveEquality,
  shallowEquals,
  structuralEquals,
  type Equality,
  type EqualityStrategy,
} from './equality.js';
