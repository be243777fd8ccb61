export { unify, substitute } from './unifier.js';
export { matchRule, matchRules } from './instantiation-generator.js';
export {
  EMPTY_BINDINGS,
  isVariable,
  isConstant,
  variable,
  factKey,
  bindingsKey,
} from './terms.js';
