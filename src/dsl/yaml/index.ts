export { loadRuleSetFromYAML, loadRuleSetFromFile, YamlLoadError } from './loader.js';
export {
  validateRuleSet,
  validateRule,
  validatePattern,
  validateFact,
  validateTerm,
  YamlValidationError,
} from './schema.js';
