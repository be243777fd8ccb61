export { Rule, RuleBuilder } from './rule-builder.js';
