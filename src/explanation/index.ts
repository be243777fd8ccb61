export { ExplanationBuilder, explanationDepth, rulesUsed } from './explanation-builder.js';
export { renderTerm, renderFact, renderBindings, renderExplanation } from './render.js';
