import { describe, it, expect } from 'vitest';
import { JsonFormatter } from '../../../../src/cli/formatters/json-formatter.js';
import { InferenceEngine } from '../../../../src/core/inference-engine.js';
import type { FormattableData } from '../../../../src/cli/types.js';
import type { RuleSet } from '../../../../src/types/rule.js';

const gradOnly: RuleSet = {
  rules: [
    {
      name: 'grad-only-violation',
      priority: 5,
      antecedents: [
        ['enrolled', { var: 's' }, { var: 'c' }],
        ['graduate-only', { var: 'c' }]
      ],
      consequent: ['flag-violation', { var: 's' }, { var: 'c' }]
    }
  ],
  facts: [
    ['enrolled', 'Alice', 'CS501'],
    ['graduate-only', 'CS501']
  ]
};

describe('JsonFormatter', () => {
  describe('format', () => {
    it('should report a failed validation as unsuccessful', () => {
      const formatter = new JsonFormatter(false);
      const issue = { path: 'rules[0].consequent', message: 'Variable "?x" is not bound by any antecedent', severity: 'error' as const };
      const data: FormattableData = {
        type: 'validation',
        data: {
          file: 'rules.yaml',
          valid: false,
          ruleCount: 1,
          factCount: 0,
          errorCount: 1,
          warningCount: 0,
          errors: [issue],
          warnings: []
        }
      };

      const output = JSON.parse(formatter.format(data));
      expect(output.success).toBe(false);
      expect(output.validation.errors).toEqual([issue]);
    });

    it('should serialize binding sets as objects', () => {
      const engine = new InferenceEngine(gradOnly);
      const result = engine.run();
      const formatter = new JsonFormatter(false);

      const output = JSON.parse(
        formatter.format({
          type: 'run',
          data: { file: 'grad-only.json', result, explanations: [], trace: [] }
        })
      );

      expect(output.success).toBe(true);
      expect(output.run.result.firings[0]).toEqual({
        cycle: 1,
        rule: 'grad-only-violation',
        bindings: { s: 'Alice', c: 'CS501' },
        fact: ['flag-violation', 'Alice', 'CS501'],
        derived: true
      });
    });

    it('should serialize explanation trees', () => {
      const engine = new InferenceEngine(gradOnly);
      engine.run();
      const formatter = new JsonFormatter(false);

      const output = JSON.parse(
        formatter.format({ type: 'explanation', data: engine.explain(['flag-violation', 'Alice', 'CS501']) })
      );

      expect(output).toEqual({
        success: true,
        data: {
          type: 'derived',
          fact: ['flag-violation', 'Alice', 'CS501'],
          rule: 'grad-only-violation',
          bindings: { s: 'Alice', c: 'CS501' },
          cycle: 1,
          supports: [
            { type: 'initial', fact: ['enrolled', 'Alice', 'CS501'] },
            { type: 'initial', fact: ['graduate-only', 'CS501'] }
          ]
        }
      });
    });

    it('should pretty print with indentation', () => {
      const formatter = new JsonFormatter(true);

      expect(formatter.format({ type: 'explanation', data: { type: 'initial', fact: ['a'] } })).toBe(
        '{\n  "success": true,\n  "data": {\n    "type": "initial",\n    "fact": [\n      "a"\n    ]\n  }\n}'
      );
    });
  });
});
