import { describe, it, expect } from 'vitest';
import { RuleBase } from '../../../src/core/rule-base.js';
import { variable } from '../../../src/matching/terms.js';

const s = variable('s');

describe('RuleBase', () => {
  const base = new RuleBase([
    { name: 'first', antecedents: [['a', s]], consequent: ['b', s] },
    {
      name: 'second',
      description: 'Two antecedents',
      priority: 4,
      antecedents: [['a', s], ['b', s]],
      consequent: ['c', s],
    },
  ]);

  it('keeps declared order', () => {
    expect(base.getAll().map((rule) => rule.name)).toEqual(['first', 'second']);
    expect(base.getAll().map((rule) => rule.order)).toEqual([0, 1]);
    expect(base.size).toBe(2);
  });

  it('defaults priority to 0', () => {
    expect(base.get('first')?.priority).toBe(0);
    expect(base.get('second')?.priority).toBe(4);
  });

  it('derives specificity from the antecedent count', () => {
    expect(base.get('first')?.specificity).toBe(1);
    expect(base.get('second')?.specificity).toBe(2);
  });

  it('keeps the optional description', () => {
    expect(base.get('second')?.description).toBe('Two antecedents');
    expect(base.get('first')).not.toHaveProperty('description');
  });

  it('freezes compiled rules and their patterns', () => {
    const rule = base.get('second');

    expect(Object.isFrozen(rule)).toBe(true);
    expect(Object.isFrozen(rule?.antecedents)).toBe(true);
    expect(Object.isFrozen(rule?.antecedents[0])).toBe(true);
    expect(Object.isFrozen(rule?.consequent)).toBe(true);
  });

  it('does not share variable objects with the input', () => {
    const input = { name: 'r', antecedents: [['a', s]], consequent: ['b', s] };
    const rule = new RuleBase([input]).get('r');

    expect(rule?.antecedents[0]?.[1]).toEqual({ var: 's' });
    expect(rule?.antecedents[0]?.[1]).not.toBe(s);
  });

  it('returns undefined for an unknown name', () => {
    expect(base.get('missing')).toBeUndefined();
  });
});
