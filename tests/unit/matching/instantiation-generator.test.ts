import { describe, it, expect } from 'vitest';
import { matchRule, matchRules } from '../../../src/matching/instantiation-generator.js';
import { variable } from '../../../src/matching/terms.js';
import { FactStore } from '../../../src/core/fact-store.js';
import { RuleBase } from '../../../src/core/rule-base.js';
import type { Instantiation } from '../../../src/types/engine.js';

const s = variable('s');
const c = variable('c');

function bindingsOf(instantiations: Instantiation[]): Record<string, unknown>[] {
  return instantiations.map((i) => Object.fromEntries(i.bindings));
}

describe('matchRule()', () => {
  const rules = new RuleBase([
    {
      name: 'grad-only-violation',
      antecedents: [
        ['enrolled', s, c],
        ['graduate-only', c],
      ],
      consequent: ['flag-violation', s, c],
    },
    {
      name: 'is-student',
      antecedents: [['enrolled', s, c]],
      consequent: ['student', s],
    },
  ]);
  const [gradOnly, isStudent] = rules.getAll();

  it('finds every joint binding across antecedents', () => {
    const facts = FactStore.from([
      ['enrolled', 'Alice', 'CS501'],
      ['enrolled', 'Bob', 'CS101'],
      ['enrolled', 'Carol', 'CS502'],
      ['graduate-only', 'CS501'],
      ['graduate-only', 'CS502'],
    ]);

    const result = matchRule(gradOnly!, facts);

    expect(bindingsOf(result)).toEqual([
      { s: 'Alice', c: 'CS501' },
      { s: 'Carol', c: 'CS502' },
    ]);
  });

  it('numbers instantiations in discovery order', () => {
    const facts = FactStore.from([
      ['enrolled', 'Bob', 'CS101'],
      ['enrolled', 'Alice', 'CS501'],
    ]);

    const result = matchRule(isStudent!, facts);

    expect(result.map((i) => i.ordinal)).toEqual([0, 1]);
    expect(result.map((i) => i.bindings.get('s'))).toEqual(['Bob', 'Alice']);
    expect(result.every((i) => i.rule === isStudent)).toBe(true);
  });

  it('returns nothing when an antecedent has no match', () => {
    const facts = FactStore.from([['enrolled', 'Alice', 'CS501']]);

    expect(matchRule(gradOnly!, facts)).toEqual([]);
  });

  it('returns nothing for an empty store', () => {
    expect(matchRule(isStudent!, new FactStore())).toEqual([]);
  });

  it('matches antecedents whose first term is a variable against all facts', () => {
    const any = new RuleBase([
      {
        name: 'tagged',
        antecedents: [[variable('p'), 'Alice']],
        consequent: ['mentions-alice', variable('p')],
      },
    ]).getAll()[0];
    const facts = FactStore.from([
      ['student', 'Alice'],
      ['student', 'Bob'],
      ['has-hold', 'Alice'],
    ]);

    expect(bindingsOf(matchRule(any!, facts))).toEqual([{ p: 'student' }, { p: 'has-hold' }]);
  });
});

describe('matchRules()', () => {
  it('concatenates matches in declared rule order', () => {
    const rules = new RuleBase([
      { name: 'second-by-name', antecedents: [['b', s]], consequent: ['from-b', s] },
      { name: 'first-by-name', antecedents: [['a', s]], consequent: ['from-a', s] },
    ]);
    const facts = FactStore.from([
      ['a', 1],
      ['b', 2],
    ]);

    const result = matchRules(rules.getAll(), facts);

    expect(result.map((i) => i.rule.name)).toEqual(['second-by-name', 'first-by-name']);
  });
});
