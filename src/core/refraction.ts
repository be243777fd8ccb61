import type { Instantiation } from '../types/engine.js';
import { bindingsKey } from '../matching/terms.js';

/**
 * Identity key of an instantiation: rule name plus the binding set,
 * independent of binding insertion order.
 */
export function instantiationKey(instantiation: Pick<Instantiation, 'rule' | 'bindings'>): string {
  return `${JSON.stringify(instantiation.rule.name)}:${bindingsKey(instantiation.bindings)}`;
}

/**
 * Append-only record of fired instantiations for one run.
 */
export class FiredHistory {
  private readonly keys = new Set<string>();

  has(instantiation: Pick<Instantiation, 'rule' | 'bindings'>): boolean {
    return this.keys.has(instantiationKey(instantiation));
  }

  /**
   * Records a firing. Returns `false` if the instantiation was already recorded.
   */
  record(instantiation: Pick<Instantiation, 'rule' | 'bindings'>): boolean {
    const key = instantiationKey(instantiation);
    if (this.keys.has(key)) {
      return false;
    }
    this.keys.add(key);
    return true;
  }

  get size(): number {
    return this.keys.size;
  }
}

/**
 * Drops instantiations that already fired. Does not touch the history.
 */
export function filterFired(instantiations: readonly Instantiation[], history: FiredHistory): Instantiation[] {
  return instantiations.filter((instantiation) => !history.has(instantiation));
}
