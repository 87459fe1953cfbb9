// src/store.ts - Bounded variable storage
export const DEFAULT_VARIABLE_CAPACITY = 64;

/**
 * Named numeric variables with a fixed capacity. Names are case-sensitive.
 * `set` refuses a new name once the store is full; existing names can
 * always be overwritten.
 */
export class VariableStore {
  private values = new Map<string, number>();

  constructor(readonly capacity: number = DEFAULT_VARIABLE_CAPACITY) {}

  get size(): number {
    return this.values.size;
  }

  has(name: string): boolean {
    return this.values.has(name);
  }

  get(name: string): number | undefined {
    return this.values.get(name);
  }

  set(name: string, value: number): boolean {
    if (!this.values.has(name) && this.values.size >= this.capacity) {
      return false;
    }
    this.values.set(name, value);
    return true;
  }

  delete(name: string): boolean {
    return this.values.delete(name);
  }

  entries(): [string, number][] {
    return Array.from(this.values.entries());
  }
}

export function createDefaultStore(capacity: number = DEFAULT_VARIABLE_CAPACITY): VariableStore {
  const store = new VariableStore(capacity);
  store.set('pi', Math.PI);
  store.set('e', Math.E);
  return store;
}
