import { VariableStore, createDefaultStore } from '../src/store';

describe('VariableStore', () => {
  it('should hold pi and e by default', () => {
    const store = createDefaultStore();
    expect(store.get('pi')).toBe(Math.PI);
    expect(store.get('e')).toBe(Math.E);
    expect(store.size).toBe(2);
  });

  it('should refuse new names once full', () => {
    const store = new VariableStore(1);
    expect(store.set('a', 1)).toBe(true);
    expect(store.set('b', 2)).toBe(false);
    expect(store.set('a', 3)).toBe(true);
    expect(store.get('a')).toBe(3);
    expect(store.has('b')).toBe(false);
  });

  it('should free a slot on delete', () => {
    const store = new VariableStore(1);
    store.set('a', 1);
    expect(store.delete('a')).toBe(true);
    expect(store.delete('a')).toBe(false);
    expect(store.set('b', 2)).toBe(true);
    expect(store.entries()).toEqual([['b', 2]]);
  });
});
