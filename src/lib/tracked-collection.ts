/**
 * Wrap an array so that every structural change (push, splice, index
 * assignment, length change, delete) reports back through `onChange`.
 * The reference handed out stays the same; only its contents differ.
 */
export function trackCollection<T>(items: Iterable<T>, onChange: () => void): T[] {
  const target: T[] = [...items];

  return new Proxy(target, {
    set(array, property, value, receiver) {
      const changed = Reflect.get(array, property, receiver) !== value;
      const result = Reflect.set(array, property, value, receiver);
      if (changed) {
        onChange();
      }
      return result;
    },
    deleteProperty(array, property) {
      const result = Reflect.deleteProperty(array, property);
      onChange();
      return result;
    },
  });
}

/**
 * Compare two member lists by identity, ignoring order.
 */
export function sameMembers<T>(a: readonly T[], b: readonly T[]): boolean {
  if (a.length !== b.length) {
    return false;
  }
  const remaining = new Set(b);
  return a.every(item => remaining.has(item)) && new Set(a).size === remaining.size;
}
