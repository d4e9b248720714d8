/** Own entry of a kind-keyed map; inherited members such as `constructor` are never entries. */
export function ownValue<T>(map: Readonly<Record<string, T>>, key: string): T | undefined {
  return Object.hasOwn(map, key) ? map[key] : undefined;
}

// Plain assignment would hit the `__proto__` setter.
function setOwn<T>(map: Record<string, T>, key: string, value: T): void {
  Object.defineProperty(map, key, { value, writable: true, enumerable: true, configurable: true });
}

export function incCount(map: Record<string, number>, key: string, amount = 1): void {
  setOwn(map, key, (ownValue(map, key) ?? 0) + amount);
}

export function pushUnique(list: string[], value: string): void {
  if (!list.includes(value)) list.push(value);
}

/** Record `file` as an example for `key`, keeping at most `limit` per key. */
export function addExample(examples: Record<string, string[]>, key: string, file: string, limit: number): void {
  const list = ownValue(examples, key) ?? [];
  if (list.length < limit) list.push(file);
  setOwn(examples, key, list);
}
