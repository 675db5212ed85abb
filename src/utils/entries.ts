/**
 * Key/value inputs accepted at the API boundary: plain records or any
 * iterable of pairs (a `Map` included).
 */
export type KeyedInput<K, V> = Iterable<readonly [K, V]> | Readonly<Record<string, V>>;

export function isIterable<T>(input: Iterable<T> | object): input is Iterable<T> {
  return Symbol.iterator in input;
}

export function entriesOf<V>(input: KeyedInput<string, V>): Array<readonly [string, V]> {
  return isIterable<readonly [string, V]>(input) ? [...input] : Object.entries(input);
}
