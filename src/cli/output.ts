export interface KeyValue {
  key: string;
  value: string | number;
}

/** Prints aligned `key: value` lines. */
export function printKeyValue(rows: readonly KeyValue[], indent = 2): void {
  const width = rows.reduce((max, row) => Math.max(max, row.key.length), 0);
  for (const { key, value } of rows) {
    console.log(`${' '.repeat(indent)}${`${key}:`.padEnd(width + 2)}${value}`);
  }
}

export function formatMass(value: number): string {
  return value.toFixed(4);
}
