/** Blank and `-` cells carry no value. */
export function sanitize(value: string | undefined | null): string | undefined {
  if (value === undefined || value === null) return undefined;
  const trimmed = value.trim();
  if (trimmed === '' || trimmed === '-') return undefined;
  return value;
}

export function firstValue(values: string[]): string | undefined {
  return sanitize(values[0]);
}

export function secondValue(values: string[]): string | undefined {
  return sanitize(values[1]);
}

/** Splits once on the first space: `"110 Trinkwasser"` → `['110', 'Trinkwasser']`. */
export function splitCodeAndName(value: string): [string, string] | undefined {
  const space = value.indexOf(' ');
  if (space < 0) return undefined;
  return [value.slice(0, space), value.slice(space + 1)];
}
