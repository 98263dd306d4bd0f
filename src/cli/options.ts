export function parsePositive(value: string | undefined, name: string): number | undefined {
  if (value === undefined) return undefined;
  const n = Number(value);
  if (Number.isNaN(n) || n <= 0) {
    throw new Error(`${name} must be a positive number.`);
  }
  return n;
}

/** Cycle counts follow the config schema: whole numbers only. */
export function parsePositiveInt(value: string | undefined, name: string): number | undefined {
  const n = parsePositive(value, name);
  if (n !== undefined && !Number.isInteger(n)) {
    throw new Error(`${name} must be a whole number.`);
  }
  return n;
}
