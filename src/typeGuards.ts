const GRID_SIZE = 9;

export function assertGridIndex(value: number, label: string): void {
  if (!Number.isInteger(value) || value < 0 || value >= GRID_SIZE) {
    throw new RangeError(`${label} must be an integer in 0..8, got ${String(value)}`);
  }
}

export function assertNonNullable<T>(value: T, errorOrMessage?: Error | string): asserts value is NonNullable<T> {
  if (value !== null && value !== undefined) {
    return;
  }
  errorOrMessage ??= value === null ? 'Value is null' : 'Value is undefined';
  throw typeof errorOrMessage === 'string' ? new Error(errorOrMessage) : errorOrMessage;
}

export function ensureNonNullable<T>(value: T, errorOrMessage?: Error | string): NonNullable<T> {
  assertNonNullable(value, errorOrMessage);
  return value;
}
