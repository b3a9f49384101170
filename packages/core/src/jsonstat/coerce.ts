const INTEGER = /^\s*[+-]?\d+\s*$/;

export function isIntegerLike(value: string | number): boolean {
  return typeof value === 'number' ? Number.isInteger(value) : INTEGER.test(value);
}

/** `"12"` and `12` become `12`; anything else is returned as given. */
export function coerceToInt(value: string | number): string | number {
  if (typeof value === 'number') return value;
  return isIntegerLike(value) ? parseInt(value, 10) : value;
}

/**
 * Category ids may arrive as JSON numbers or strings. Normalising them to
 * strings keeps map keys consistent.
 */
export function coerceToStr(value: string | number): string {
  return typeof value === 'string' ? value : String(value);
}
