export type Maybe = number | null | undefined;

export function safeDivide(numerator: Maybe, denominator: Maybe): number | null {
  if (numerator == null || denominator == null || denominator === 0) return null;
  return numerator / denominator;
}

export function safeSubtract(a: Maybe, b: Maybe): number | null {
  if (a == null || b == null) return null;
  return a - b;
}

/** Growth of current over previous; null when previous is missing or zero. */
export function growth(current: Maybe, previous: Maybe): number | null {
  return safeDivide(safeSubtract(current, previous), previous);
}

const TIE_TAIL = /^50*$/;

/**
 * Round to `decimals` places, sending an exact tie to the even digit
 * (0.03125 -> 0.0312, 0.625 -> 0.62, 0.375 -> 0.38).
 *
 * toFixed already rounds from the exact binary value, so only exact ties
 * need correcting; toFixed takes those away from zero.
 */
export function roundHalfEven(value: number, decimals: number): number {
  const awayFromZero = Number(value.toFixed(decimals));
  if (!Number.isFinite(value) || Math.abs(value) >= 1e21) return awayFromZero;

  // an exact tie has at most decimals + 1 fractional digits, so 100 is plenty
  const expanded = Math.abs(value).toFixed(100);
  const point = expanded.indexOf('.');
  if (!TIE_TAIL.test(expanded.slice(point + 1 + decimals))) return awayFromZero;

  const kept = decimals === 0 ? expanded.slice(0, point) : expanded.slice(0, point + 1 + decimals);
  if (Number(kept.charAt(kept.length - 1)) % 2 === 1) return awayFromZero;
  return value < 0 ? -Number(kept) : Number(kept);
}

export function round4(value: number | null): number | null {
  return value === null ? null : roundHalfEven(value, 4);
}
