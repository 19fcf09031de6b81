/**
 * Bounded numeric range used for clamping.
 */

/**
 * Closed interval [lower, upper]. Bounds are validated at construction,
 * so every instance satisfies lower < upper.
 */
export class Interval {
  readonly lower: number;
  readonly upper: number;

  constructor(lower: number, upper: number) {
    if (!(lower < upper)) {
      throw new Error(
        `[Interval] Lower bound must be less than upper bound (got ${lower} and ${upper})`
      );
    }
    this.lower = lower;
    this.upper = upper;
  }

  /** Width of the interval */
  get size(): number {
    return this.upper - this.lower;
  }

  toString(): string {
    return `[${this.lower}...${this.upper}]`;
  }
}

export const interval = (lower: number, upper: number): Interval => new Interval(lower, upper);

/**
 * Clamp `value` into the interval.
 */
export function clamp(value: number, range: Interval): number {
  if (value < range.lower) return range.lower;
  if (value > range.upper) return range.upper;
  return value;
}

/**
 * True when `value` lies within the closed interval.
 */
export function contains(range: Interval, value: number): boolean {
  return value >= range.lower && value <= range.upper;
}

/** [-1, 1], the domain of asin/acos */
export const UNIT_RANGE = new Interval(-1, 1);
