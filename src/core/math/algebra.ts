/**
 * Algebraic capability interfaces.
 *
 * TypeScript has no operator overloading, so arithmetic is passed around
 * as a dictionary of operations. Generic code written against `Ring<T>`
 * runs unchanged on plain numbers and on quaternions.
 *
 * @example
 * sumAll(numberRing, [1, 2, 3]);          // 6
 * sumAll(quaternionRing, [q1, q2, q3]);   // qsum(qsum(q1, q2), q3)
 */

import {
  type Quaternion,
  QUATERNION_UNITY,
  QUATERNION_ZERO,
  qinverse,
  qmultiply,
  qnegate,
  qsum,
  quaternion,
} from './quaternion';

// ============ Interfaces ============

export interface Semigroup<T> {
  /** Associative binary operation */
  concat(a: T, b: T): T;
}

export interface Monoid<T> extends Semigroup<T> {
  /** Identity element of `concat` */
  readonly empty: T;
}

export interface Group<T> extends Monoid<T> {
  invert(a: T): T;
}

/**
 * Ring with unity. `fromNumber` embeds the reals so generic code can use
 * numeric coefficients.
 */
export interface Ring<T> {
  readonly zero: T;
  readonly one: T;
  add(a: T, b: T): T;
  negate(a: T): T;
  multiply(a: T, b: T): T;
  fromNumber(n: number): T;
}

// ============ Instances ============

export const numberRing: Ring<number> = {
  zero: 0,
  one: 1,
  add: (a, b) => a + b,
  negate: (a) => -a,
  multiply: (a, b) => a * b,
  fromNumber: (n) => n,
};

export const quaternionRing: Ring<Quaternion> = {
  zero: QUATERNION_ZERO,
  one: QUATERNION_UNITY,
  add: qsum,
  negate: qnegate,
  multiply: qmultiply,
  fromNumber: (n) => quaternion(n, [0, 0, 0]),
};

export const quaternionAdditiveGroup: Group<Quaternion> = {
  concat: qsum,
  empty: QUATERNION_ZERO,
  invert: qnegate,
};

/**
 * Non-zero quaternions under the Hamilton product. `invert` throws for zero.
 */
export const quaternionMultiplicativeGroup: Group<Quaternion> = {
  concat: qmultiply,
  empty: QUATERNION_UNITY,
  invert: qinverse,
};

export const additiveMonoid = <T>(ring: Ring<T>): Monoid<T> => ({
  concat: ring.add,
  empty: ring.zero,
});

export const multiplicativeMonoid = <T>(ring: Ring<T>): Monoid<T> => ({
  concat: ring.multiply,
  empty: ring.one,
});

// ============ Generic algorithms ============

export function concatAll<T>(monoid: Monoid<T>, values: readonly T[]): T {
  return values.reduce((acc, value) => monoid.concat(acc, value), monoid.empty);
}

export const sumAll = <T>(ring: Ring<T>, values: readonly T[]): T =>
  concatAll(additiveMonoid(ring), values);

/**
 * Left-to-right product; order matters for non-commutative rings.
 */
export const productAll = <T>(ring: Ring<T>, values: readonly T[]): T =>
  concatAll(multiplicativeMonoid(ring), values);

function isGroup<T>(structure: Monoid<T> | Group<T>): structure is Group<T> {
  return 'invert' in structure;
}

/**
 * x^n by repeated squaring. Negative exponents need a group.
 */
export function powInt<T>(structure: Monoid<T> | Group<T>, x: T, n: number): T {
  if (!Number.isInteger(n)) {
    throw new Error(`[Algebra] Exponent must be an integer (got ${n})`);
  }
  if (n < 0) {
    if (!isGroup(structure)) {
      throw new Error('[Algebra] Negative exponents need a group');
    }
    return powInt(structure, structure.invert(x), -n);
  }

  let result = structure.empty;
  let base = x;
  let exponent = n;
  while (exponent > 0) {
    if (exponent % 2 === 1) result = structure.concat(result, base);
    base = structure.concat(base, base);
    exponent = Math.floor(exponent / 2);
  }
  return result;
}

/**
 * c0 + c1 x + c2 x² + ... by Horner's rule.
 */
export function evaluatePolynomial<T>(ring: Ring<T>, coefficients: readonly number[], x: T): T {
  return coefficients.reduceRight(
    (acc, c) => ring.add(ring.multiply(acc, x), ring.fromNumber(c)),
    ring.zero
  );
}

/**
 * Truncated Taylor series of e^x with `terms` terms.
 */
export function exponentialSeries<T>(ring: Ring<T>, x: T, terms: number = 20): T {
  const coefficients: number[] = [];
  let factorial = 1;
  for (let k = 0; k < terms; k++) {
    if (k > 0) factorial *= k;
    coefficients.push(1 / factorial);
  }
  return evaluatePolynomial(ring, coefficients, x);
}
