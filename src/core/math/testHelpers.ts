/**
 * Shared assertions for floating-point results in the math tests.
 */

import { expect } from 'vitest';
import type { Mat4 } from '../types';
import { type Quaternion, toVec4 } from './quaternion';

export function expectVecClose(
  actual: ArrayLike<number>,
  expected: ArrayLike<number>,
  digits: number = 10
): void {
  expect(actual.length).toBe(expected.length);
  for (let i = 0; i < expected.length; i++) {
    expect(actual[i]).toBeCloseTo(expected[i], digits);
  }
}

export function expectMat4Close(actual: Mat4, expected: Mat4, digits: number = 10): void {
  expectVecClose(actual.flat(), expected.flat(), digits);
}

export function expectQuatClose(actual: Quaternion, expected: Quaternion, digits: number = 10): void {
  expectVecClose(toVec4(actual), toVec4(expected), digits);
}
