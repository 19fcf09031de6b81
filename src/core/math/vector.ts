/**
 * Fixed-size vector algebra over readonly tuples.
 *
 * Every operation returns a fresh tuple; inputs are never written to.
 * The gl-matrix kernels do the arithmetic, writing into plain number
 * tuples so results keep double precision.
 */

import { vec2, vec3, vec4 } from 'gl-matrix';
import type { Vec2, Vec3, Vec4, Vector } from '../types';

function dimensionMismatch(operation: string, a: Vector, b: Vector): Error {
  return new Error(
    `[Vector] ${operation}: dimension mismatch (${a.length} vs ${b.length})`
  );
}

// ============ Products & Magnitude ============

/**
 * Dot product of two vectors of the same dimension.
 */
export function dot(a: Vec2, b: Vec2): number;
export function dot(a: Vec3, b: Vec3): number;
export function dot(a: Vec4, b: Vec4): number;
export function dot(a: Vector, b: Vector): number {
  if (a.length === 2 && b.length === 2) return vec2.dot(a, b);
  if (a.length === 3 && b.length === 3) return vec3.dot(a, b);
  if (a.length === 4 && b.length === 4) return vec4.dot(a, b);
  throw dimensionMismatch('dot', a, b);
}

/**
 * Right-handed cross product a × b.
 */
export function cross(a: Vec3, b: Vec3): Vec3 {
  const out: [number, number, number] = [0, 0, 0];
  vec3.cross(out, a, b);
  return out;
}

/**
 * Euclidean magnitude, sqrt(dot(v, v)).
 */
export function norm(v: Vector): number {
  switch (v.length) {
    case 2: return vec2.length(v);
    case 3: return vec3.length(v);
    case 4: return vec4.length(v);
  }
}

/**
 * Euclidean distance between two points.
 */
export function distance(a: Vec2, b: Vec2): number;
export function distance(a: Vec3, b: Vec3): number;
export function distance(a: Vec4, b: Vec4): number;
export function distance(a: Vector, b: Vector): number {
  if (a.length === 2 && b.length === 2) return vec2.distance(a, b);
  if (a.length === 3 && b.length === 3) return vec3.distance(a, b);
  if (a.length === 4 && b.length === 4) return vec4.distance(a, b);
  throw dimensionMismatch('distance', a, b);
}

// ============ Elementwise ============

/**
 * Multiply every component by `s`.
 */
export function scale(v: Vec2, s: number): Vec2;
export function scale(v: Vec3, s: number): Vec3;
export function scale(v: Vec4, s: number): Vec4;
export function scale(v: Vector, s: number): Vector;
export function scale(v: Vector, s: number): Vector {
  switch (v.length) {
    case 2: {
      const out: [number, number] = [0, 0];
      vec2.scale(out, v, s);
      return out;
    }
    case 3: {
      const out: [number, number, number] = [0, 0, 0];
      vec3.scale(out, v, s);
      return out;
    }
    case 4: {
      const out: [number, number, number, number] = [0, 0, 0, 0];
      vec4.scale(out, v, s);
      return out;
    }
  }
}

export function negate(v: Vec2): Vec2;
export function negate(v: Vec3): Vec3;
export function negate(v: Vec4): Vec4;
export function negate(v: Vector): Vector {
  return scale(v, -1);
}

export function add(a: Vec2, b: Vec2): Vec2;
export function add(a: Vec3, b: Vec3): Vec3;
export function add(a: Vec4, b: Vec4): Vec4;
export function add(a: Vector, b: Vector): Vector {
  if (a.length === 2 && b.length === 2) {
    const out: [number, number] = [0, 0];
    vec2.add(out, a, b);
    return out;
  }
  if (a.length === 3 && b.length === 3) {
    const out: [number, number, number] = [0, 0, 0];
    vec3.add(out, a, b);
    return out;
  }
  if (a.length === 4 && b.length === 4) {
    const out: [number, number, number, number] = [0, 0, 0, 0];
    vec4.add(out, a, b);
    return out;
  }
  throw dimensionMismatch('add', a, b);
}

/**
 * a - b
 */
export function subtract(a: Vec2, b: Vec2): Vec2;
export function subtract(a: Vec3, b: Vec3): Vec3;
export function subtract(a: Vec4, b: Vec4): Vec4;
export function subtract(a: Vector, b: Vector): Vector {
  if (a.length === 2 && b.length === 2) {
    const out: [number, number] = [0, 0];
    vec2.subtract(out, a, b);
    return out;
  }
  if (a.length === 3 && b.length === 3) {
    const out: [number, number, number] = [0, 0, 0];
    vec3.subtract(out, a, b);
    return out;
  }
  if (a.length === 4 && b.length === 4) {
    const out: [number, number, number, number] = [0, 0, 0, 0];
    vec4.subtract(out, a, b);
    return out;
  }
  throw dimensionMismatch('subtract', a, b);
}

/**
 * Linear interpolation a + t * (b - a).
 */
export function lerp(a: Vec2, b: Vec2, t: number): Vec2;
export function lerp(a: Vec3, b: Vec3, t: number): Vec3;
export function lerp(a: Vec4, b: Vec4, t: number): Vec4;
export function lerp(a: Vector, b: Vector, t: number): Vector {
  if (a.length === 2 && b.length === 2) {
    const out: [number, number] = [0, 0];
    vec2.lerp(out, a, b, t);
    return out;
  }
  if (a.length === 3 && b.length === 3) {
    const out: [number, number, number] = [0, 0, 0];
    vec3.lerp(out, a, b, t);
    return out;
  }
  if (a.length === 4 && b.length === 4) {
    const out: [number, number, number, number] = [0, 0, 0, 0];
    vec4.lerp(out, a, b, t);
    return out;
  }
  throw dimensionMismatch('lerp', a, b);
}

// ============ Normalization ============

/**
 * Scale `v` to unit length.
 *
 * Throws for a zero-length (or non-finite) vector instead of returning
 * NaN components; gl-matrix's own normalize would silently return zeros.
 */
export function normalize(v: Vec2): Vec2;
export function normalize(v: Vec3): Vec3;
export function normalize(v: Vec4): Vec4;
export function normalize(v: Vector): Vector {
  const length = norm(v);
  if (!(length > 0) || !Number.isFinite(length)) {
    throw new Error(`[Vector] Cannot normalize a vector of length ${length}`);
  }
  return scale(v, 1 / length);
}
