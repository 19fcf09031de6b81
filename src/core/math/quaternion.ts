/**
 * Quaternions q = w + xi + yj + zk, stored as a scalar part and a vector part.
 *
 * Values are not constrained to unit length. Operations that treat a
 * quaternion as a rotation (qrotate, slerp, Euler extraction, gimbalPole,
 * toAxisAngle) normalize their inputs first; q and -q describe the same
 * rotation.
 *
 * Euler convention: [yaw, pitch, roll] is the rotation
 *   Ry(yaw) * Rx(pitch) * Rz(roll)
 * i.e. roll about Z is applied first, then pitch about X, then yaw about Y.
 */

import type { Mat4, Vec3, Vec4 } from '../types';
import { createLogger } from '../utils/logger';
import { type Angle, radians, toRadians, wrapRadians } from './angle';
import { UNIT_RANGE, clamp } from './interval';
import { type ToleranceConfig, resolveTolerances } from './tolerances';
import { add, cross, dot, negate, norm, normalize, scale } from './vector';

const log = createLogger('Quaternion');

export interface Quaternion {
  /** Real part w */
  readonly scalar: number;
  /** Imaginary part [x, y, z] */
  readonly vector: Vec3;
}

/**
 * Yaw, pitch and roll, in that order.
 */
export type EulerAngles = readonly [yaw: Angle, pitch: Angle, roll: Angle];

export type GimbalPole = 'north' | 'south' | 'none';

export const quaternion = (scalar: number, vector: Vec3): Quaternion => ({ scalar, vector });

/** Additive identity */
export const QUATERNION_ZERO: Quaternion = quaternion(0, [0, 0, 0]);

/** Multiplicative identity, the "no rotation" quaternion */
export const QUATERNION_UNITY: Quaternion = quaternion(1, [0, 0, 0]);

/** [w, x, y, z] */
export const toVec4 = ({ scalar, vector: [x, y, z] }: Quaternion): Vec4 => [scalar, x, y, z];

/** From [w, x, y, z] */
export const fromVec4 = ([w, x, y, z]: Vec4): Quaternion => quaternion(w, [x, y, z]);

// ============ Algebra ============

export function qsum(a: Quaternion, b: Quaternion): Quaternion {
  return quaternion(a.scalar + b.scalar, add(a.vector, b.vector));
}

export function qnegate(q: Quaternion): Quaternion {
  return quaternion(-q.scalar, negate(q.vector));
}

export function qdifference(a: Quaternion, b: Quaternion): Quaternion {
  return qsum(a, qnegate(b));
}

/**
 * Multiply by a real number.
 */
export function qscale(q: Quaternion, k: number): Quaternion {
  return quaternion(q.scalar * k, scale(q.vector, k));
}

/**
 * Hamilton product a * b. Composing rotations, b is applied first.
 */
export function qmultiply(a: Quaternion, b: Quaternion): Quaternion {
  return quaternion(
    a.scalar * b.scalar - dot(a.vector, b.vector),
    add(add(scale(b.vector, a.scalar), scale(a.vector, b.scalar)), cross(a.vector, b.vector))
  );
}

export function conjugate(q: Quaternion): Quaternion {
  return quaternion(q.scalar, negate(q.vector));
}

/**
 * Four-component dot product.
 */
export function qdot(a: Quaternion, b: Quaternion): number {
  return dot(toVec4(a), toVec4(b));
}

export function qnorm(q: Quaternion): number {
  return norm(toVec4(q));
}

export function qnormalize(q: Quaternion): Quaternion {
  const length = qnorm(q);
  if (!(length > 0) || !Number.isFinite(length)) {
    throw new Error(`[Quaternion] Cannot normalize a quaternion of norm ${length}`);
  }
  return qscale(q, 1 / length);
}

/**
 * conjugate(q) / |q|². Equals the conjugate for unit quaternions.
 */
export function qinverse(q: Quaternion): Quaternion {
  const normSquared = qdot(q, q);
  if (normSquared === 0) {
    throw new Error('[Quaternion] The zero quaternion has no inverse');
  }
  return qscale(conjugate(q), 1 / normSquared);
}

// ============ Exponential map ============

/**
 * e^q = e^w (cos|v| + sin|v| v/|v|)
 */
export function qexp(q: Quaternion): Quaternion {
  const theta = norm(q.vector);
  const magnitude = Math.exp(q.scalar);
  if (theta === 0) {
    return quaternion(magnitude, [0, 0, 0]);
  }
  return quaternion(magnitude * Math.cos(theta), scale(q.vector, (magnitude * Math.sin(theta)) / theta));
}

/**
 * Principal logarithm: ln|q| + acos(w/|q|) v/|v|.
 *
 * A negative real quaternion has no unique logarithm; the X axis is used.
 */
export function qlog(q: Quaternion): Quaternion {
  const length = qnorm(q);
  if (length === 0) {
    throw new Error('[Quaternion] The zero quaternion has no logarithm');
  }
  const vectorLength = norm(q.vector);
  if (vectorLength === 0) {
    if (q.scalar > 0) {
      return quaternion(Math.log(length), [0, 0, 0]);
    }
    log.debug('qlog of a negative real quaternion, choosing the X axis');
    return quaternion(Math.log(length), [Math.PI, 0, 0]);
  }
  const halfAngle = Math.acos(clamp(q.scalar / length, UNIT_RANGE));
  return quaternion(Math.log(length), scale(q.vector, halfAngle / vectorLength));
}

/**
 * q^t = exp(t * log(q)). For a unit quaternion this scales the rotation
 * angle by t, which extrapolates when t > 1.
 */
export function qpow(q: Quaternion, exponent: number): Quaternion {
  return qexp(qscale(qlog(q), exponent));
}

// ============ Axis-angle ============

/**
 * Rotation of `angle` about `axis`. The axis must already be unit length.
 */
export function fromAxis(angle: Angle, axis: Vec3, options?: Partial<ToleranceConfig>): Quaternion {
  const { epsilon } = resolveTolerances(options);
  const length = norm(axis);
  if (Math.abs(length - 1) > epsilon) {
    throw new Error(`[Quaternion] Rotation axis must be unit length (got ${length})`);
  }
  const half = toRadians(angle) / 2;
  return quaternion(Math.cos(half), scale(axis, Math.sin(half)));
}

/**
 * Angle in [0, 2π] and unit axis of a rotation. The identity reports the X axis.
 */
export function toAxisAngle(
  q: Quaternion,
  options?: Partial<ToleranceConfig>
): { angle: Angle; axis: Vec3 } {
  const { epsilon } = resolveTolerances(options);
  const unit = qnormalize(q);
  const w = clamp(unit.scalar, UNIT_RANGE);
  const sinHalf = Math.sqrt(1 - w * w);
  if (sinHalf < epsilon) {
    return { angle: radians(0), axis: [1, 0, 0] };
  }
  return { angle: radians(2 * Math.acos(w)), axis: scale(unit.vector, 1 / sinHalf) };
}

// ============ Matrices ============

/**
 * Rotation matrix of q, scaled by 2/|q|² so non-unit input still yields
 * a pure rotation.
 */
export function toMatrix(q: Quaternion): Mat4 {
  const normSquared = qdot(q, q);
  if (normSquared === 0) {
    throw new Error('[Quaternion] The zero quaternion is not a rotation');
  }
  const s = 2 / normSquared;
  const w = q.scalar;
  const [x, y, z] = q.vector;

  return [
    [1 - s * (y * y + z * z), s * (x * y - w * z), s * (x * z + w * y), 0],
    [s * (x * y + w * z), 1 - s * (x * x + z * z), s * (y * z - w * x), 0],
    [s * (x * z - w * y), s * (y * z + w * x), 1 - s * (x * x + y * y), 0],
    [0, 0, 0, 1],
  ];
}

/**
 * Unit quaternion of the rotation in the upper-left 3x3 of `m`.
 * Branches on the largest diagonal term to keep the divisor away from zero.
 */
export function fromMatrix(m: Mat4): Quaternion {
  const [[m00, m01, m02], [m10, m11, m12], [m20, m21, m22]] = m;
  const trace = m00 + m11 + m22;

  let result: Quaternion;
  if (trace > 0) {
    const s = Math.sqrt(trace + 1) * 2;
    result = quaternion(s / 4, [(m21 - m12) / s, (m02 - m20) / s, (m10 - m01) / s]);
  } else if (m00 > m11 && m00 > m22) {
    const s = Math.sqrt(1 + m00 - m11 - m22) * 2;
    result = quaternion((m21 - m12) / s, [s / 4, (m01 + m10) / s, (m02 + m20) / s]);
  } else if (m11 > m22) {
    const s = Math.sqrt(1 + m11 - m00 - m22) * 2;
    result = quaternion((m02 - m20) / s, [(m01 + m10) / s, s / 4, (m12 + m21) / s]);
  } else {
    const s = Math.sqrt(1 + m22 - m00 - m11) * 2;
    result = quaternion((m10 - m01) / s, [(m02 + m20) / s, (m12 + m21) / s, s / 4]);
  }
  return qnormalize(result);
}

// ============ Euler angles ============

/**
 * Classify how close the rotation is to pitch = ±90°, where yaw and roll
 * turn about the same axis.
 */
export function gimbalPole(q: Quaternion, options?: Partial<ToleranceConfig>): GimbalPole {
  const { gimbalThreshold } = resolveTolerances(options);
  const { scalar: w, vector: [x, y, z] } = qnormalize(q);
  const t = w * x - y * z;
  if (t > gimbalThreshold) return 'north';
  if (t < -gimbalThreshold) return 'south';
  return 'none';
}

/**
 * Rotation about Z. At a pole this absorbs the yaw as well.
 */
export function roll(q: Quaternion, options?: Partial<ToleranceConfig>): Angle {
  const unit = qnormalize(q);
  const { scalar: w, vector: [x, y, z] } = unit;
  if (gimbalPole(unit, options) !== 'none') {
    return radians(wrapRadians(2 * Math.atan2(z, w)));
  }
  return radians(Math.atan2(2 * (w * z + x * y), 1 - 2 * (x * x + z * z)));
}

/**
 * Rotation about X, in [-π/2, π/2].
 */
export function pitch(q: Quaternion, options?: Partial<ToleranceConfig>): Angle {
  const unit = qnormalize(q);
  const { scalar: w, vector: [x, y, z] } = unit;
  switch (gimbalPole(unit, options)) {
    case 'north':
      return radians(Math.PI / 2);
    case 'south':
      return radians(-Math.PI / 2);
    case 'none':
      return radians(Math.asin(clamp(2 * (w * x - y * z), UNIT_RANGE)));
  }
}

/**
 * Rotation about Y. Exactly 0 at a pole.
 */
export function yaw(q: Quaternion, options?: Partial<ToleranceConfig>): Angle {
  const unit = qnormalize(q);
  const { scalar: w, vector: [x, y, z] } = unit;
  if (gimbalPole(unit, options) !== 'none') {
    return radians(0);
  }
  return radians(Math.atan2(2 * (y * w + x * z), 1 - 2 * (x * x + y * y)));
}

export function toEulerAngles(q: Quaternion, options?: Partial<ToleranceConfig>): EulerAngles {
  return [yaw(q, options), pitch(q, options), roll(q, options)];
}

/**
 * Unit quaternion of Ry(yaw) * Rx(pitch) * Rz(roll).
 */
export function fromEulerAngles([yawAngle, pitchAngle, rollAngle]: EulerAngles): Quaternion {
  const hy = toRadians(yawAngle) / 2;
  const hp = toRadians(pitchAngle) / 2;
  const hr = toRadians(rollAngle) / 2;
  const sy = Math.sin(hy), cy = Math.cos(hy);
  const sp = Math.sin(hp), cp = Math.cos(hp);
  const sr = Math.sin(hr), cr = Math.cos(hr);

  return quaternion(cy * cp * cr + sy * sp * sr, [
    cy * sp * cr + sy * cp * sr,
    sy * cp * cr - cy * sp * sr,
    cy * cp * sr - sy * sp * cr,
  ]);
}

// ============ Vectors ============

/**
 * Shortest-arc rotation taking the direction of `from` onto the direction of `to`.
 */
export function fromCross(from: Vec3, to: Vec3, options?: Partial<ToleranceConfig>): Quaternion {
  const { epsilon } = resolveTolerances(options);
  const a = normalize(from);
  const b = normalize(to);
  const cosine = clamp(dot(a, b), UNIT_RANGE);
  const axis = cross(a, b);
  const sine = norm(axis);

  if (sine > epsilon) {
    return fromAxis(radians(Math.acos(cosine)), scale(axis, 1 / sine), options);
  }
  if (cosine > 0) {
    return QUATERNION_UNITY;
  }

  // Opposite directions: any axis perpendicular to `a` works
  log.debug('fromCross with opposite vectors, rotating π about a perpendicular axis');
  const helper: Vec3 = Math.abs(a[0]) < 0.9 ? [1, 0, 0] : [0, 1, 0];
  return fromAxis(radians(Math.PI), normalize(cross(a, helper)), options);
}

/**
 * Rotate `v` by q via q * (0, v) * conj(q), with q normalized first.
 */
export function qrotate(v: Vec3, q: Quaternion): Vec3 {
  const unit = qnormalize(q);
  return qmultiply(qmultiply(unit, quaternion(0, v)), conjugate(unit)).vector;
}

// ============ Interpolation ============

/**
 * Spherical linear interpolation along the shorter arc.
 *
 * Both inputs are normalized. When they are (nearly) the same rotation
 * the sine weights degenerate, so normalized linear interpolation is
 * used instead.
 */
export function slerp(
  from: Quaternion,
  to: Quaternion,
  t: number,
  options?: Partial<ToleranceConfig>
): Quaternion {
  const { slerpLinearThreshold } = resolveTolerances(options);
  const a = qnormalize(from);
  let b = qnormalize(to);
  let cosine = qdot(a, b);

  if (cosine < 0) {
    b = qnegate(b);
    cosine = -cosine;
  }

  if (cosine > slerpLinearThreshold) {
    log.debug(`slerp inputs nearly parallel (dot ${cosine}), interpolating linearly`);
    return qnormalize(qsum(qscale(a, 1 - t), qscale(b, t)));
  }

  const theta = Math.acos(cosine);
  const sinTheta = Math.sin(theta);
  return qsum(
    qscale(a, Math.sin((1 - t) * theta) / sinTheta),
    qscale(b, Math.sin(t * theta) / sinTheta)
  );
}

/**
 * True when a and b describe the same rotation (q and -q included).
 */
export function rotationEquals(
  a: Quaternion,
  b: Quaternion,
  options?: Partial<ToleranceConfig>
): boolean {
  const { epsilon } = resolveTolerances(options);
  return Math.abs(Math.abs(qdot(qnormalize(a), qnormalize(b))) - 1) <= epsilon;
}
