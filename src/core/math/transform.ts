/**
 * 4x4 transformation matrices.
 *
 * Projections produce OpenGL clip space (z in [-1, 1]).
 * Matrices are stored as rows and applied to column vectors (p' = M * p),
 * so translation lives in the last column. `toFlatArray` transposes into
 * the column-major layout expected by uniform uploads.
 */

import type { FlatMat4, Mat4, Range, Vec3, Vec4 } from '../types';
import { type Angle, toRadians } from './angle';
import { type ToleranceConfig, resolveTolerances } from './tolerances';
import { add, cross, dot, negate, norm, normalize, subtract } from './vector';

// ============ Construction helpers ============

function fromEntries(entry: (row: number, column: number) => number): Mat4 {
  const row = (i: number): Vec4 => [entry(i, 0), entry(i, 1), entry(i, 2), entry(i, 3)];
  return [row(0), row(1), row(2), row(3)];
}

// ============ Affine ============

export const identity = (): Mat4 => [
  [1, 0, 0, 0],
  [0, 1, 0, 0],
  [0, 0, 1, 0],
  [0, 0, 0, 1],
];

export const translate = ([x, y, z]: Vec3): Mat4 => [
  [1, 0, 0, x],
  [0, 1, 0, y],
  [0, 0, 1, z],
  [0, 0, 0, 1],
];

export const scale = ([x, y, z]: Vec3): Mat4 => [
  [x, 0, 0, 0],
  [0, y, 0, 0],
  [0, 0, z, 0],
  [0, 0, 0, 1],
];

export const scaleUniform = (s: number): Mat4 => scale([s, s, s]);

/**
 * Rotation about +X. Positive angles turn +Y towards +Z.
 */
export function rotateX(angle: Angle): Mat4 {
  const theta = toRadians(angle);
  const c = Math.cos(theta);
  const s = Math.sin(theta);
  return [
    [1, 0, 0, 0],
    [0, c, -s, 0],
    [0, s, c, 0],
    [0, 0, 0, 1],
  ];
}

/**
 * Rotation about +Y. Positive angles turn +Z towards +X.
 */
export function rotateY(angle: Angle): Mat4 {
  const theta = toRadians(angle);
  const c = Math.cos(theta);
  const s = Math.sin(theta);
  return [
    [c, 0, s, 0],
    [0, 1, 0, 0],
    [-s, 0, c, 0],
    [0, 0, 0, 1],
  ];
}

/**
 * Rotation about +Z. Positive angles turn +X towards +Y.
 */
export function rotateZ(angle: Angle): Mat4 {
  const theta = toRadians(angle);
  const c = Math.cos(theta);
  const s = Math.sin(theta);
  return [
    [c, -s, 0, 0],
    [s, c, 0, 0],
    [0, 0, 1, 0],
    [0, 0, 0, 1],
  ];
}

/**
 * Per-axis rotation composed as Rx(x) * Ry(y) * Rz(z).
 *
 * Applied to a column vector the Z rotation happens first, then Y, then X.
 * This is NOT the [yaw, pitch, roll] convention of the quaternion Euler
 * conversions; see `fromEulerAngles` in ./quaternion.
 */
export function rotate([x, y, z]: readonly [Angle, Angle, Angle]): Mat4 {
  return compose(rotateX(x), rotateY(y), rotateZ(z));
}

// ============ Algebra ============

/**
 * Matrix product a * b (b is applied first).
 */
export function multiply(a: Mat4, b: Mat4): Mat4 {
  return fromEntries((i, j) =>
    a[i][0] * b[0][j] + a[i][1] * b[1][j] + a[i][2] * b[2][j] + a[i][3] * b[3][j]
  );
}

/**
 * Left-to-right product: compose(a, b, c) = a * b * c.
 */
export function compose(...matrices: Mat4[]): Mat4 {
  return matrices.reduce(multiply, identity());
}

export function transpose(m: Mat4): Mat4 {
  return fromEntries((i, j) => m[j][i]);
}

/**
 * M * v for a homogeneous column vector.
 */
export function transformVector(m: Mat4, v: Vec4): Vec4 {
  return [dot(m[0], v), dot(m[1], v), dot(m[2], v), dot(m[3], v)];
}

/**
 * Transform a point (w = 1), dividing by the resulting w when it is not 1.
 */
export function transformPoint(m: Mat4, [x, y, z]: Vec3): Vec3 {
  const [tx, ty, tz, w] = transformVector(m, [x, y, z, 1]);
  if (w === 1) return [tx, ty, tz];
  if (w === 0) {
    throw new Error('[Transform] Point maps to infinity (w = 0)');
  }
  return [tx / w, ty / w, tz / w];
}

// ============ Projection ============

/**
 * Perspective frustum (glFrustum). Clip-space z is in [-1, 1].
 *
 * @param horizontal - [right, left] at the near plane
 * @param vertical - [top, bottom] at the near plane
 * @param depth - [near, far], both positive distances
 */
export function frustum(
  [right, left]: Range,
  [top, bottom]: Range,
  [near, far]: Range
): Mat4 {
  if (right === left || top === bottom || near === far) {
    throw new Error('[Transform] frustum: degenerate bounds');
  }
  if (!(near > 0)) {
    throw new Error(`[Transform] frustum: near plane must be positive (got ${near})`);
  }
  const rl = right - left;
  const tb = top - bottom;
  const fn = far - near;
  return [
    [(2 * near) / rl, 0, (right + left) / rl, 0],
    [0, (2 * near) / tb, (top + bottom) / tb, 0],
    [0, 0, -(far + near) / fn, (-2 * far * near) / fn],
    [0, 0, -1, 0],
  ];
}

/**
 * Orthographic projection (glOrtho). Clip-space z is in [-1, 1].
 *
 * @param horizontal - [right, left]
 * @param vertical - [top, bottom]
 * @param depth - [near, far]
 */
export function orthographicProjection(
  [right, left]: Range,
  [top, bottom]: Range,
  [near, far]: Range
): Mat4 {
  if (right === left || top === bottom || near === far) {
    throw new Error('[Transform] orthographicProjection: degenerate bounds');
  }
  const rl = right - left;
  const tb = top - bottom;
  const fn = far - near;
  return [
    [2 / rl, 0, 0, -(right + left) / rl],
    [0, 2 / tb, 0, -(top + bottom) / tb],
    [0, 0, -2 / fn, -(far + near) / fn],
    [0, 0, 0, 1],
  ];
}

/**
 * Symmetric perspective projection from a vertical field of view.
 */
export function perspectiveProjection(fov: Angle, aspect: number, depth: Range): Mat4 {
  const [near] = depth;
  if (!(near > 0)) {
    throw new Error(`[Transform] perspectiveProjection: near plane must be positive (got ${near})`);
  }
  const top = near * Math.tan(toRadians(fov) / 2);
  if (!(top > 0) || !Number.isFinite(top)) {
    throw new Error(`[Transform] perspectiveProjection: invalid field of view ${toRadians(fov)} rad`);
  }
  const right = top * aspect;
  return frustum([right, -right], [top, -top], depth);
}

// ============ View ============

function viewForward(
  op: string,
  eye: Vec3,
  center: Vec3,
  up: Vec3,
  epsilon: number
): Vec3 {
  const toEye = subtract(eye, center);
  if (norm(toEye) <= epsilon) {
    throw new Error(`[Transform] ${op}: eye and center coincide`);
  }
  const forward = normalize(toEye);
  if (norm(cross(forward, up)) <= epsilon * norm(up)) {
    throw new Error(`[Transform] ${op}: up is parallel to the view direction`);
  }
  return forward;
}

function viewFromRows([r0, r1, r2]: readonly [Vec3, Vec3, Vec3], eye: Vec3): Mat4 {
  const row = (r: Vec3): Vec4 => [r[0], r[1], r[2], -dot(r, eye)];
  return [row(r0), row(r1), row(r2), [0, 0, 0, 1]];
}

/**
 * Look-at view matrix with rows [side; trueUp; -forward], where
 * forward = normalize(eye - center), side = normalize(forward x up) and
 * trueUp = side x forward. The eye maps to the origin and `center` to
 * (0, 0, |eye - center|).
 */
export function viewMatrix(
  eye: Vec3,
  center: Vec3,
  up: Vec3,
  options?: Partial<ToleranceConfig>
): Mat4 {
  const { epsilon } = resolveTolerances(options);
  const forward = viewForward('viewMatrix', eye, center, up, epsilon);
  const side = normalize(cross(forward, up));
  const trueUp = cross(side, forward);
  return viewFromRows([side, trueUp, negate(forward)], eye);
}

/**
 * Same layout as gl-matrix `mat4.lookAt`: the camera looks down its own
 * -Z axis, which is what the OpenGL projections here expect. Equals
 * `viewMatrix` rotated by π about Y.
 */
export function lookAt(
  eye: Vec3,
  center: Vec3,
  up: Vec3,
  options?: Partial<ToleranceConfig>
): Mat4 {
  const { epsilon } = resolveTolerances(options);
  const forward = viewForward('lookAt', eye, center, up, epsilon);
  const side = normalize(cross(up, forward));
  const trueUp = cross(forward, side);
  return viewFromRows([side, trueUp, forward], eye);
}

/**
 * The default view: eye at (0, 0, -1) facing the origin.
 */
export const defaultViewMatrix = (): Mat4 => viewMatrix([0, 0, -1], [0, 0, 0], [0, 1, 0]);

/**
 * Camera at the origin aimed along `direction`.
 */
export function viewMatrixFromDirection(direction: Vec3, up: Vec3 = [0, 1, 0]): Mat4 {
  const origin: Vec3 = [0, 0, 0];
  return viewMatrix(origin, targetFromDirection(origin, direction), up);
}

/**
 * Point one unit from `position` along `direction` (normalized).
 */
export function targetFromDirection(position: Vec3, direction: Vec3): Vec3 {
  return add(position, normalize(direction));
}

// ============ Export ============

/**
 * Transpose and flatten: 16 scalars in column-major order.
 */
export function toFlatArray(m: Mat4): FlatMat4 {
  const [c0, c1, c2, c3] = transpose(m);
  return [...c0, ...c1, ...c2, ...c3];
}

/**
 * Inverse of `toFlatArray`.
 */
export function fromFlatArray(flat: ArrayLike<number>): Mat4 {
  if (flat.length !== 16) {
    throw new Error(`[Transform] Expected 16 values, got ${flat.length}`);
  }
  return fromEntries((i, j) => flat[j * 4 + i]);
}

