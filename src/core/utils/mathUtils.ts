/**
 * Conversions at the rendering boundary.
 *
 * gl-matrix and the WebGL/WebGPU uniform APIs store matrices column-major
 * and quaternions as [x, y, z, w].
 */

import { mat4, quat, type ReadonlyMat4, type ReadonlyQuat } from 'gl-matrix';
import type { Mat4 } from '../types';
import { type Quaternion, quaternion } from '../math/quaternion';
import { fromFlatArray, toFlatArray } from '../math/transform';

/**
 * Column-major Float32Array, ready for a uniform buffer write.
 */
export const toFloat32Array = (m: Mat4): Float32Array => new Float32Array(toFlatArray(m));

/**
 * Convert to a gl-matrix mat4 (single precision).
 */
export const toGlMat4 = (m: Mat4): mat4 => mat4.fromValues(...toFlatArray(m));

/**
 * Convert a gl-matrix mat4 (or any column-major 16-element array).
 */
export const fromGlMat4 = (m: ReadonlyMat4): Mat4 => fromFlatArray(m);

export const toGlQuat = ({ scalar, vector: [x, y, z] }: Quaternion): quat =>
  quat.fromValues(x, y, z, scalar);

export const fromGlQuat = (q: ReadonlyQuat): Quaternion => quaternion(q[3], [q[0], q[1], q[2]]);
