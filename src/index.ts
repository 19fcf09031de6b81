/**
 * Spatial transforms: vectors, angles, 4x4 matrices and quaternions.
 *
 * @example
 * ```typescript
 * import { degrees, fromAxis, toMatrix, translate, multiply, toFloat32Array } from 'spatial-transforms';
 *
 * const spin = fromAxis(degrees(45), [0, 1, 0]);
 * const model = multiply(translate([0, 0, -5]), toMatrix(spin));
 * device.queue.writeBuffer(uniformBuffer, 0, toFloat32Array(model));
 * ```
 */

export type * from './core/types';
export * from './core/math';
export * from './core/utils';
