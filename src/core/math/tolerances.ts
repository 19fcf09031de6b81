/**
 * Numerical tolerances shared by the math modules.
 */

import { glMatrix } from 'gl-matrix';

/**
 * Tolerances used by operations that have to decide whether a value is
 * "close enough" to a boundary.
 */
export interface ToleranceConfig {
  /** Absolute tolerance for unit-length and equality checks */
  epsilon: number;
  /** |w*x - y*z| above this classifies a rotation as gimbal locked (max 0.5) */
  gimbalThreshold: number;
  /** slerp switches to normalized linear interpolation above this |dot| */
  slerpLinearThreshold: number;
}

/**
 * Default tolerances. Frozen; pass overrides per call instead.
 */
export const DEFAULT_TOLERANCES: Readonly<ToleranceConfig> = Object.freeze({
  epsilon: glMatrix.EPSILON,  // 1e-6
  gimbalThreshold: 0.499,     // ~87.4 degrees of pitch
  slerpLinearThreshold: 0.9995,
});

/**
 * Merge caller overrides over the defaults.
 */
export function resolveTolerances(options: Partial<ToleranceConfig> = {}): ToleranceConfig {
  return { ...DEFAULT_TOLERANCES, ...options };
}
