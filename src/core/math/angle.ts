/**
 * Unit-tagged angles.
 *
 * Matrix and quaternion constructors accept an `Angle` and convert it with
 * `toRadians` before any trigonometry, so a degree value never reaches
 * Math.sin / Math.cos directly.
 */

export type Angle =
  | { readonly unit: 'radians'; readonly value: number }
  | { readonly unit: 'degrees'; readonly value: number };

const DEG_TO_RAD = Math.PI / 180;

export const radians = (value: number): Angle => ({ unit: 'radians', value });

export const degrees = (value: number): Angle => ({ unit: 'degrees', value });

/**
 * The single unit conversion used by the math.
 */
export function toRadians(angle: Angle): number {
  switch (angle.unit) {
    case 'radians':
      return angle.value;
    case 'degrees':
      return angle.value * DEG_TO_RAD;
  }
}

/**
 * Degree value of an angle, for display and serialization.
 */
export function toDegrees(angle: Angle): number {
  switch (angle.unit) {
    case 'radians':
      return angle.value / DEG_TO_RAD;
    case 'degrees':
      return angle.value;
  }
}

const TWO_PI = Math.PI * 2;

/**
 * Wrap a radian value into (-π, π].
 */
export function wrapRadians(theta: number): number {
  const wrapped = theta - TWO_PI * Math.floor((theta + Math.PI) / TWO_PI);
  return wrapped === -Math.PI ? Math.PI : wrapped;
}

/**
 * Compare two angles in radians, regardless of their units.
 * No wrap-around: 0 and 2π are different angles here.
 */
export function angleEquals(a: Angle, b: Angle, epsilon: number = 1e-9): boolean {
  return Math.abs(toRadians(a) - toRadians(b)) <= epsilon;
}
