/**
 * Fixed-size vector and matrix shapes. Every value is a readonly tuple,
 * so a 3-vector passed where a 4-vector is expected fails to compile.
 */

/** [x, y] */
export type Vec2 = readonly [number, number];

/**
 * [x, y, z]: a point, a direction or a per-axis scale factor
 */
export type Vec3 = readonly [number, number, number];

/**
 * [x, y, z, w]: homogeneous point (w = 1), direction (w = 0) or a matrix row
 */
export type Vec4 = readonly [number, number, number, number];

/**
 * Any fixed-size vector
 */
export type Vector = Vec2 | Vec3 | Vec4;

/**
 * 4x4 matrix as four rows. Row-major in the mathematical sense:
 * m[row][column], applied to column vectors (p' = M * p).
 */
export type Mat4 = readonly [Vec4, Vec4, Vec4, Vec4];

/**
 * 16 scalars in column-major order, the layout uniform uploads expect
 */
export type FlatMat4 = readonly [
  number, number, number, number,
  number, number, number, number,
  number, number, number, number,
  number, number, number, number,
];

/**
 * Closed range as a [lower, upper] pair, e.g. [near, far]
 */
export type Range = readonly [number, number];
