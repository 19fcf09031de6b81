/**
 * Math barrel exports
 */

export * from './angle';
export * from './interval';
export * from './tolerances';
export * from './vector';
export * from './transform';
export * from './quaternion';
export * from './algebra';
export * from './frustum';

// `scale` exists for both vectors and matrices
export { scale } from './transform';
export { scale as scaleVector } from './vector';
