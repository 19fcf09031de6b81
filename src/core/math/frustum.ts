/**
 * View-frustum planes and containment tests for culling.
 */

import type { Mat4, Vec3, Vec4 } from '../types';
import { add, norm, scale, subtract } from './vector';

/**
 * Plane [a, b, c, d]; a point is inside when a*x + b*y + c*z + d >= 0.
 */
export type Plane = Vec4;

export interface FrustumPlanes {
  left: Plane;
  right: Plane;
  bottom: Plane;
  top: Plane;
  near: Plane;
  far: Plane;
}

function normalizePlane(plane: Vec4): Plane {
  const length = norm([plane[0], plane[1], plane[2]]);
  return length > 0 ? scale(plane, 1 / length) : plane;
}

/**
 * Extract the six planes of a view-projection matrix (OpenGL clip space,
 * z in [-1, 1]).
 */
export function extractFrustumPlanes(viewProjection: Mat4): FrustumPlanes {
  const [row0, row1, row2, row3] = viewProjection;
  return {
    left: normalizePlane(add(row3, row0)),
    right: normalizePlane(subtract(row3, row0)),
    bottom: normalizePlane(add(row3, row1)),
    top: normalizePlane(subtract(row3, row1)),
    near: normalizePlane(add(row3, row2)),
    far: normalizePlane(subtract(row3, row2)),
  };
}

const planeList = (planes: FrustumPlanes): Plane[] => [
  planes.left, planes.right, planes.bottom, planes.top, planes.near, planes.far,
];

export function isPointInFrustum(planes: FrustumPlanes, [x, y, z]: Vec3): boolean {
  return planeList(planes).every(([a, b, c, d]) => a * x + b * y + c * z + d >= 0);
}

/**
 * Test if an axis-aligned box is at least partially inside the frustum.
 * Conservative: boxes near a frustum corner may report true while outside.
 */
export function isAABBInFrustum(planes: FrustumPlanes, min: Vec3, max: Vec3): boolean {
  for (const [a, b, c, d] of planeList(planes)) {
    // Corner of the box furthest along the plane normal
    const px = a >= 0 ? max[0] : min[0];
    const py = b >= 0 ? max[1] : min[1];
    const pz = c >= 0 ? max[2] : min[2];

    if (a * px + b * py + c * pz + d < 0) {
      return false;
    }
  }
  return true;
}
