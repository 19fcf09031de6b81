import { describe, it, expect } from 'vitest';
import { degrees } from './angle';
import { lookAt, multiply, orthographicProjection, perspectiveProjection } from './transform';
import { extractFrustumPlanes, isAABBInFrustum, isPointInFrustum } from './frustum';
import { norm } from './vector';
import { expectVecClose } from './testHelpers';

// Camera at the origin facing -Z
const forwardView = lookAt([0, 0, 0], [0, 0, -1], [0, 1, 0]);

describe('extractFrustumPlanes', () => {
  const viewProjection = multiply(perspectiveProjection(degrees(90), 1, [1, 100]), forwardView);
  const planes = extractFrustumPlanes(viewProjection);

  it('normalizes every plane', () => {
    for (const [a, b, c] of Object.values(planes)) {
      expect(norm([a, b, c])).toBeCloseTo(1, 12);
    }
  });

  it('builds the side planes of a 90 degree frustum', () => {
    const h = Math.SQRT1_2;
    expectVecClose(planes.left, [h, 0, -h, 0]);
    expectVecClose(planes.right, [-h, 0, -h, 0]);
    expectVecClose(planes.bottom, [0, h, -h, 0]);
    expectVecClose(planes.top, [0, -h, -h, 0]);
  });

  it('keeps points in front of the camera', () => {
    expect(isPointInFrustum(planes, [0, 0, -10])).toBe(true);
    expect(isPointInFrustum(planes, [9, 0, -10])).toBe(true);
  });

  it('rejects points behind, too close, too far or off to the side', () => {
    expect(isPointInFrustum(planes, [0, 0, 10])).toBe(false);
    expect(isPointInFrustum(planes, [0, 0, -0.5])).toBe(false);
    expect(isPointInFrustum(planes, [0, 0, -200])).toBe(false);
    expect(isPointInFrustum(planes, [20, 0, -10])).toBe(false);
  });
});

describe('isAABBInFrustum', () => {
  const planes = extractFrustumPlanes(
    multiply(perspectiveProjection(degrees(90), 1, [1, 100]), forwardView)
  );

  it('accepts a box fully inside', () => {
    expect(isAABBInFrustum(planes, [-1, -1, -11], [1, 1, -9])).toBe(true);
  });

  it('rejects a box off to the side', () => {
    expect(isAABBInFrustum(planes, [50, -1, -11], [60, 1, -9])).toBe(false);
  });

  it('rejects a box behind the camera', () => {
    expect(isAABBInFrustum(planes, [-1, -1, 5], [1, 1, 6])).toBe(false);
  });

  it('accepts a box straddling a side plane', () => {
    expect(isAABBInFrustum(planes, [-20, -1, -11], [0, 1, -9])).toBe(true);
  });

  it('follows the camera', () => {
    const view = lookAt([0, 0, 0], [1, 0, 0], [0, 1, 0]);
    const turned = extractFrustumPlanes(multiply(perspectiveProjection(degrees(90), 1, [1, 100]), view));
    expect(isAABBInFrustum(turned, [9, -1, -1], [11, 1, 1])).toBe(true);
    expect(isAABBInFrustum(turned, [-1, -1, -11], [1, 1, -9])).toBe(false);
  });
});

describe('orthographic frustum', () => {
  const planes = extractFrustumPlanes(orthographicProjection([2, -2], [1, -1], [0.5, 10]));

  it('bounds depth by the near and far planes', () => {
    expect(isPointInFrustum(planes, [0, 0, -5])).toBe(true);
    expect(isPointInFrustum(planes, [0, 0, -0.25])).toBe(false);
    expect(isPointInFrustum(planes, [0, 0, -11])).toBe(false);
  });

  it('bounds the sides by the box', () => {
    expect(isPointInFrustum(planes, [1.5, 0.5, -5])).toBe(true);
    expect(isPointInFrustum(planes, [2.5, 0, -5])).toBe(false);
    expect(isPointInFrustum(planes, [0, -1.5, -5])).toBe(false);
  });
});
