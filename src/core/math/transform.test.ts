import { describe, it, expect } from 'vitest';
import { mat4 } from 'gl-matrix';
import type { Mat4 } from '../types';
import { degrees, radians } from './angle';
import { cross, dot } from './vector';
import {
  compose,
  defaultViewMatrix,
  fromFlatArray,
  identity,
  lookAt,
  multiply,
  orthographicProjection,
  perspectiveProjection,
  rotate,
  rotateX,
  rotateY,
  rotateZ,
  scale,
  scaleUniform,
  targetFromDirection,
  toFlatArray,
  transformPoint,
  transformVector,
  translate,
  transpose,
  viewMatrix,
  viewMatrixFromDirection,
} from './transform';
import { expectMat4Close, expectVecClose } from './testHelpers';

describe('toFlatArray', () => {
  it('flattens the identity', () => {
    expect(toFlatArray(identity())).toEqual([1, 0, 0, 0, 0, 1, 0, 0, 0, 0, 1, 0, 0, 0, 0, 1]);
  });

  it('emits column-major order with translation in elements 12-14', () => {
    expect(toFlatArray(translate([1, 2, 3]))).toEqual([
      1, 0, 0, 0,
      0, 1, 0, 0,
      0, 0, 1, 0,
      1, 2, 3, 1,
    ]);
  });

  it('matches the gl-matrix layout', () => {
    const expected = mat4.fromTranslation(mat4.create(), [1, 2, 3]);
    expect(toFlatArray(translate([1, 2, 3]))).toEqual(Array.from(expected));
  });

  it('round-trips through fromFlatArray', () => {
    const m: Mat4 = [
      [1, 2, 3, 4],
      [5, 6, 7, 8],
      [9, 10, 11, 12],
      [13, 14, 15, 16],
    ];
    expect(toFlatArray(m)).toEqual([1, 5, 9, 13, 2, 6, 10, 14, 3, 7, 11, 15, 4, 8, 12, 16]);
    expect(fromFlatArray(toFlatArray(m))).toEqual(m);
  });

  it('rejects arrays of the wrong length', () => {
    expect(() => fromFlatArray([1, 2, 3])).toThrow('[Transform] Expected 16 values, got 3');
  });
});

describe('affine constructors', () => {
  it('translates points', () => {
    expect(transformPoint(translate([1, 2, 3]), [1, 1, 1])).toEqual([2, 3, 4]);
  });

  it('scales points per axis and uniformly', () => {
    expect(transformPoint(scale([2, 3, 4]), [1, 1, 1])).toEqual([2, 3, 4]);
    expect(transformPoint(scaleUniform(2), [1, -1, 3])).toEqual([2, -2, 6]);
  });

  it('leaves directions (w = 0) untranslated', () => {
    expect(transformVector(translate([5, 5, 5]), [1, 0, 0, 0])).toEqual([1, 0, 0, 0]);
  });
});

describe('rotations', () => {
  it('rotates +Y onto +Z about X', () => {
    expectVecClose(transformPoint(rotateX(degrees(90)), [0, 1, 0]), [0, 0, 1]);
  });

  it('rotates +Z onto +X about Y', () => {
    expectVecClose(transformPoint(rotateY(degrees(90)), [0, 0, 1]), [1, 0, 0]);
  });

  it('rotates +X onto +Y about Z', () => {
    expectVecClose(transformPoint(rotateZ(degrees(90)), [1, 0, 0]), [0, 1, 0]);
  });

  it('treats degrees and radians alike', () => {
    expectMat4Close(rotateZ(degrees(30)), rotateZ(radians(Math.PI / 6)));
  });

  it('composes Euler rotations as Rx * Ry * Rz', () => {
    const angles = [degrees(20), degrees(-35), degrees(50)] as const;
    expectMat4Close(
      rotate(angles),
      multiply(rotateX(angles[0]), multiply(rotateY(angles[1]), rotateZ(angles[2])))
    );
  });

  it('applies the Z rotation first and the X rotation last', () => {
    // Ry(90) takes +Z to +X, which Rx then leaves alone
    const m = rotate([degrees(90), degrees(90), degrees(0)]);
    expectVecClose(transformPoint(m, [0, 0, 1]), [1, 0, 0]);
  });

  it('produces orthonormal matrices', () => {
    const m = rotate([degrees(10), degrees(20), degrees(30)]);
    expectMat4Close(multiply(m, transpose(m)), identity());
  });
});

describe('multiply', () => {
  it('applies the right operand first', () => {
    expect(transformPoint(compose(translate([1, 0, 0]), scaleUniform(2)), [1, 0, 0])).toEqual([3, 0, 0]);
    expect(transformPoint(compose(scaleUniform(2), translate([1, 0, 0])), [1, 0, 0])).toEqual([4, 0, 0]);
  });

  it('has the identity as neutral element', () => {
    const m = rotateX(degrees(40));
    expect(multiply(identity(), m)).toEqual(m);
    expect(compose()).toEqual(identity());
  });
});

describe('transformPoint', () => {
  it('divides by w', () => {
    const m: Mat4 = [
      [1, 0, 0, 0],
      [0, 1, 0, 0],
      [0, 0, 1, 0],
      [0, 0, 0, 2],
    ];
    expect(transformPoint(m, [2, 4, 6])).toEqual([1, 2, 3]);
  });

  it('throws when the point maps to infinity', () => {
    const m: Mat4 = [
      [1, 0, 0, 0],
      [0, 1, 0, 0],
      [0, 0, 1, 0],
      [0, 0, 0, 0],
    ];
    expect(() => transformPoint(m, [1, 1, 1])).toThrow('[Transform] Point maps to infinity');
  });
});

describe('orthographicProjection', () => {
  const ortho = orthographicProjection([2, -2], [1, -1], [0.1, 100]);

  it('matches gl-matrix ortho', () => {
    const expected = mat4.ortho(mat4.create(), -2, 2, -1, 1, 0.1, 100);
    expectVecClose(toFlatArray(ortho), expected, 5);
  });

  it('maps the box corners to the clip cube', () => {
    expectVecClose(transformPoint(ortho, [2, 1, -0.1]), [1, 1, -1]);
    expectVecClose(transformPoint(ortho, [-2, -1, -100]), [-1, -1, 1]);
  });

  it('rejects degenerate bounds', () => {
    expect(() => orthographicProjection([1, 1], [1, -1], [0, 1])).toThrow(
      '[Transform] orthographicProjection: degenerate bounds'
    );
  });
});

describe('perspectiveProjection', () => {
  const near = 0.1;
  const far = 100;
  const projection = perspectiveProjection(radians(Math.PI / 3), 16 / 9, [near, far]);

  it('matches gl-matrix perspective', () => {
    const expected = mat4.perspective(mat4.create(), Math.PI / 3, 16 / 9, near, far);
    expectVecClose(toFlatArray(projection), expected, 5);
  });

  it('maps the near and far planes to z = -1 and z = 1', () => {
    expect(transformPoint(projection, [0, 0, -near])[2]).toBeCloseTo(-1, 10);
    expect(transformPoint(projection, [0, 0, -far])[2]).toBeCloseTo(1, 8);
  });

  it('maps the top edge of the field of view to y = 1', () => {
    const depth = 10;
    const top = depth * Math.tan(Math.PI / 6);
    expect(transformPoint(projection, [0, top, -depth])[1]).toBeCloseTo(1, 10);
  });

  it('rejects a non-positive near plane', () => {
    expect(() => perspectiveProjection(degrees(60), 1, [0, 10])).toThrow(
      '[Transform] perspectiveProjection: near plane must be positive (got 0)'
    );
  });

  it('rejects near == far', () => {
    expect(() => perspectiveProjection(degrees(60), 1, [1, 1])).toThrow(
      '[Transform] frustum: degenerate bounds'
    );
  });

  it('rejects a zero field of view', () => {
    expect(() => perspectiveProjection(degrees(0), 1, [1, 10])).toThrow(
      '[Transform] perspectiveProjection: invalid field of view'
    );
  });
});

describe('viewMatrix', () => {
  it('maps the eye to the origin and the center to +Z at the eye distance', () => {
    const view = viewMatrix([0, 0, -1], [0, 0, 0], [0, 1, 0]);
    expectVecClose(transformPoint(view, [0, 0, -1]), [0, 0, 0]);
    expectVecClose(transformPoint(view, [0, 0, 0]), [0, 0, 1]);
    expectVecClose(view[0], [1, 0, 0, 0]);
  });

  it('translates points when camera moves', () => {
    const view = viewMatrix([0, 0, 5], [0, 0, 0], [0, 1, 0]);
    expectVecClose(transformPoint(view, [0, 0, 0]), [0, 0, 5]);
  });

  it('handles rotated camera', () => {
    // Camera at origin facing +X
    const view = viewMatrix([0, 0, 0], [1, 0, 0], [0, 1, 0]);
    expectVecClose(transformPoint(view, [5, 0, 0]), [0, 0, 5]);
    expectVecClose(transformPoint(view, [0, 2, 0]), [0, 2, 0]);
  });

  it('is a proper rotation', () => {
    const view = viewMatrix([3, -2, 7], [0, 1, 0], [0, 1, 0]);
    const [r0, r1, r2] = view;
    const row = (r: readonly number[]) => [r[0], r[1], r[2]] as const;
    expect(dot(row(r0), row(r0))).toBeCloseTo(1, 12);
    expect(dot(row(r1), row(r1))).toBeCloseTo(1, 12);
    expect(dot(row(r0), row(r1))).toBeCloseTo(0, 12);
    expect(dot(row(r1), row(r2))).toBeCloseTo(0, 12);
    expect(dot(row(r0), cross(row(r1), row(r2)))).toBeCloseTo(1, 12);
  });

  it('differs from lookAt by a half turn about Y', () => {
    const eye = [3, 4, 5] as const;
    const center = [-1, 0.5, 2] as const;
    const up = [0, 1, 0] as const;
    expectMat4Close(viewMatrix(eye, center, up), multiply(scale([-1, 1, -1]), lookAt(eye, center, up)));
  });

  it('throws when eye and center coincide', () => {
    expect(() => viewMatrix([1, 1, 1], [1, 1, 1], [0, 1, 0])).toThrow(
      '[Transform] viewMatrix: eye and center coincide'
    );
  });

  it('throws when up is parallel to the view direction', () => {
    expect(() => viewMatrix([0, 5, 0], [0, 0, 0], [0, 1, 0])).toThrow(
      '[Transform] viewMatrix: up is parallel to the view direction'
    );
  });
});

describe('lookAt', () => {
  it('matches gl-matrix lookAt', () => {
    const eye = [3, 4, 5] as const;
    const center = [-1, 0.5, 2] as const;
    const up = [0, 1, 0] as const;
    const expected = mat4.lookAt(mat4.create(), eye, center, up);
    expectVecClose(toFlatArray(lookAt(eye, center, up)), expected, 5);
  });

  it('puts the center on -Z', () => {
    const view = lookAt([0, 0, 5], [0, 0, 0], [0, 1, 0]);
    expectVecClose(transformPoint(view, [0, 0, 0]), [0, 0, -5]);
  });

  it('is the identity for a camera at the origin facing -Z', () => {
    expectMat4Close(lookAt([0, 0, 0], [0, 0, -1], [0, 1, 0]), identity());
  });

  it('names itself in errors', () => {
    expect(() => lookAt([1, 1, 1], [1, 1, 1], [0, 1, 0])).toThrow(
      '[Transform] lookAt: eye and center coincide'
    );
  });
});

describe('view wrappers', () => {
  it('default view sits one unit behind the origin', () => {
    expectMat4Close(defaultViewMatrix(), translate([0, 0, 1]));
    expectMat4Close(defaultViewMatrix(), viewMatrix([0, 0, -1], [0, 0, 0], [0, 1, 0]));
  });

  it('aims the camera along a direction from the origin', () => {
    expectVecClose(transformPoint(viewMatrixFromDirection([0, 0, -10]), [0, 0, -4]), [0, 0, 4]);
    expectVecClose(transformPoint(viewMatrixFromDirection([1, 0, 0]), [3, 0, 0]), [0, 0, 3]);
  });

  it('adds normalized direction to position', () => {
    expect(targetFromDirection([5, 3, 2], [1, 0, 0])).toEqual([6, 3, 2]);
    expectVecClose(targetFromDirection([0, 0, 0], [0, 0, -10]), [0, 0, -1]);
  });
});
