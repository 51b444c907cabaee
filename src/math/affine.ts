/**
 * 2D affine transform utilities for sprite placement
 *
 * An affine transform is a 2x2 linear part plus a translation, stored as six
 * floats in column-major order:
 *
 * [0] [2] [4]     m00 m10 tx
 * [1] [3] [5]  =  m01 m11 ty
 *                 0   0   1
 *
 * Points are transformed as x' = x*m00 + y*m10 + tx, y' = x*m01 + y*m11 + ty.
 */

export type Affine2 = Float32Array;

/** Create an identity transform */
export function identity(): Affine2 {
  return new Float32Array([1, 0, 0, 1, 0, 0]);
}

/** Create a transform from its six elements */
export function fromValues(
  m00: number,
  m01: number,
  m10: number,
  m11: number,
  tx: number,
  ty: number
): Affine2 {
  return new Float32Array([m00, m01, m10, m11, tx, ty]);
}

/** Create a translation transform */
export function translation(tx: number, ty: number): Affine2 {
  return new Float32Array([1, 0, 0, 1, tx, ty]);
}

/** Create a scaling transform */
export function scaling(sx: number, sy: number): Affine2 {
  return new Float32Array([sx, 0, 0, sy, 0, 0]);
}

/** Create a rotation transform (radians, counter-clockwise in a y-up frame) */
export function rotation(theta: number): Affine2 {
  const c = Math.cos(theta);
  const s = Math.sin(theta);
  return new Float32Array([c, s, -s, c, 0, 0]);
}

/** Determinant of the linear part */
export function determinant(m: Affine2): number {
  return m[0]! * m[3]! - m[1]! * m[2]!;
}

/** Invert a transform, returns null if it is degenerate */
export function invert(m: Affine2): Affine2 | null {
  const det = determinant(m);
  if (det === 0) return null;

  const m00 = m[0]!,
    m01 = m[1]!,
    m10 = m[2]!,
    m11 = m[3]!,
    tx = m[4]!,
    ty = m[5]!;

  return new Float32Array([
    m11 / det,
    -m01 / det,
    -m10 / det,
    m00 / det,
    (m10 * ty - m11 * tx) / det,
    (m01 * tx - m00 * ty) / det,
  ]);
}

/**
 * Compose two transforms: the result applies `first`, then `second`.
 */
export function compose(first: Affine2, second: Affine2): Affine2 {
  const a00 = first[0]!,
    a01 = first[1]!,
    a10 = first[2]!,
    a11 = first[3]!,
    atx = first[4]!,
    aty = first[5]!;
  const b00 = second[0]!,
    b01 = second[1]!,
    b10 = second[2]!,
    b11 = second[3]!,
    btx = second[4]!,
    bty = second[5]!;

  return new Float32Array([
    a00 * b00 + a01 * b10,
    a00 * b01 + a01 * b11,
    a10 * b00 + a11 * b10,
    a10 * b01 + a11 * b11,
    atx * b00 + aty * b10 + btx,
    atx * b01 + aty * b11 + bty,
  ]);
}

/** Transform a point */
export function transformPoint(
  m: Affine2,
  x: number,
  y: number
): [number, number] {
  return [x * m[0]! + y * m[2]! + m[4]!, x * m[1]! + y * m[3]! + m[5]!];
}
