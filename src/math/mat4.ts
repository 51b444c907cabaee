/**
 * 4x4 Matrix utilities for group transforms
 * Matrices are stored in column-major order (WebGL convention)
 *
 * Column-major layout:
 * [0]  [4]  [8]  [12]     m00 m10 m20 m30
 * [1]  [5]  [9]  [13]  =  m01 m11 m21 m31
 * [2]  [6]  [10] [14]     m02 m12 m22 m32
 * [3]  [7]  [11] [15]     m03 m13 m23 m33
 */

import type { Affine2 } from "./affine";

export type Mat4 = Float32Array;

/** Create an identity matrix */
export function create(): Mat4 {
  const m = new Float32Array(16);
  m[0] = 1;
  m[5] = 1;
  m[10] = 1;
  m[15] = 1;
  return m;
}

/** Set a matrix to identity */
export function identity(out: Mat4): Mat4 {
  out.fill(0);
  out[0] = 1;
  out[5] = 1;
  out[10] = 1;
  out[15] = 1;
  return out;
}

/** Copy a matrix */
export function copy(m: Mat4): Mat4 {
  return new Float32Array(m);
}

/** Multiply two matrices: out = a * b */
export function multiply(a: Mat4, b: Mat4): Mat4 {
  const out = new Float32Array(16);

  const a00 = a[0]!,
    a01 = a[1]!,
    a02 = a[2]!,
    a03 = a[3]!;
  const a10 = a[4]!,
    a11 = a[5]!,
    a12 = a[6]!,
    a13 = a[7]!;
  const a20 = a[8]!,
    a21 = a[9]!,
    a22 = a[10]!,
    a23 = a[11]!;
  const a30 = a[12]!,
    a31 = a[13]!,
    a32 = a[14]!,
    a33 = a[15]!;

  for (let col = 0; col < 4; col++) {
    const b0 = b[col * 4]!,
      b1 = b[col * 4 + 1]!,
      b2 = b[col * 4 + 2]!,
      b3 = b[col * 4 + 3]!;
    out[col * 4] = b0 * a00 + b1 * a10 + b2 * a20 + b3 * a30;
    out[col * 4 + 1] = b0 * a01 + b1 * a11 + b2 * a21 + b3 * a31;
    out[col * 4 + 2] = b0 * a02 + b1 * a12 + b2 * a22 + b3 * a32;
    out[col * 4 + 3] = b0 * a03 + b1 * a13 + b2 * a23 + b3 * a33;
  }

  return out;
}

/** Create a translation matrix */
export function translate(x: number, y: number, z: number): Mat4 {
  const out = create();
  out[12] = x;
  out[13] = y;
  out[14] = z;
  return out;
}

/** Create a scale matrix */
export function scale(sx: number, sy: number, sz: number): Mat4 {
  const out = new Float32Array(16);
  out[0] = sx;
  out[5] = sy;
  out[10] = sz;
  out[15] = 1;
  return out;
}

/** Create a Z-axis rotation matrix */
export function rotateZ(angle: number): Mat4 {
  const out = create();
  const c = Math.cos(angle);
  const s = Math.sin(angle);
  out[0] = c;
  out[1] = s;
  out[4] = -s;
  out[5] = c;
  return out;
}

/** Embed a 2D affine transform in the XY plane of a 4x4 matrix */
export function fromAffine(a: Affine2): Mat4 {
  const out = create();
  out[0] = a[0]!;
  out[1] = a[1]!;
  out[4] = a[2]!;
  out[5] = a[3]!;
  out[12] = a[4]!;
  out[13] = a[5]!;
  return out;
}

/** Transform a point by a Mat4 (assumes w=1) */
export function transformPoint(
  m: Mat4,
  x: number,
  y: number,
  z: number
): [number, number, number] {
  const w = m[3]! * x + m[7]! * y + m[11]! * z + m[15]!;
  const invW = w ? 1 / w : 1;

  return [
    (m[0]! * x + m[4]! * y + m[8]! * z + m[12]!) * invW,
    (m[1]! * x + m[5]! * y + m[9]! * z + m[13]!) * invW,
    (m[2]! * x + m[6]! * y + m[10]! * z + m[14]!) * invW,
  ];
}
