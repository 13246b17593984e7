/**
 * Topology Helpers
 *
 * Bounds, vertex normals and tangents computed from final buffers.
 */

import type { Vec3 } from '../../../interfaces';
import type { Bounds } from '../types';
import { COMPONENTS } from '../../../constants/mesh';

/**
 * Axis-aligned bounds of the first `vertexCount` positions
 */
export function computeBounds(positions: Float32Array, vertexCount: number): Bounds {
  if (vertexCount === 0) {
    return { min: [0, 0, 0], max: [0, 0, 0], center: [0, 0, 0], extents: [0, 0, 0] };
  }

  const min: Vec3 = [Infinity, Infinity, Infinity];
  const max: Vec3 = [-Infinity, -Infinity, -Infinity];
  for (let v = 0; v < vertexCount; v++) {
    for (let k = 0; k < 3; k++) {
      const value = positions[v * COMPONENTS.POSITION + k];
      if (value < min[k]) min[k] = value;
      if (value > max[k]) max[k] = value;
    }
  }

  const center: Vec3 = [(min[0] + max[0]) / 2, (min[1] + max[1]) / 2, (min[2] + max[2]) / 2];
  const extents: Vec3 = [(max[0] - min[0]) / 2, (max[1] - min[1]) / 2, (max[2] - min[2]) / 2];
  return { min, max, center, extents };
}

function normalizeInPlace(values: Float32Array, offset: number): void {
  const x = values[offset];
  const y = values[offset + 1];
  const z = values[offset + 2];
  const length = Math.sqrt(x * x + y * y + z * z);
  if (length > 0) {
    values[offset] = x / length;
    values[offset + 1] = y / length;
    values[offset + 2] = z / length;
  }
}

/**
 * Area-weighted vertex normals: each triangle (a, b, c) contributes
 * (b - a) x (c - a) to its three vertices.
 */
export function recalculateNormals(positions: Float32Array, indices: Uint32Array, vertexCount: number): Float32Array {
  const normals = new Float32Array(vertexCount * COMPONENTS.NORMAL);

  for (let t = 0; t + 2 < indices.length; t += COMPONENTS.TRIANGLE) {
    const a = indices[t] * 3;
    const b = indices[t + 1] * 3;
    const c = indices[t + 2] * 3;

    const e1x = positions[b] - positions[a];
    const e1y = positions[b + 1] - positions[a + 1];
    const e1z = positions[b + 2] - positions[a + 2];
    const e2x = positions[c] - positions[a];
    const e2y = positions[c + 1] - positions[a + 1];
    const e2z = positions[c + 2] - positions[a + 2];

    const nx = e1y * e2z - e1z * e2y;
    const ny = e1z * e2x - e1x * e2z;
    const nz = e1x * e2y - e1y * e2x;

    for (const v of [a, b, c]) {
      normals[v] += nx;
      normals[v + 1] += ny;
      normals[v + 2] += nz;
    }
  }

  for (let v = 0; v < vertexCount; v++) {
    normalizeInPlace(normals, v * COMPONENTS.NORMAL);
  }
  return normals;
}

/**
 * Per-vertex tangents (xyzw) from UV gradients, Gram-Schmidt
 * orthogonalized against the normal. w carries the bitangent sign.
 * Vertices without a usable UV gradient get (1, 0, 0, 1).
 */
export function recalculateTangents(
  positions: Float32Array,
  normals: Float32Array,
  uvs: Float32Array,
  indices: Uint32Array,
  vertexCount: number
): Float32Array {
  const tan1 = new Float32Array(vertexCount * 3);
  const tan2 = new Float32Array(vertexCount * 3);

  for (let t = 0; t + 2 < indices.length; t += COMPONENTS.TRIANGLE) {
    const i1 = indices[t];
    const i2 = indices[t + 1];
    const i3 = indices[t + 2];

    const x1 = positions[i2 * 3] - positions[i1 * 3];
    const x2 = positions[i3 * 3] - positions[i1 * 3];
    const y1 = positions[i2 * 3 + 1] - positions[i1 * 3 + 1];
    const y2 = positions[i3 * 3 + 1] - positions[i1 * 3 + 1];
    const z1 = positions[i2 * 3 + 2] - positions[i1 * 3 + 2];
    const z2 = positions[i3 * 3 + 2] - positions[i1 * 3 + 2];

    const s1 = uvs[i2 * 2] - uvs[i1 * 2];
    const s2 = uvs[i3 * 2] - uvs[i1 * 2];
    const t1 = uvs[i2 * 2 + 1] - uvs[i1 * 2 + 1];
    const t2 = uvs[i3 * 2 + 1] - uvs[i1 * 2 + 1];

    const det = s1 * t2 - s2 * t1;
    if (det === 0) continue;
    const r = 1 / det;

    const sx = (t2 * x1 - t1 * x2) * r;
    const sy = (t2 * y1 - t1 * y2) * r;
    const sz = (t2 * z1 - t1 * z2) * r;
    const tx = (s1 * x2 - s2 * x1) * r;
    const ty = (s1 * y2 - s2 * y1) * r;
    const tz = (s1 * z2 - s2 * z1) * r;

    for (const v of [i1, i2, i3]) {
      tan1[v * 3] += sx;
      tan1[v * 3 + 1] += sy;
      tan1[v * 3 + 2] += sz;
      tan2[v * 3] += tx;
      tan2[v * 3 + 1] += ty;
      tan2[v * 3 + 2] += tz;
    }
  }

  const tangents = new Float32Array(vertexCount * COMPONENTS.TANGENT);
  for (let v = 0; v < vertexCount; v++) {
    const nx = normals[v * 3];
    const ny = normals[v * 3 + 1];
    const nz = normals[v * 3 + 2];
    const sx = tan1[v * 3];
    const sy = tan1[v * 3 + 1];
    const sz = tan1[v * 3 + 2];

    const nDotS = nx * sx + ny * sy + nz * sz;
    let x = sx - nx * nDotS;
    let y = sy - ny * nDotS;
    let z = sz - nz * nDotS;
    const length = Math.sqrt(x * x + y * y + z * z);

    const out = v * COMPONENTS.TANGENT;
    if (length === 0) {
      tangents.set([1, 0, 0, 1], out);
      continue;
    }
    x /= length;
    y /= length;
    z /= length;

    // sign of (n x t) . tan2
    const cx = ny * z - nz * y;
    const cy = nz * x - nx * z;
    const cz = nx * y - ny * x;
    const w = cx * tan2[v * 3] + cy * tan2[v * 3 + 1] + cz * tan2[v * 3 + 2] < 0 ? -1 : 1;

    tangents.set([x, y, z, w], out);
  }
  return tangents;
}
