import { describe, it, expect } from 'vitest';
import { computeBounds, recalculateNormals, recalculateTangents } from '../src/importers/gltf/helpers/topology';
import { expectArrayClose } from './helpers/fake-reader';

const positions = new Float32Array([0, 0, 0, 1, 0, 0, 0, 1, 0]);
const upNormals = new Float32Array([0, 0, 1, 0, 0, 1, 0, 0, 1]);
const indices = new Uint32Array([0, 1, 2]);

describe('computeBounds', () => {
  it('returns zero bounds for an empty mesh', () => {
    expect(computeBounds(new Float32Array(0), 0)).toEqual({
      min: [0, 0, 0],
      max: [0, 0, 0],
      center: [0, 0, 0],
      extents: [0, 0, 0],
    });
  });

  it('only considers the first vertexCount positions', () => {
    const bounds = computeBounds(new Float32Array([-1, 2, 3, 3, 4, 5, 100, 100, 100]), 2);

    expect(bounds.min).toEqual([-1, 2, 3]);
    expect(bounds.max).toEqual([3, 4, 5]);
    expect(bounds.center).toEqual([1, 3, 4]);
    expect(bounds.extents).toEqual([2, 1, 1]);
  });
});

describe('recalculateNormals', () => {
  it('points along the triangle face normal', () => {
    expectArrayClose(recalculateNormals(positions, indices, 3), [0, 0, 1, 0, 0, 1, 0, 0, 1]);
  });

  it('reverses with the winding', () => {
    expectArrayClose(recalculateNormals(positions, new Uint32Array([2, 1, 0]), 3), [0, 0, -1, 0, 0, -1, 0, 0, -1]);
  });

  it('leaves unreferenced vertices at zero', () => {
    const withExtra = new Float32Array([...positions, 5, 5, 5]);
    const normals = recalculateNormals(withExtra, indices, 4);

    expect(Array.from(normals.slice(9))).toEqual([0, 0, 0]);
  });

  it('returns unit vectors for vertices shared by triangles of different area', () => {
    const quad = new Float32Array([0, 0, 0, 2, 0, 0, 2, 2, 0, 0, 1, 0]);
    const normals = recalculateNormals(quad, new Uint32Array([0, 1, 2, 0, 2, 3]), 4);

    expectArrayClose(normals, [0, 0, 1, 0, 0, 1, 0, 0, 1, 0, 0, 1]);
  });
});

describe('recalculateTangents', () => {
  it('follows the U direction with a positive bitangent sign', () => {
    const uvs = new Float32Array([0, 0, 1, 0, 0, 1]);
    const tangents = recalculateTangents(positions, upNormals, uvs, indices, 3);

    expectArrayClose(tangents, [1, 0, 0, 1, 1, 0, 0, 1, 1, 0, 0, 1]);
  });

  it('flips the sign for mirrored UVs', () => {
    const uvs = new Float32Array([0, 0, -1, 0, 0, 1]);
    const tangents = recalculateTangents(positions, upNormals, uvs, indices, 3);

    expectArrayClose(tangents, [-1, 0, 0, -1, -1, 0, 0, -1, -1, 0, 0, -1]);
  });

  it('falls back to +X for degenerate UVs', () => {
    const tangents = recalculateTangents(positions, upNormals, new Float32Array(6), indices, 3);

    expectArrayClose(tangents, [1, 0, 0, 1, 1, 0, 0, 1, 1, 0, 0, 1]);
  });
});
