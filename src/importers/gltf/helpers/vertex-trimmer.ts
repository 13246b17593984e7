/**
 * Vertex Trimmer
 *
 * Drops vertex records after the highest index any triangle references.
 */

import type { BlendShape, MeshBuildResult, SkinBuffers, VertexBuffers } from '../types';
import { COMPONENTS } from '../../../constants/mesh';
import { MeshErrorFactory } from '../../../errors';

/**
 * Largest index value, or -1 for an empty list
 */
export function findMaxIndex(indices: ArrayLike<number>): number {
  let max = -1;
  for (let i = 0; i < indices.length; i++) {
    if (indices[i] > max) max = indices[i];
  }
  return max;
}

function truncate(array: Float32Array, components: number, keep: number): Float32Array;
function truncate(array: Uint32Array, components: number, keep: number): Uint32Array;
function truncate(array: Float32Array | Uint32Array, components: number, keep: number): Float32Array | Uint32Array {
  const length = keep * components;
  return array.length > length ? array.slice(0, length) : array;
}

function truncateVertices(vertices: VertexBuffers, keep: number): VertexBuffers {
  return {
    positions: truncate(vertices.positions, COMPONENTS.POSITION, keep),
    normals: truncate(vertices.normals, COMPONENTS.NORMAL, keep),
    uv0: truncate(vertices.uv0, COMPONENTS.UV, keep),
    uv1: truncate(vertices.uv1, COMPONENTS.UV, keep),
    colors: truncate(vertices.colors, COMPONENTS.COLOR, keep),
  };
}

function truncateSkin(skin: SkinBuffers, keep: number): SkinBuffers {
  return {
    joints: truncate(skin.joints, COMPONENTS.JOINTS, keep),
    weights: truncate(skin.weights, COMPONENTS.WEIGHTS, keep),
  };
}

function truncateBlendShape(blendShape: BlendShape, keep: number): BlendShape {
  return {
    name: blendShape.name,
    positions: truncate(blendShape.positions, COMPONENTS.DELTA, keep),
    normals: truncate(blendShape.normals, COMPONENTS.DELTA, keep),
    tangents: truncate(blendShape.tangents, COMPONENTS.DELTA, keep),
  };
}

/**
 * Truncate every per-vertex array to (max index + 1) records
 */
export function trimUnusedVertices(result: MeshBuildResult): MeshBuildResult {
  const maxIndex = findMaxIndex(result.indices);
  if (maxIndex >= result.vertexCount) {
    throw MeshErrorFactory.validationError(
      `Index ${maxIndex} references a vertex past the end of the buffer (${result.vertexCount} vertices)`,
      'indices',
      { maxIndex, vertexCount: result.vertexCount }
    );
  }

  const keep = maxIndex + 1;
  if (keep === result.vertexCount) {
    return result;
  }

  const trimmed: MeshBuildResult = {
    ...result,
    vertexCount: keep,
    vertices: truncateVertices(result.vertices, keep),
    blendShapes: result.blendShapes.map(blendShape => truncateBlendShape(blendShape, keep)),
  };
  if (result.skin) {
    trimmed.skin = truncateSkin(result.skin, keep);
  }
  return trimmed;
}
