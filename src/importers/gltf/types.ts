/**
 * Mesh Import Types
 */

import type { Vec3 } from '../../interfaces';

/**
 * How primitives map onto vertex storage
 */
export type BufferMode = 'shared' | 'independent';

/**
 * Column-wise vertex storage, one record per vertex
 */
export interface VertexBuffers {
  /** xyz */
  positions: Float32Array;
  /** xyz, zero where the source had no normals */
  normals: Float32Array;
  /** uv */
  uv0: Float32Array;
  /** uv */
  uv1: Float32Array;
  /** rgba */
  colors: Float32Array;
}

/**
 * Four joint influences per vertex
 */
export interface SkinBuffers {
  joints: Uint32Array;
  /** Each group of four sums to 1 or to 0 */
  weights: Float32Array;
}

export interface SubMeshDescriptor {
  indexStart: number;
  indexCount: number;
  materialIndex: number;
}

/**
 * Morph target channel. Each delta array is empty or holds xyz per vertex.
 */
export interface BlendShape {
  name: string;
  positions: Float32Array;
  normals: Float32Array;
  tangents: Float32Array;
}

/**
 * Decoded, trimmed mesh ready for packaging
 */
export interface MeshBuildResult {
  name: string;
  bufferMode: BufferMode;
  vertexCount: number;
  vertices: VertexBuffers;
  skin?: SkinBuffers;
  /** Triangle list */
  indices: Uint32Array;
  subMeshes: SubMeshDescriptor[];
  materialIndices: number[];
  blendShapes: BlendShape[];
  /** False when any primitive lacked NORMAL */
  hasNormals: boolean;
}

export interface Bounds {
  min: Vec3;
  max: Vec3;
  center: Vec3;
  extents: Vec3;
}

export interface BlendShapeFrame {
  name: string;
  weight: number;
  deltaPositions: Float32Array;
  deltaNormals: Float32Array | null;
  deltaTangents: Float32Array | null;
}

/**
 * Renderer-facing mesh produced by the build pipeline
 */
export interface RendererMesh {
  name: string;
  vertexCount: number;
  vertices: VertexBuffers;
  skin?: SkinBuffers;
  indices: Uint32Array;
  subMeshes: SubMeshDescriptor[];
  bounds: Bounds;
  /** xyzw, w is the bitangent sign */
  tangents: Float32Array;
  normalsRecalculated: boolean;
  blendShapeFrames: BlendShapeFrame[];
}

export interface MeshWithMaterials<TMaterial> {
  mesh: RendererMesh;
  materials: TMaterial[];
}
