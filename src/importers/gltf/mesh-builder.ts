/**
 * Mesh Builder
 *
 * Packages a MeshBuildResult into a renderer mesh and its materials. The
 * pipeline suspends through the AwaitCaller between stages and once per
 * blend shape, and checks the abort signal after every suspension. A
 * cancelled build throws and hands nothing back.
 */

import type { AwaitCaller, MaterialResolver } from '../../interfaces';
import type {
  BlendShape,
  BlendShapeFrame,
  MeshBuildResult,
  MeshWithMaterials,
  RendererMesh,
  SkinBuffers,
  VertexBuffers
} from './types';
import { COMPONENTS, DEFAULT_MATERIAL_INDEX } from '../../constants/mesh';
import { DEFAULT_CONFIG } from '../../constants/config';
import { ERROR_MESSAGES } from '../../constants/errors';
import { MeshErrorFactory } from '../../errors';
import { Logger, LoggerFactory } from '../../utils/logger';
import { ImmediateAwaitCaller } from '../../utils/await-caller';
import { computeBounds, recalculateNormals, recalculateTangents } from './helpers/topology';

export interface BuildMeshOptions<TMaterial> {
  materialFromIndex: MaterialResolver<TMaterial>;
  awaitCaller?: AwaitCaller;
  signal?: AbortSignal;
  logger?: Logger;
  /** Weight of each blend shape frame */
  frameWeight?: number;
}

/**
 * Build pipeline stages, in order
 */
export const BUILD_STAGES = {
  VERTICES: 'vertices',
  INDICES: 'indices',
  BOUNDS: 'bounds',
  NORMALS: 'normals',
  TANGENTS: 'tangents',
  MATERIALS: 'materials',
  BLEND_SHAPES: 'blend_shapes',
} as const;

export type BuildStage = typeof BUILD_STAGES[keyof typeof BUILD_STAGES];

function throwIfAborted(signal: AbortSignal | undefined, stage: BuildStage, mesh: string): void {
  if (signal?.aborted) {
    throw MeshErrorFactory.buildCancelled(ERROR_MESSAGES.BUILD_CANCELLED, stage, { mesh });
  }
}

function copyVertices(vertices: VertexBuffers): VertexBuffers {
  return {
    positions: vertices.positions.slice(),
    normals: vertices.normals.slice(),
    uv0: vertices.uv0.slice(),
    uv1: vertices.uv1.slice(),
    colors: vertices.colors.slice(),
  };
}

function copySkin(skin: SkinBuffers): SkinBuffers {
  return {
    joints: skin.joints.slice(),
    weights: skin.weights.slice(),
  };
}

/**
 * Frame for one channel, or null when the channel only covers part of the mesh
 */
export function buildBlendShapeFrame(
  blendShape: BlendShape,
  vertexCount: number,
  frameWeight: number,
  logger: Logger
): BlendShapeFrame | null {
  const expected = vertexCount * COMPONENTS.DELTA;

  if (blendShape.positions.length === 0) {
    // keeps channel indices stable
    return {
      name: blendShape.name,
      weight: frameWeight,
      deltaPositions: new Float32Array(expected),
      deltaNormals: null,
      deltaTangents: null,
    };
  }

  if (blendShape.positions.length !== expected) {
    logger.warn('Blend shape covers only part of the mesh; skipped', {
      stage: BUILD_STAGES.BLEND_SHAPES,
      blendShape: blendShape.name,
      expected: vertexCount,
      actual: blendShape.positions.length / COMPONENTS.DELTA
    });
    return null;
  }

  return {
    name: blendShape.name,
    weight: frameWeight,
    deltaPositions: blendShape.positions.slice(),
    deltaNormals: blendShape.normals.length === expected ? blendShape.normals.slice() : null,
    deltaTangents: blendShape.tangents.length === expected ? blendShape.tangents.slice() : null,
  };
}

/**
 * Package a decoded mesh for the renderer
 */
export async function buildMeshAsync<TMaterial>(
  result: MeshBuildResult,
  options: BuildMeshOptions<TMaterial>
): Promise<MeshWithMaterials<TMaterial>> {
  const awaitCaller = options.awaitCaller ?? new ImmediateAwaitCaller();
  const logger = options.logger ?? LoggerFactory.forBuild();
  const frameWeight = options.frameWeight ?? DEFAULT_CONFIG.FRAME_WEIGHT;
  const { signal } = options;
  const name = result.name;

  const checkpoint = async (stage: BuildStage): Promise<void> => {
    await awaitCaller.nextFrame();
    throwIfAborted(signal, stage, name);
  };

  throwIfAborted(signal, BUILD_STAGES.VERTICES, name);

  const materialIndices = result.materialIndices.length > 0
    ? [...result.materialIndices]
    : [DEFAULT_MATERIAL_INDEX];

  logger.logStage(BUILD_STAGES.VERTICES, { mesh: name, vertexCount: result.vertexCount });
  const vertices = copyVertices(result.vertices);
  const skin = result.skin ? copySkin(result.skin) : undefined;
  await checkpoint(BUILD_STAGES.VERTICES);

  logger.logStage(BUILD_STAGES.INDICES, { mesh: name, indexCount: result.indices.length });
  const indices = result.indices.slice();
  const subMeshes = result.subMeshes.map(subMesh => ({ ...subMesh }));
  await checkpoint(BUILD_STAGES.INDICES);

  const bounds = computeBounds(vertices.positions, result.vertexCount);
  await checkpoint(BUILD_STAGES.BOUNDS);

  if (!result.hasNormals) {
    logger.logStage(BUILD_STAGES.NORMALS, { mesh: name });
    vertices.normals = recalculateNormals(vertices.positions, indices, result.vertexCount);
    await checkpoint(BUILD_STAGES.NORMALS);
  }

  const tangents = recalculateTangents(vertices.positions, vertices.normals, vertices.uv0, indices, result.vertexCount);
  await checkpoint(BUILD_STAGES.TANGENTS);

  const materials = materialIndices.map(index => options.materialFromIndex(index));
  await checkpoint(BUILD_STAGES.MATERIALS);

  const blendShapeFrames: BlendShapeFrame[] = [];
  for (const blendShape of result.blendShapes) {
    const frame = await awaitCaller.run(() => buildBlendShapeFrame(blendShape, result.vertexCount, frameWeight, logger));
    throwIfAborted(signal, BUILD_STAGES.BLEND_SHAPES, name);
    if (frame) {
      blendShapeFrames.push(frame);
    }
  }

  const mesh: RendererMesh = {
    name,
    vertexCount: result.vertexCount,
    vertices,
    indices,
    subMeshes,
    bounds,
    tangents,
    normalsRecalculated: !result.hasNormals,
    blendShapeFrames,
  };
  if (skin) {
    mesh.skin = skin;
  }

  logger.debug('Mesh built', {
    stage: 'build',
    mesh: name,
    vertexCount: mesh.vertexCount,
    subMeshes: subMeshes.length,
    blendShapeFrames: blendShapeFrames.length
  });

  return { mesh: Object.freeze(mesh), materials };
}
