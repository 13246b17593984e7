/**
 * Mesh Decoder
 *
 * Turns one glTF mesh description into a trimmed MeshBuildResult.
 * Synchronous and deterministic: the same description and accessor data
 * always produce the same buffers.
 */

import { ZodError } from 'zod';
import type { AttributeReader, AxisInverter } from '../../interfaces';
import type { MeshDescription, MeshDescriptionInput, PrimitiveAttributes, PrimitiveDescription } from '../../schemas';
import { MeshDescriptionSchema } from '../../schemas';
import type { BufferMode, MeshBuildResult } from './types';
import { ATTRIBUTE_SEMANTICS, DEFAULT_MATERIAL_INDEX, NO_INDICES } from '../../constants/mesh';
import { ERROR_MESSAGES } from '../../constants/errors';
import { MeshErrorFactory } from '../../errors';
import { Logger, LoggerFactory } from '../../utils/logger';
import { ReverseZ } from '../../utils/axis-inverter';
import { UvDecodeMode } from '../../utils/uv-utils';
import { VertexAccumulator } from './helpers/vertex-accumulator';
import { IndexAssembler } from './helpers/index-assembler';
import { BlendShapeBuilder } from './helpers/blend-shape-builder';
import { trimUnusedVertices } from './helpers/vertex-trimmer';

export interface DecodeMeshOptions {
  /** Defaults to negating Z */
  inverter?: AxisInverter;
  /** Mode for TEXCOORD_0, defaults to FlipV */
  uvMode?: UvDecodeMode;
  logger?: Logger;
  /** Used to name unnamed meshes */
  meshIndex?: number;
}

/**
 * Validate a mesh description against the input contract
 */
export function parseMeshDescription(input: MeshDescriptionInput): MeshDescription {
  try {
    return MeshDescriptionSchema.parse(input);
  } catch (error) {
    if (error instanceof ZodError) {
      throw MeshErrorFactory.validationError(
        ERROR_MESSAGES.INVALID_MESH_DESCRIPTION,
        'MeshDescription',
        { issues: error.issues.map(issue => `${issue.path.join('.')}: ${issue.message}`) },
        error
      );
    }
    throw error;
  }
}

function sameAttributes(a: PrimitiveAttributes, b: PrimitiveAttributes): boolean {
  const keysA = Object.keys(a);
  const keysB = Object.keys(b);
  if (keysA.length !== keysB.length) {
    return false;
  }
  return keysA.every(key => Object.prototype.hasOwnProperty.call(b, key) && a[key] === b[key]);
}

/**
 * Shared when every primitive declares the same semantic -> accessor map
 */
export function selectBufferMode(primitives: readonly Pick<PrimitiveDescription, 'attributes'>[]): BufferMode {
  for (let i = 1; i < primitives.length; i++) {
    if (!sameAttributes(primitives[i - 1].attributes, primitives[i].attributes)) {
      return 'independent';
    }
  }
  return 'shared';
}

function isSkinned(primitive: PrimitiveDescription): boolean {
  return primitive.attributes[ATTRIBUTE_SEMANTICS.JOINTS_0] !== undefined
    || primitive.attributes[ATTRIBUTE_SEMANTICS.WEIGHTS_0] !== undefined;
}

/**
 * Up-front pass over accessor counts
 */
function measureCapacity(
  primitives: readonly PrimitiveDescription[],
  reader: AttributeReader,
  mode: BufferMode
): { vertices: number; indices: number } {
  let vertices = 0;
  let indices = 0;
  primitives.forEach((primitive, i) => {
    const positionCount = reader.read(primitive.attributes.POSITION).count;
    if (mode === 'independent' || i === 0) {
      vertices += positionCount;
    }
    indices += primitive.indices === NO_INDICES ? positionCount : reader.read(primitive.indices).count;
  });
  return { vertices, indices };
}

function materialOf(primitive: PrimitiveDescription): number {
  return primitive.material ?? DEFAULT_MATERIAL_INDEX;
}

/**
 * Decode a mesh into consolidated, trimmed buffers
 */
export function decodeMesh(
  input: MeshDescriptionInput,
  reader: AttributeReader,
  options: DecodeMeshOptions = {}
): MeshBuildResult {
  const logger = options.logger ?? LoggerFactory.forDecode();
  const inverter = options.inverter ?? ReverseZ;
  const uvMode = options.uvMode ?? UvDecodeMode.FlipV;

  const description = parseMeshDescription(input);
  const primitives = description.primitives;
  const name = description.name || `mesh_${options.meshIndex ?? 0}`;
  const bufferMode = selectBufferMode(primitives);
  const skinned = bufferMode === 'shared' ? isSkinned(primitives[0]) : primitives.some(isSkinned);
  const capacity = measureCapacity(primitives, reader, bufferMode);

  logger.debug('Decoding mesh', {
    stage: 'decode',
    mesh: name,
    bufferMode,
    primitives: primitives.length,
    vertexCapacity: capacity.vertices,
    indexCapacity: capacity.indices
  });

  const vertices = new VertexAccumulator(capacity.vertices, { inverter, uvMode, skinned, logger });
  const indices = new IndexAssembler(capacity.indices, logger);
  const blendShapes = new BlendShapeBuilder(inverter, logger);
  const materialIndices: number[] = [];

  if (bufferMode === 'shared') {
    const first = primitives[0];
    const range = vertices.appendPrimitive(first, reader, 0);
    blendShapes.appendShared(first, reader, range.count);

    primitives.forEach((primitive, i) => {
      const material = materialOf(primitive);
      if (primitive.indices === NO_INDICES) {
        indices.pushSequential(range.count, 0, material, i);
      } else {
        indices.pushIndices(reader.read(primitive.indices), 0, material, i);
      }
      materialIndices.push(material);
    });
  } else {
    primitives.forEach((primitive, i) => {
      const material = materialOf(primitive);
      const range = vertices.appendPrimitive(primitive, reader, i);
      blendShapes.appendIndependent(primitive, reader, range.count, i);

      if (primitive.indices === NO_INDICES) {
        indices.pushSequential(range.count, range.offset, material, i);
      } else {
        indices.pushIndices(reader.read(primitive.indices), range.offset, material, i);
      }
      materialIndices.push(material);
    });
  }

  blendShapes.applyNames(description.targetNames);

  const buffers = vertices.toBuffers();
  const result: MeshBuildResult = {
    name,
    bufferMode,
    vertexCount: vertices.vertexCount,
    vertices: buffers.vertices,
    indices: indices.toIndices(),
    subMeshes: indices.listSubMeshes(),
    materialIndices,
    blendShapes: blendShapes.toBlendShapes(),
    hasNormals: vertices.hasNormals,
  };
  if (buffers.skin) {
    result.skin = buffers.skin;
  }

  const trimmed = trimUnusedVertices(result);
  if (trimmed.vertexCount < result.vertexCount) {
    logger.debug('Dropped unreferenced trailing vertices', {
      stage: 'decode',
      mesh: name,
      before: result.vertexCount,
      after: trimmed.vertexCount
    });
  }
  return trimmed;
}
