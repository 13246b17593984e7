/**
 * Vertex Accumulator
 *
 * Collects the per-vertex attributes of one or more primitives into
 * capacity-reserved typed arrays.
 */

import type { AttributeReader, AxisInverter, Vec4 } from '../../../interfaces';
import type { PrimitiveDescription } from '../../../schemas';
import type { SkinBuffers, VertexBuffers } from '../types';
import { ATTRIBUTE_SEMANTICS, COMPONENTS, DEFAULT_COLOR } from '../../../constants/mesh';
import { Logger } from '../../../utils/logger';
import { UvDecodeMode, decodeUv } from '../../../utils/uv-utils';
import { expectElementSize, readFloat, readOptional, readRaw } from './accessor-utils';

export interface VertexAccumulatorOptions {
  inverter: AxisInverter;
  /** Mode applied to TEXCOORD_0; TEXCOORD_1 always uses FlipV */
  uvMode: UvDecodeMode;
  /** Emit skin buffers for every vertex */
  skinned: boolean;
  logger: Logger;
}

/**
 * Range a primitive occupies in the vertex arrays
 */
export interface VertexRange {
  offset: number;
  count: number;
}

/**
 * Divide weights by their sum; an all-zero tuple stays as it is
 */
export function normalizeBoneWeights(weights: Vec4): Vec4 {
  const sum = weights[0] + weights[1] + weights[2] + weights[3];
  if (sum === 0) {
    return weights;
  }
  const f = 1 / sum;
  return [weights[0] * f, weights[1] * f, weights[2] * f, weights[3] * f];
}

function grow<T extends Float32Array | Uint32Array>(array: T, size: number, create: (size: number) => T): T {
  if (array.length >= size) {
    return array;
  }
  const next = create(size);
  next.set(array);
  return next;
}

export class VertexAccumulator {
  private positions: Float32Array;
  private normals: Float32Array;
  private uv0: Float32Array;
  private uv1: Float32Array;
  private colors: Float32Array;
  private joints: Uint32Array;
  private weights: Float32Array;
  private capacity: number;
  private count = 0;
  private normalsPresent = true;

  constructor(capacity: number, private readonly options: VertexAccumulatorOptions) {
    this.capacity = Math.max(0, capacity);
    this.positions = new Float32Array(this.capacity * COMPONENTS.POSITION);
    this.normals = new Float32Array(this.capacity * COMPONENTS.NORMAL);
    this.uv0 = new Float32Array(this.capacity * COMPONENTS.UV);
    this.uv1 = new Float32Array(this.capacity * COMPONENTS.UV);
    this.colors = new Float32Array(this.capacity * COMPONENTS.COLOR);
    const skinCapacity = options.skinned ? this.capacity : 0;
    this.joints = new Uint32Array(skinCapacity * COMPONENTS.JOINTS);
    this.weights = new Float32Array(skinCapacity * COMPONENTS.WEIGHTS);
  }

  get vertexCount(): number {
    return this.count;
  }

  get hasNormals(): boolean {
    return this.normalsPresent;
  }

  private reserve(extra: number): void {
    const required = this.count + extra;
    if (required <= this.capacity) {
      return;
    }
    const size = Math.max(required, this.capacity * 2);
    const floats = (n: number): Float32Array => new Float32Array(n);
    this.positions = grow(this.positions, size * COMPONENTS.POSITION, floats);
    this.normals = grow(this.normals, size * COMPONENTS.NORMAL, floats);
    this.uv0 = grow(this.uv0, size * COMPONENTS.UV, floats);
    this.uv1 = grow(this.uv1, size * COMPONENTS.UV, floats);
    this.colors = grow(this.colors, size * COMPONENTS.COLOR, floats);
    if (this.options.skinned) {
      this.joints = grow(this.joints, size * COMPONENTS.JOINTS, n => new Uint32Array(n));
      this.weights = grow(this.weights, size * COMPONENTS.WEIGHTS, floats);
    }
    this.capacity = size;
  }

  /**
   * Append every vertex of a primitive
   */
  appendPrimitive(primitive: PrimitiveDescription, reader: AttributeReader, primitiveIndex: number): VertexRange {
    const { inverter, uvMode, skinned, logger } = this.options;
    const attributes = primitive.attributes;

    const positions = reader.read(attributes.POSITION);
    expectElementSize(positions, COMPONENTS.POSITION, ATTRIBUTE_SEMANTICS.POSITION);
    const n = positions.count;

    const normals = readOptional(reader, attributes[ATTRIBUTE_SEMANTICS.NORMAL], ATTRIBUTE_SEMANTICS.NORMAL, n);
    const texCoords0 = readOptional(reader, attributes[ATTRIBUTE_SEMANTICS.TEXCOORD_0], ATTRIBUTE_SEMANTICS.TEXCOORD_0, n);
    const texCoords1 = readOptional(reader, attributes[ATTRIBUTE_SEMANTICS.TEXCOORD_1], ATTRIBUTE_SEMANTICS.TEXCOORD_1, n);
    const colors = readOptional(reader, attributes[ATTRIBUTE_SEMANTICS.COLOR_0], ATTRIBUTE_SEMANTICS.COLOR_0, n);
    const joints = readOptional(reader, attributes[ATTRIBUTE_SEMANTICS.JOINTS_0], ATTRIBUTE_SEMANTICS.JOINTS_0, n);
    const weights = readOptional(reader, attributes[ATTRIBUTE_SEMANTICS.WEIGHTS_0], ATTRIBUTE_SEMANTICS.WEIGHTS_0, n);

    if (normals) {
      expectElementSize(normals, COMPONENTS.NORMAL, ATTRIBUTE_SEMANTICS.NORMAL);
    } else {
      this.normalsPresent = false;
      logger.warn('Primitive has no normals; they will be recalculated', {
        stage: 'decode',
        primitiveIndex
      });
    }
    if (texCoords0) expectElementSize(texCoords0, COMPONENTS.UV, ATTRIBUTE_SEMANTICS.TEXCOORD_0);
    if (texCoords1) expectElementSize(texCoords1, COMPONENTS.UV, ATTRIBUTE_SEMANTICS.TEXCOORD_1);
    if (colors) expectElementSize(colors, 3, ATTRIBUTE_SEMANTICS.COLOR_0);
    if (joints) expectElementSize(joints, COMPONENTS.JOINTS, ATTRIBUTE_SEMANTICS.JOINTS_0);
    if (weights) expectElementSize(weights, COMPONENTS.WEIGHTS, ATTRIBUTE_SEMANTICS.WEIGHTS_0);

    this.reserve(n);
    const offset = this.count;

    for (let i = 0; i < n; i++) {
      const v = offset + i;

      const position = inverter.invertVector3(
        readFloat(positions, i, 0),
        readFloat(positions, i, 1),
        readFloat(positions, i, 2)
      );
      this.positions.set(position, v * COMPONENTS.POSITION);

      if (normals) {
        const normal = inverter.invertVector3(
          readFloat(normals, i, 0),
          readFloat(normals, i, 1),
          readFloat(normals, i, 2)
        );
        this.normals.set(normal, v * COMPONENTS.NORMAL);
      }

      if (texCoords0) {
        this.uv0.set(decodeUv(uvMode, readFloat(texCoords0, i, 0), readFloat(texCoords0, i, 1)), v * COMPONENTS.UV);
      }

      if (texCoords1) {
        this.uv1.set(decodeUv(UvDecodeMode.FlipV, readFloat(texCoords1, i, 0), readFloat(texCoords1, i, 1)), v * COMPONENTS.UV);
      }

      const color = colors
        ? [
          readFloat(colors, i, 0),
          readFloat(colors, i, 1),
          readFloat(colors, i, 2),
          readFloat(colors, i, 3, 1)
        ]
        : DEFAULT_COLOR;
      this.colors.set(color, v * COMPONENTS.COLOR);

      if (skinned) {
        if (joints) {
          this.joints.set(
            [readRaw(joints, i, 0), readRaw(joints, i, 1), readRaw(joints, i, 2), readRaw(joints, i, 3)],
            v * COMPONENTS.JOINTS
          );
        }
        if (weights) {
          this.weights.set(
            normalizeBoneWeights([
              readFloat(weights, i, 0),
              readFloat(weights, i, 1),
              readFloat(weights, i, 2),
              readFloat(weights, i, 3)
            ]),
            v * COMPONENTS.WEIGHTS
          );
        }
      }
    }

    this.count += n;
    return { offset, count: n };
  }

  /**
   * Copy out the filled part of each buffer
   */
  toBuffers(): { vertices: VertexBuffers; skin?: SkinBuffers } {
    const n = this.count;
    const vertices: VertexBuffers = {
      positions: this.positions.slice(0, n * COMPONENTS.POSITION),
      normals: this.normals.slice(0, n * COMPONENTS.NORMAL),
      uv0: this.uv0.slice(0, n * COMPONENTS.UV),
      uv1: this.uv1.slice(0, n * COMPONENTS.UV),
      colors: this.colors.slice(0, n * COMPONENTS.COLOR),
    };

    if (!this.options.skinned) {
      return { vertices };
    }

    return {
      vertices,
      skin: {
        joints: this.joints.slice(0, n * COMPONENTS.JOINTS),
        weights: this.weights.slice(0, n * COMPONENTS.WEIGHTS),
      }
    };
  }
}
