/**
 * Index Assembler
 *
 * Copies index buffers into one triangle list, reversing winding and
 * rebasing onto the merged vertex buffer, and records one submesh per
 * primitive.
 */

import type { AccessorView } from '../../../interfaces';
import type { SubMeshDescriptor } from '../types';
import { COMPONENT_TYPES, COMPONENTS } from '../../../constants/mesh';
import { ERROR_MESSAGES } from '../../../constants/errors';
import { MeshErrorFactory } from '../../../errors';
import { Logger } from '../../../utils/logger';

/**
 * Write each triangle (a, b, c) of `source` as (c, b, a) + `offset`.
 * Returns the number of indices written.
 */
export function pushFlippedTriangles(
  source: ArrayLike<number>,
  count: number,
  offset: number,
  target: Uint32Array,
  targetStart: number
): number {
  const whole = count - (count % COMPONENTS.TRIANGLE);
  let j = targetStart;
  for (let i = 0; i < whole; i += COMPONENTS.TRIANGLE) {
    target[j++] = offset + source[i + 2];
    target[j++] = offset + source[i + 1];
    target[j++] = offset + source[i];
  }
  return whole;
}

/**
 * Sequential index source 0..count-1
 */
function sequence(count: number): Uint32Array {
  const out = new Uint32Array(count);
  for (let i = 0; i < count; i++) {
    out[i] = i;
  }
  return out;
}

export class IndexAssembler {
  private indices: Uint32Array;
  private count = 0;
  private readonly subMeshes: SubMeshDescriptor[] = [];

  constructor(capacity: number, private readonly logger: Logger) {
    this.indices = new Uint32Array(Math.max(0, capacity));
  }

  get indexCount(): number {
    return this.count;
  }

  private reserve(extra: number): void {
    const required = this.count + extra;
    if (required <= this.indices.length) {
      return;
    }
    const next = new Uint32Array(Math.max(required, this.indices.length * 2));
    next.set(this.indices.subarray(0, this.count));
    this.indices = next;
  }

  private append(source: ArrayLike<number>, count: number, offset: number, materialIndex: number, primitiveIndex: number): SubMeshDescriptor {
    if (count % COMPONENTS.TRIANGLE !== 0) {
      this.logger.warn('Index count is not a multiple of 3; dropping trailing indices', {
        stage: 'decode',
        primitiveIndex,
        count
      });
    }

    this.reserve(count);
    const indexStart = this.count;
    const written = pushFlippedTriangles(source, count, offset, this.indices, indexStart);
    this.count += written;

    const subMesh: SubMeshDescriptor = { indexStart, indexCount: written, materialIndex };
    this.subMeshes.push(subMesh);
    return subMesh;
  }

  /**
   * Append an index accessor. Only 8, 16 and 32 bit unsigned indices are accepted.
   */
  pushIndices(view: AccessorView, offset: number, materialIndex: number, primitiveIndex: number): SubMeshDescriptor {
    switch (view.componentType) {
      case COMPONENT_TYPES.UNSIGNED_BYTE:
      case COMPONENT_TYPES.UNSIGNED_SHORT:
      case COMPONENT_TYPES.UNSIGNED_INT:
        return this.append(view.array, view.count, offset, materialIndex, primitiveIndex);
      default:
        throw MeshErrorFactory.unsupportedIndexFormat(
          `${ERROR_MESSAGES.UNSUPPORTED_INDEX_FORMAT}: ${view.componentType}`,
          view.componentType,
          { primitiveIndex }
        );
    }
  }

  /**
   * Append a generated 0..vertexCount-1 triangle list for a non-indexed primitive
   */
  pushSequential(vertexCount: number, offset: number, materialIndex: number, primitiveIndex: number): SubMeshDescriptor {
    return this.append(sequence(vertexCount), vertexCount, offset, materialIndex, primitiveIndex);
  }

  toIndices(): Uint32Array {
    return this.indices.slice(0, this.count);
  }

  listSubMeshes(): SubMeshDescriptor[] {
    return this.subMeshes.map(subMesh => ({ ...subMesh }));
  }
}
