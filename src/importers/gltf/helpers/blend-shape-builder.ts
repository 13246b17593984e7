/**
 * Blend Shape Builder
 *
 * Morph targets at the same position in each primitive's target list form
 * one channel. Deltas are axis-inverted and appended per primitive.
 *
 * The two buffer modes treat a delta accessor whose count differs from the
 * vertex count differently: independent mode throws, shared mode warns and
 * leaves the delta empty. Both behaviours are kept for compatibility with
 * existing assets.
 */

import type { AccessorView, AttributeReader, AxisInverter } from '../../../interfaces';
import type { MorphTargetDescription, PrimitiveDescription } from '../../../schemas';
import type { BlendShape } from '../types';
import { COMPONENTS, TARGET_SEMANTICS, type TargetSemantic } from '../../../constants/mesh';
import { ERROR_MESSAGES } from '../../../constants/errors';
import { MeshErrorFactory } from '../../../errors';
import { Logger } from '../../../utils/logger';
import { expectElementSize, readFloat } from './accessor-utils';

const DELTA_SEMANTICS: readonly TargetSemantic[] = [
  TARGET_SEMANTICS.POSITION,
  TARGET_SEMANTICS.NORMAL,
  TARGET_SEMANTICS.TANGENT,
];

interface BlendShapeChannel {
  name: string;
  deltas: Record<TargetSemantic, number[]>;
}

function createChannel(index: number): BlendShapeChannel {
  return {
    name: String(index),
    deltas: { POSITION: [], NORMAL: [], TANGENT: [] },
  };
}

export class BlendShapeBuilder {
  private readonly channels: BlendShapeChannel[] = [];

  constructor(
    private readonly inverter: AxisInverter,
    private readonly logger: Logger
  ) { }

  get channelCount(): number {
    return this.channels.length;
  }

  private getOrCreate(index: number): BlendShapeChannel {
    while (this.channels.length <= index) {
      this.channels.push(createChannel(this.channels.length));
    }
    return this.channels[index];
  }

  private appendDeltas(target: number[], view: AccessorView, semantic: TargetSemantic): void {
    expectElementSize(view, COMPONENTS.DELTA, semantic);
    for (let i = 0; i < view.count; i++) {
      const delta = this.inverter.invertVector3(
        readFloat(view, i, 0),
        readFloat(view, i, 1),
        readFloat(view, i, 2)
      );
      target.push(delta[0], delta[1], delta[2]);
    }
  }

  /**
   * Independent-buffer mode: append this primitive's targets to their
   * channels. A delta count different from `vertexCount` is fatal.
   */
  appendIndependent(primitive: PrimitiveDescription, reader: AttributeReader, vertexCount: number, primitiveIndex: number): void {
    primitive.targets.forEach((target: MorphTargetDescription, targetIndex: number) => {
      const channel = this.getOrCreate(targetIndex);
      for (const semantic of DELTA_SEMANTICS) {
        const accessorIndex = target[semantic];
        if (accessorIndex === undefined) continue;

        const view = reader.read(accessorIndex);
        if (view.count !== vertexCount) {
          throw MeshErrorFactory.morphTargetLength(
            `${ERROR_MESSAGES.MORPH_TARGET_LENGTH_MISMATCH}: target ${targetIndex} ${semantic}`,
            vertexCount,
            view.count,
            { primitiveIndex, targetIndex, semantic }
          );
        }
        this.appendDeltas(channel.deltas[semantic], view, semantic);
      }
    });
  }

  /**
   * Shared-buffer mode: one channel per target of the first primitive.
   * A delta count different from `vertexCount` leaves that delta empty.
   */
  appendShared(primitive: PrimitiveDescription, reader: AttributeReader, vertexCount: number): void {
    primitive.targets.forEach((target: MorphTargetDescription, targetIndex: number) => {
      const channel = this.getOrCreate(targetIndex);
      for (const semantic of DELTA_SEMANTICS) {
        const accessorIndex = target[semantic];
        if (accessorIndex === undefined) continue;

        const view = reader.read(accessorIndex);
        if (view.count !== vertexCount) {
          this.logger.warn('Morph target length differs from vertex count; channel delta left empty', {
            stage: 'decode',
            targetIndex,
            semantic,
            expected: vertexCount,
            actual: view.count
          });
          continue;
        }
        this.appendDeltas(channel.deltas[semantic], view, semantic);
      }
    });
  }

  /**
   * Overwrite channel names in order from the mesh's target names
   */
  applyNames(targetNames: readonly string[] | undefined): void {
    if (!targetNames) return;

    for (let i = 0; i < this.channels.length; i++) {
      if (i >= targetNames.length) {
        this.logger.warn('targetNames is shorter than the morph target count', {
          stage: 'decode',
          names: targetNames.length,
          channels: this.channels.length
        });
        break;
      }
      this.channels[i].name = targetNames[i];
    }
  }

  toBlendShapes(): BlendShape[] {
    return this.channels.map(channel => ({
      name: channel.name,
      positions: Float32Array.from(channel.deltas.POSITION),
      normals: Float32Array.from(channel.deltas.NORMAL),
      tangents: Float32Array.from(channel.deltas.TANGENT),
    }));
  }
}
