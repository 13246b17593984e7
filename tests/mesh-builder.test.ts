import { describe, it, expect, vi } from 'vitest';
import { buildMeshAsync, BUILD_STAGES } from '../src/importers/gltf/mesh-builder';
import type { BlendShape, MeshBuildResult } from '../src/importers/gltf/types';
import type { AwaitCaller } from '../src/interfaces';
import { MeshBuildCancelledError } from '../src/errors';
import { expectArrayClose, quietLogger } from './helpers/fake-reader';

class CountingAwaitCaller implements AwaitCaller {
  frames = 0;
  runs = 0;

  constructor(private readonly onFrame: (frame: number) => void = () => undefined) { }

  async nextFrame(): Promise<void> {
    this.frames++;
    this.onFrame(this.frames);
  }

  async run<T>(action: () => T): Promise<T> {
    this.runs++;
    return action();
  }
}

function shape(name: string, length: number): BlendShape {
  return {
    name,
    positions: new Float32Array(length).fill(0.5),
    normals: new Float32Array(0),
    tangents: new Float32Array(0),
  };
}

function triangle(overrides: Partial<MeshBuildResult> = {}): MeshBuildResult {
  return {
    name: 'triangle',
    bufferMode: 'shared',
    vertexCount: 3,
    vertices: {
      positions: new Float32Array([0, 0, 0, 1, 0, 0, 0, 1, 0]),
      normals: new Float32Array(9),
      uv0: new Float32Array(6),
      uv1: new Float32Array(6),
      colors: new Float32Array(12).fill(1),
    },
    indices: new Uint32Array([2, 1, 0]),
    subMeshes: [{ indexStart: 0, indexCount: 3, materialIndex: 0 }],
    materialIndices: [0],
    blendShapes: [],
    hasNormals: false,
    ...overrides,
  };
}

describe('buildMeshAsync', () => {
  it('suspends once per stage and once per blend shape', async () => {
    const awaitCaller = new CountingAwaitCaller();
    await buildMeshAsync(triangle({ hasNormals: true, blendShapes: [shape('a', 9), shape('b', 9)] }), {
      materialFromIndex: index => index,
      awaitCaller,
      logger: quietLogger()
    });

    expect(awaitCaller.frames).toBe(5);
    expect(awaitCaller.runs).toBe(2);
  });

  it('adds a normals stage when normals are recalculated', async () => {
    const awaitCaller = new CountingAwaitCaller();
    await buildMeshAsync(triangle(), { materialFromIndex: index => index, awaitCaller, logger: quietLogger() });

    expect(awaitCaller.frames).toBe(6);
    expect(awaitCaller.runs).toBe(0);
  });

  it('recalculates normals facing the flipped winding', async () => {
    const { mesh } = await buildMeshAsync(triangle(), { materialFromIndex: index => index, logger: quietLogger() });

    expect(mesh.normalsRecalculated).toBe(true);
    expectArrayClose(mesh.vertices.normals, [0, 0, -1, 0, 0, -1, 0, 0, -1]);
  });

  it('leaves the decoded result untouched', async () => {
    const source = triangle();
    const { mesh } = await buildMeshAsync(source, { materialFromIndex: index => index, logger: quietLogger() });

    expect(Array.from(source.vertices.normals)).toEqual(new Array(9).fill(0));
    expect(mesh.vertices.positions).not.toBe(source.vertices.positions);
    expect(mesh.indices).not.toBe(source.indices);
  });

  it('returns a frozen mesh with bounds and tangents', async () => {
    const { mesh } = await buildMeshAsync(triangle(), { materialFromIndex: index => index, logger: quietLogger() });

    expect(Object.isFrozen(mesh)).toBe(true);
    expectArrayClose(mesh.bounds.min, [0, 0, 0]);
    expectArrayClose(mesh.bounds.max, [1, 1, 0]);
    expectArrayClose(mesh.bounds.center, [0.5, 0.5, 0]);
    expectArrayClose(mesh.bounds.extents, [0.5, 0.5, 0]);
    expectArrayClose(mesh.tangents, [1, 0, 0, 1, 1, 0, 0, 1, 1, 0, 0, 1]);
  });

  it('resolves materials in sub-mesh order', async () => {
    const materialFromIndex = vi.fn((index: number) => `mat-${index}`);
    const { materials } = await buildMeshAsync(triangle({ materialIndices: [2, 0] }), {
      materialFromIndex,
      logger: quietLogger()
    });

    expect(materials).toEqual(['mat-2', 'mat-0']);
    expect(materialFromIndex).toHaveBeenCalledTimes(2);
  });

  it('falls back to material 0 when no material indices are present', async () => {
    const { materials } = await buildMeshAsync(triangle({ materialIndices: [] }), {
      materialFromIndex: index => `mat-${index}`,
      logger: quietLogger()
    });

    expect(materials).toEqual(['mat-0']);
  });

  it('builds zero frames for empty channels and skips partial ones', async () => {
    const logger = quietLogger();
    const warn = vi.spyOn(logger, 'warn');
    const full: BlendShape = { ...shape('full', 9), normals: new Float32Array(9).fill(1) };

    const { mesh } = await buildMeshAsync(
      triangle({ hasNormals: true, blendShapes: [full, shape('empty', 0), shape('partial', 3)] }),
      { materialFromIndex: index => index, logger }
    );

    expect(mesh.blendShapeFrames.map(frame => frame.name)).toEqual(['full', 'empty']);
    const [fullFrame, emptyFrame] = mesh.blendShapeFrames;
    expect(fullFrame.weight).toBe(100);
    expectArrayClose(fullFrame.deltaPositions, new Array(9).fill(0.5));
    expectArrayClose(fullFrame.deltaNormals ?? [], new Array(9).fill(1));
    expect(fullFrame.deltaTangents).toBeNull();
    expect(Array.from(emptyFrame.deltaPositions)).toEqual(new Array(9).fill(0));
    expect(emptyFrame.deltaNormals).toBeNull();
    expect(warn).toHaveBeenCalledTimes(1);
  });

  it('uses the configured frame weight', async () => {
    const { mesh } = await buildMeshAsync(triangle({ blendShapes: [shape('a', 9)] }), {
      materialFromIndex: index => index,
      logger: quietLogger(),
      frameWeight: 1
    });

    expect(mesh.blendShapeFrames[0].weight).toBe(1);
  });

  it('stops at the checkpoint after the signal is aborted', async () => {
    const controller = new AbortController();
    const awaitCaller = new CountingAwaitCaller(frame => {
      if (frame === 2) controller.abort();
    });
    const materialFromIndex = vi.fn((index: number) => index);

    const build = buildMeshAsync(triangle(), {
      materialFromIndex,
      awaitCaller,
      signal: controller.signal,
      logger: quietLogger()
    });

    await expect(build).rejects.toBeInstanceOf(MeshBuildCancelledError);
    await expect(build).rejects.toMatchObject({ stage: BUILD_STAGES.INDICES });
    expect(materialFromIndex).not.toHaveBeenCalled();
  });

  it('does not start with an already aborted signal', async () => {
    const controller = new AbortController();
    controller.abort();
    const awaitCaller = new CountingAwaitCaller();

    await expect(buildMeshAsync(triangle(), {
      materialFromIndex: index => index,
      awaitCaller,
      signal: controller.signal,
      logger: quietLogger()
    })).rejects.toBeInstanceOf(MeshBuildCancelledError);
    expect(awaitCaller.frames).toBe(0);
  });

  it('stops between blend shapes', async () => {
    const controller = new AbortController();
    const awaitCaller = new CountingAwaitCaller();
    const run = awaitCaller.run.bind(awaitCaller);
    awaitCaller.run = async <T>(action: () => T): Promise<T> => {
      const value = await run(action);
      controller.abort();
      return value;
    };

    await expect(buildMeshAsync(triangle({ blendShapes: [shape('a', 9), shape('b', 9)] }), {
      materialFromIndex: index => index,
      awaitCaller,
      signal: controller.signal,
      logger: quietLogger()
    })).rejects.toMatchObject({ stage: BUILD_STAGES.BLEND_SHAPES });
    expect(awaitCaller.runs).toBe(1);
  });
});
