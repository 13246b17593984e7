import { describe, it, expect } from 'vitest';
import { UvDecodeMode, decodeUv, parseGeneratorVersion, resolveUvDecodeMode } from '../src/utils/uv-utils';
import { NoInversion, ReverseX, ReverseZ, createAxisInverter } from '../src/utils/axis-inverter';
import { LegacyUvSchema } from '../src/schemas';
import { expectArrayClose } from './helpers/fake-reader';

const legacy = LegacyUvSchema.parse({});

describe('decodeUv', () => {
  it('flips V', () => {
    expectArrayClose(decodeUv(UvDecodeMode.FlipV, 0.25, 0.75), [0.25, 0.25]);
  });

  it('negates V in legacy mode', () => {
    expectArrayClose(decodeUv(UvDecodeMode.LegacyFlipY, 0.25, 0.75), [0.25, -0.75]);
  });
});

describe('parseGeneratorVersion', () => {
  it('reads major and minor after the prefix', () => {
    expect(parseGeneratorVersion('UniGLTF-1.15', 'UniGLTF-')).toEqual({ major: 1, minor: 15 });
    expect(parseGeneratorVersion('UniGLTF-2.0.3', 'UniGLTF-')).toEqual({ major: 2, minor: 0 });
  });

  it('returns null for other generators or unparsable versions', () => {
    expect(parseGeneratorVersion('Khronos glTF Blender I/O', 'UniGLTF-')).toBeNull();
    expect(parseGeneratorVersion('UniGLTF-beta', 'UniGLTF-')).toBeNull();
    expect(parseGeneratorVersion(undefined, 'UniGLTF-')).toBeNull();
  });
});

describe('resolveUvDecodeMode', () => {
  it.each([
    ['UniGLTF-1.15', UvDecodeMode.LegacyFlipY],
    ['UniGLTF-0.99', UvDecodeMode.LegacyFlipY],
    ['UniGLTF-1.16', UvDecodeMode.FlipV],
    ['UniGLTF-1.27', UvDecodeMode.FlipV],
    ['UniGLTF-2.0', UvDecodeMode.FlipV],
    ['other', UvDecodeMode.FlipV],
  ])('resolves %s to %s', (generator, mode) => {
    expect(resolveUvDecodeMode(generator, legacy)).toBe(mode);
  });

  it('uses FlipV without a generator', () => {
    expect(resolveUvDecodeMode(undefined, legacy)).toBe(UvDecodeMode.FlipV);
  });

  it('honours a configured prefix and threshold', () => {
    const custom = LegacyUvSchema.parse({ generatorPrefix: 'Exporter/', major: 3, minor: 0 });

    expect(resolveUvDecodeMode('Exporter/2.9', custom)).toBe(UvDecodeMode.LegacyFlipY);
    expect(resolveUvDecodeMode('UniGLTF-1.0', custom)).toBe(UvDecodeMode.FlipV);
  });
});

describe('axis inverters', () => {
  it('negate a single axis', () => {
    expect(ReverseZ.invertVector3(1, 2, 3)).toEqual([1, 2, -3]);
    expect(ReverseX.invertVector3(1, 2, 3)).toEqual([-1, 2, 3]);
    expect(NoInversion.invertVector3(1, 2, 3)).toEqual([1, 2, 3]);
  });

  it('are selected by axis name', () => {
    expect(createAxisInverter('Z')).toBe(ReverseZ);
    expect(createAxisInverter('X')).toBe(ReverseX);
    expect(createAxisInverter('none')).toBe(NoInversion);
  });
});
