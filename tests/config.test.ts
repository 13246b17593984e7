import { describe, it, expect } from 'vitest';
import { GltfMeshImporter, defineConfig } from '../src';
import { MeshConfigError, MeshErrorFactory, isMeshError } from '../src/errors';
import { ERROR_CODES } from '../src/constants/errors';
import { LogLevel } from '../src/utils/logger';

describe('importer configuration', () => {
  it('fills defaults', () => {
    expect(new GltfMeshImporter().getConfig()).toEqual({
      axis: 'Z',
      frameWeight: 100,
      legacyUv: { generatorPrefix: 'UniGLTF-', major: 1, minor: 16 },
      logLevel: LogLevel.INFO,
      dequantize: false,
    });
  });

  it('keeps explicit values', () => {
    const config = defineConfig({ axis: 'none', frameWeight: 1, logLevel: LogLevel.ERROR, legacyUv: { minor: 20 } }).getConfig();

    expect(config.axis).toBe('none');
    expect(config.frameWeight).toBe(1);
    expect(config.legacyUv).toEqual({ generatorPrefix: 'UniGLTF-', major: 1, minor: 20 });
  });

  it('rejects a non-positive frame weight', () => {
    expect(() => defineConfig({ frameWeight: -1 })).toThrow(MeshConfigError);
  });

  it('reports the failing keys', () => {
    try {
      defineConfig({ frameWeight: 0 });
      expect.fail('expected a MeshConfigError');
    } catch (error) {
      expect(error).toBeInstanceOf(MeshConfigError);
      if (error instanceof MeshConfigError) {
        expect(error.code).toBe(ERROR_CODES.CONFIG_VALIDATION_ERROR);
        expect(error.getFormattedErrors().some(line => line.startsWith('frameWeight'))).toBe(true);
      }
    }
  });

  it('returns a copy of the configuration', () => {
    const importer = defineConfig({ logLevel: LogLevel.ERROR });
    const config = importer.getConfig();
    config.legacyUv.minor = 99;

    expect(importer.getConfig().legacyUv.minor).toBe(16);
  });
});

describe('mesh errors', () => {
  it('are tagged and carry context', () => {
    const error = MeshErrorFactory.unsupportedIndexFormat('bad indices', 5126, { primitiveIndex: 2 });

    expect(isMeshError(error)).toBe(true);
    expect(error._tag).toBe('UnsupportedIndexFormatError');
    expect(error.componentType).toBe(5126);
    expect(error.getDetails()).toMatchObject({ code: ERROR_CODES.UNSUPPORTED_INDEX_FORMAT, context: { primitiveIndex: 2 } });
    expect(isMeshError(new Error('plain'))).toBe(false);
  });
});
