/**
 * Configuration Constants
 */

/**
 * Default Configuration Values
 */
export const DEFAULT_CONFIG = {
  AXIS: 'Z' as const,
  FRAME_WEIGHT: 100,
  DEQUANTIZE: false,
  LEGACY_UV_GENERATOR_PREFIX: 'UniGLTF-',
  LEGACY_UV_MAJOR: 1,
  LEGACY_UV_MINOR: 16,
} as const;

/**
 * Logger prefixes
 */
export const LOGGER_PREFIXES = {
  DEFAULT: 'MeshImporter',
  DECODE: 'MeshImporter-Decode',
  BUILD: 'MeshImporter-Build',
} as const;
