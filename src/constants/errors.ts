/**
 * Error Constants for the glTF Mesh Importer
 */

/**
 * Error Codes
 */
export const ERROR_CODES = {
  SCHEMA_VALIDATION_ERROR: 'MESH_SCHEMA_VALIDATION_ERROR',
  CONFIG_VALIDATION_ERROR: 'MESH_CONFIG_VALIDATION_ERROR',
  VALIDATION_ERROR: 'MESH_VALIDATION_ERROR',
  DECODE_ERROR: 'MESH_DECODE_ERROR',
  UNSUPPORTED_INDEX_FORMAT: 'MESH_UNSUPPORTED_INDEX_FORMAT',
  MORPH_TARGET_LENGTH_MISMATCH: 'MESH_MORPH_TARGET_LENGTH_MISMATCH',
  BUILD_CANCELLED: 'MESH_BUILD_CANCELLED',
} as const;

/**
 * Error Messages
 */
export const ERROR_MESSAGES = {
  INVALID_CONFIG: 'Invalid importer configuration',
  INVALID_MESH_DESCRIPTION: 'Invalid mesh description',
  MESH_NOT_FOUND: 'Mesh index out of range',
  ACCESSOR_NOT_FOUND: 'Accessor index out of range',
  EMPTY_ACCESSOR: 'Accessor has no data',
  UNSUPPORTED_INDEX_FORMAT: 'Unsupported index component type',
  MORPH_TARGET_LENGTH_MISMATCH: 'Morph target length differs from primitive vertex count',
  BUILD_CANCELLED: 'Mesh build was cancelled',
  DOCUMENT_LOAD_FAILED: 'Failed to load glTF document',
} as const;

export type ErrorCode = typeof ERROR_CODES[keyof typeof ERROR_CODES];
