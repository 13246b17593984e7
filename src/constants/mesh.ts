/**
 * Mesh Constants
 *
 * glTF semantics, accessor component types and vertex defaults.
 */

/**
 * Sentinel accessor index for "not present"
 */
export const NO_ACCESSOR = -1;

/**
 * Index accessor sentinel meaning "generate a sequential triangle list"
 */
export const NO_INDICES = NO_ACCESSOR;

/**
 * Material index used when a primitive declares none
 */
export const DEFAULT_MATERIAL_INDEX = 0;

/**
 * Vertex attribute semantics read by the decoder
 */
export const ATTRIBUTE_SEMANTICS = {
  POSITION: 'POSITION',
  NORMAL: 'NORMAL',
  TEXCOORD_0: 'TEXCOORD_0',
  TEXCOORD_1: 'TEXCOORD_1',
  COLOR_0: 'COLOR_0',
  JOINTS_0: 'JOINTS_0',
  WEIGHTS_0: 'WEIGHTS_0',
} as const;

/**
 * Morph target semantics
 */
export const TARGET_SEMANTICS = {
  POSITION: 'POSITION',
  NORMAL: 'NORMAL',
  TANGENT: 'TANGENT',
} as const;

export type TargetSemantic = typeof TARGET_SEMANTICS[keyof typeof TARGET_SEMANTICS];

/**
 * glTF accessor component types (WebGL enums)
 */
export const COMPONENT_TYPES = {
  BYTE: 5120,
  UNSIGNED_BYTE: 5121,
  SHORT: 5122,
  UNSIGNED_SHORT: 5123,
  UNSIGNED_INT: 5125,
  FLOAT: 5126,
} as const;

/**
 * Number of components per vertex record, per buffer
 */
export const COMPONENTS = {
  POSITION: 3,
  NORMAL: 3,
  UV: 2,
  COLOR: 4,
  JOINTS: 4,
  WEIGHTS: 4,
  TANGENT: 4,
  DELTA: 3,
  TRIANGLE: 3,
} as const;

export const DEFAULT_COLOR: readonly [number, number, number, number] = [1, 1, 1, 1];
