/**
 * Zod Schemas for the glTF Mesh Importer
 *
 * Importer configuration and the per-mesh input contract.
 */

import { z } from 'zod';
import { DEFAULT_CONFIG } from '../constants/config';
import { NO_INDICES } from '../constants/mesh';
import { LogLevel } from '../utils/logger';
import { AxisSchema, LogLevelSchema, AccessorIndexSchema } from './base-schemas';

/**
 * Legacy UV detection schema
 *
 * Assets whose generator starts with `generatorPrefix` and reports a
 * version older than `major.minor` decode TEXCOORD_0 with the legacy flip.
 */
export const LegacyUvSchema = z.object({
  generatorPrefix: z.string().min(1, 'Generator prefix cannot be empty').default(DEFAULT_CONFIG.LEGACY_UV_GENERATOR_PREFIX),
  major: z.number().int().nonnegative().default(DEFAULT_CONFIG.LEGACY_UV_MAJOR),
  minor: z.number().int().nonnegative().default(DEFAULT_CONFIG.LEGACY_UV_MINOR),
});

/**
 * Mesh Importer Configuration Schema
 */
export const MeshImporterConfigSchema = z.object({
  axis: AxisSchema.default(DEFAULT_CONFIG.AXIS),
  frameWeight: z.number().positive().default(DEFAULT_CONFIG.FRAME_WEIGHT),
  legacyUv: LegacyUvSchema.default({}),
  logLevel: LogLevelSchema.default(LogLevel.INFO),
  dequantize: z.boolean().default(DEFAULT_CONFIG.DEQUANTIZE),
});

/**
 * Primitive attribute map: POSITION is required, other semantics optional
 */
export const PrimitiveAttributesSchema = z
  .object({ POSITION: AccessorIndexSchema })
  .catchall(AccessorIndexSchema);

/**
 * Morph target schema
 */
export const MorphTargetSchema = z.object({
  POSITION: AccessorIndexSchema.optional(),
  NORMAL: AccessorIndexSchema.optional(),
  TANGENT: AccessorIndexSchema.optional(),
});

/**
 * Primitive description schema
 */
export const PrimitiveDescriptionSchema = z.object({
  attributes: PrimitiveAttributesSchema,
  indices: z.number().int().min(NO_INDICES).default(NO_INDICES),
  material: AccessorIndexSchema.optional(),
  targets: z.array(MorphTargetSchema).default([]),
});

/**
 * Mesh description schema
 */
export const MeshDescriptionSchema = z.object({
  name: z.string().optional(),
  primitives: z.array(PrimitiveDescriptionSchema).min(1, 'Mesh must have at least one primitive'),
  targetNames: z.array(z.string()).optional(),
});

/**
 * Type exports for TypeScript inference
 */
export type LegacyUvConfig = z.infer<typeof LegacyUvSchema>;
export type MeshImporterConfig = z.infer<typeof MeshImporterConfigSchema>;
export type MeshImporterConfigInput = z.input<typeof MeshImporterConfigSchema>;
export type Axis = z.infer<typeof AxisSchema>;
export type PrimitiveAttributes = z.infer<typeof PrimitiveAttributesSchema>;
export type MorphTargetDescription = z.infer<typeof MorphTargetSchema>;
export type PrimitiveDescription = z.infer<typeof PrimitiveDescriptionSchema>;
export type MeshDescription = z.infer<typeof MeshDescriptionSchema>;
export type MeshDescriptionInput = z.input<typeof MeshDescriptionSchema>;

export { AxisSchema, LogLevelSchema, AccessorIndexSchema } from './base-schemas';
