/**
 * glTF Mesh Importer
 *
 * Decodes glTF meshes into renderer-ready vertex, index, skin and blend
 * shape buffers.
 *
 * @example
 * ```typescript
 * import { defineConfig } from 'gltf-mesh-importer';
 *
 * const importer = defineConfig({ axis: 'Z' });
 *
 * const document = await importer.load('model.glb');
 * const { mesh, materials } = await importer.importMesh(document, 0, {
 *   materialFromIndex: index => myMaterials[index]
 * });
 * ```
 */

import { Document } from '@gltf-transform/core';
import { ZodError } from 'zod';
import { MeshErrorFactory } from './errors';
import { ERROR_MESSAGES } from './constants/errors';
import { MeshImporterConfigSchema, type MeshImporterConfig, type MeshImporterConfigInput } from './schemas';
import type { AwaitCaller, MaterialResolver } from './interfaces';
import { Logger, createLogger } from './utils/logger';
import { LOGGER_PREFIXES } from './constants/config';
import { createAxisInverter } from './utils/axis-inverter';
import { resolveUvDecodeMode, type UvDecodeMode } from './utils/uv-utils';
import { decodeMesh } from './importers/gltf/mesh-decoder';
import { buildMeshAsync } from './importers/gltf/mesh-builder';
import { DocumentAttributeReader, describeMesh, getGenerator } from './importers/gltf/document-reader';
import { loadGltfDocument, type GltfInput } from './importers/gltf/document-loader';
import type { MeshBuildResult, MeshWithMaterials } from './importers/gltf/types';

export interface ImportMeshOptions<TMaterial> {
  materialFromIndex: MaterialResolver<TMaterial>;
  awaitCaller?: AwaitCaller;
  signal?: AbortSignal;
}

/**
 * Configured importer
 */
export class GltfMeshImporter {
  private config: MeshImporterConfig;
  private logger: Logger;
  private decodeLogger: Logger;
  private buildLogger: Logger;

  constructor(config: MeshImporterConfigInput = {}) {
    try {
      this.config = MeshImporterConfigSchema.parse(config);
    } catch (error) {
      if (error instanceof ZodError) {
        throw MeshErrorFactory.configError(ERROR_MESSAGES.INVALID_CONFIG, 'MeshImporterConfig', error);
      }
      throw error;
    }

    this.logger = createLogger({ level: this.config.logLevel, prefix: LOGGER_PREFIXES.DEFAULT });
    this.decodeLogger = this.logger.child(LOGGER_PREFIXES.DECODE);
    this.buildLogger = this.logger.child(LOGGER_PREFIXES.BUILD);
    this.logger.logConfig({ ...this.config });
  }

  /**
   * Load a document from a .gltf/.glb path or GLB bytes
   */
  async load(input: GltfInput): Promise<Document> {
    return loadGltfDocument(input, { dequantize: this.config.dequantize, logger: this.logger });
  }

  /**
   * TEXCOORD_0 decode mode for a document
   */
  uvModeFor(document: Document): UvDecodeMode {
    return resolveUvDecodeMode(getGenerator(document), this.config.legacyUv);
  }

  /**
   * Decode mesh `meshIndex` without packaging it
   */
  decode(document: Document, meshIndex: number): MeshBuildResult {
    return decodeMesh(describeMesh(document, meshIndex), new DocumentAttributeReader(document), {
      inverter: createAxisInverter(this.config.axis),
      uvMode: this.uvModeFor(document),
      logger: this.decodeLogger,
      meshIndex
    });
  }

  /**
   * Decode and package mesh `meshIndex`
   */
  async importMesh<TMaterial>(
    document: Document,
    meshIndex: number,
    options: ImportMeshOptions<TMaterial>
  ): Promise<MeshWithMaterials<TMaterial>> {
    return this.logger.withTiming(`importMesh#${meshIndex}`, async () => {
      const result = this.decode(document, meshIndex);
      return buildMeshAsync(result, {
        materialFromIndex: options.materialFromIndex,
        awaitCaller: options.awaitCaller,
        signal: options.signal,
        logger: this.buildLogger,
        frameWeight: this.config.frameWeight
      });
    }, { meshIndex });
  }

  /**
   * Get current configuration
   */
  getConfig(): MeshImporterConfig {
    return { ...this.config, legacyUv: { ...this.config.legacyUv } };
  }
}

/**
 * Create importer instance with configuration
 */
export function defineConfig(config: MeshImporterConfigInput = {}): GltfMeshImporter {
  return new GltfMeshImporter(config);
}

export * from './importers/gltf';
export * from './errors';
export type * from './interfaces';
export {
  MeshImporterConfigSchema,
  MeshDescriptionSchema,
  type MeshImporterConfig,
  type MeshImporterConfigInput,
  type MeshDescription,
  type MeshDescriptionInput,
  type PrimitiveDescription,
  type MorphTargetDescription,
  type LegacyUvConfig,
  type Axis
} from './schemas';
export { Logger, LogLevel, LoggerFactory, createLogger, type LoggerOptions, type LoggerContext } from './utils/logger';
export { createAxisInverter, ReverseZ, ReverseX, NoInversion } from './utils/axis-inverter';
export { UvDecodeMode, decodeUv, resolveUvDecodeMode, parseGeneratorVersion } from './utils/uv-utils';
export { ImmediateAwaitCaller, TaskQueueAwaitCaller } from './utils/await-caller';
export { ERROR_CODES, ERROR_MESSAGES } from './constants/errors';
export { NO_INDICES, DEFAULT_MATERIAL_INDEX, COMPONENT_TYPES } from './constants/mesh';
