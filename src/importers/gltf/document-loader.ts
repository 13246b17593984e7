/**
 * glTF Document Loader
 *
 * Parser selection by input type, plus optional preprocessing.
 */

import { Document, NodeIO } from '@gltf-transform/core';
import { ALL_EXTENSIONS } from '@gltf-transform/extensions';
import { dequantize } from '@gltf-transform/functions';
import { ERROR_MESSAGES } from '../../constants/errors';
import { MeshErrorFactory } from '../../errors';
import { Logger, LoggerFactory } from '../../utils/logger';

export type GltfInput = Uint8Array | ArrayBuffer | string;

/**
 * Parser interface
 */
export interface IGltfParser {
  parse(input: GltfInput): Promise<Document>;
  getType(): string;
}

function createIO(): NodeIO {
  return new NodeIO().registerExtensions(ALL_EXTENSIONS);
}

/**
 * GLB Parser - binary GLB from memory
 */
class GlbParser implements IGltfParser {
  private io = createIO();

  async parse(input: GltfInput): Promise<Document> {
    if (typeof input === 'string') {
      throw new Error('GlbParser expects binary input, received string path');
    }
    return this.io.readBinary(input instanceof Uint8Array ? input : new Uint8Array(input));
  }

  getType(): string {
    return 'GLB';
  }
}

/**
 * File Parser - .gltf or .glb on disk, external resources resolved beside it
 */
class GltfFileParser implements IGltfParser {
  private io = createIO();

  async parse(input: GltfInput): Promise<Document> {
    if (typeof input !== 'string') {
      throw new Error('GltfFileParser expects file path string, received binary input');
    }
    return this.io.read(input);
  }

  getType(): string {
    return 'GLTF';
  }
}

export const GltfParserFactory = {
  createParser(input: GltfInput): IGltfParser {
    return typeof input === 'string' ? new GltfFileParser() : new GlbParser();
  }
};

export interface LoadDocumentOptions {
  /**
   * Convert quantized vertex attributes (KHR_mesh_quantization) to float32
   * before decoding.
   *
   * @default false
   */
  dequantize?: boolean;
  logger?: Logger;
}

/**
 * Load a glTF document from a path or GLB bytes
 */
export async function loadGltfDocument(input: GltfInput, options: LoadDocumentOptions = {}): Promise<Document> {
  const logger = options.logger ?? LoggerFactory.forDecode();
  const parser = GltfParserFactory.createParser(input);

  let document: Document;
  try {
    document = await logger.withTiming('parse', () => parser.parse(input), { parser: parser.getType() });
  } catch (error) {
    throw MeshErrorFactory.decodeError(
      `${ERROR_MESSAGES.DOCUMENT_LOAD_FAILED}: ${error instanceof Error ? error.message : String(error)}`,
      'parse',
      { parser: parser.getType(), input: typeof input === 'string' ? input : `${input.byteLength} bytes` }
    );
  }

  if (options.dequantize) {
    logger.info('Dequantizing mesh attributes', {
      stage: 'preprocessing',
      operation: 'dequantize'
    });
    await document.transform(dequantize());
  }

  return document;
}
