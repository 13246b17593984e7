/**
 * glTF Mesh Import
 */

export { decodeMesh, selectBufferMode, parseMeshDescription, type DecodeMeshOptions } from './mesh-decoder';
export { buildMeshAsync, buildBlendShapeFrame, BUILD_STAGES, type BuildMeshOptions, type BuildStage } from './mesh-builder';
export { DocumentAttributeReader, describeMesh, getGenerator, readTargetNames } from './document-reader';
export { loadGltfDocument, GltfParserFactory, type GltfInput, type LoadDocumentOptions } from './document-loader';
export { normalizeBoneWeights } from './helpers/vertex-accumulator';
export { pushFlippedTriangles } from './helpers/index-assembler';
export { trimUnusedVertices, findMaxIndex } from './helpers/vertex-trimmer';
export { computeBounds, recalculateNormals, recalculateTangents } from './helpers/topology';
export type * from './types';
