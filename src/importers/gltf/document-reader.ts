/**
 * glTF-Transform Document Adapter
 *
 * AttributeReader and MeshDescription over a @gltf-transform/core Document.
 * Accessor and material indices follow the root's list order.
 */

import { Accessor, Document, Mesh } from '@gltf-transform/core';
import type { AccessorView, AttributeReader } from '../../interfaces';
import type { MeshDescriptionInput, MorphTargetDescription, PrimitiveAttributes } from '../../schemas';
import { ATTRIBUTE_SEMANTICS, NO_INDICES, TARGET_SEMANTICS } from '../../constants/mesh';
import { ERROR_MESSAGES } from '../../constants/errors';
import { MeshErrorFactory } from '../../errors';

/**
 * Reads accessors of a Document by index
 */
export class DocumentAttributeReader implements AttributeReader {
  private readonly accessors: Accessor[];

  constructor(document: Document) {
    this.accessors = document.getRoot().listAccessors();
  }

  get accessorCount(): number {
    return this.accessors.length;
  }

  read(accessorIndex: number): AccessorView {
    const accessor = this.accessors[accessorIndex];
    if (!accessor) {
      throw MeshErrorFactory.validationError(ERROR_MESSAGES.ACCESSOR_NOT_FOUND, 'accessor', {
        accessorIndex,
        accessorCount: this.accessors.length
      });
    }

    const array = accessor.getArray();
    if (!array) {
      throw MeshErrorFactory.validationError(ERROR_MESSAGES.EMPTY_ACCESSOR, 'accessor', {
        accessorIndex,
        name: accessor.getName()
      });
    }

    return {
      componentType: accessor.getComponentType(),
      elementSize: accessor.getElementSize(),
      count: accessor.getCount(),
      normalized: accessor.getNormalized(),
      array,
    };
  }
}

/**
 * Target names from mesh extras, if they are a list of strings
 */
export function readTargetNames(extras: Record<string, unknown>): string[] | undefined {
  const value = extras.targetNames;
  if (Array.isArray(value) && value.every((item): item is string => typeof item === 'string')) {
    return value;
  }
  return undefined;
}

/**
 * Generator string of the document's asset block
 */
export function getGenerator(document: Document): string | undefined {
  return document.getRoot().getAsset().generator;
}

/**
 * Describe mesh `meshIndex` of a Document in the decoder's input contract
 */
export function describeMesh(document: Document, meshIndex: number): MeshDescriptionInput {
  const root = document.getRoot();
  const mesh: Mesh | undefined = root.listMeshes()[meshIndex];
  if (!mesh) {
    throw MeshErrorFactory.validationError(ERROR_MESSAGES.MESH_NOT_FOUND, 'meshIndex', {
      meshIndex,
      meshCount: root.listMeshes().length
    });
  }

  const accessors = root.listAccessors();
  const materials = root.listMaterials();
  const indexOf = (accessor: Accessor | null): number | undefined =>
    accessor ? accessors.indexOf(accessor) : undefined;

  const primitives = mesh.listPrimitives().map((primitive, primitiveIndex) => {
    const position = primitive.getAttribute(ATTRIBUTE_SEMANTICS.POSITION);
    if (!position) {
      throw MeshErrorFactory.validationError('Primitive missing POSITION attribute', ATTRIBUTE_SEMANTICS.POSITION, {
        meshIndex,
        primitiveIndex
      });
    }

    const attributes: PrimitiveAttributes = { POSITION: accessors.indexOf(position) };
    for (const semantic of primitive.listSemantics()) {
      const accessor = primitive.getAttribute(semantic);
      if (accessor && semantic !== ATTRIBUTE_SEMANTICS.POSITION) {
        attributes[semantic] = accessors.indexOf(accessor);
      }
    }

    const targets = primitive.listTargets().map((target): MorphTargetDescription => ({
      POSITION: indexOf(target.getAttribute(TARGET_SEMANTICS.POSITION)),
      NORMAL: indexOf(target.getAttribute(TARGET_SEMANTICS.NORMAL)),
      TANGENT: indexOf(target.getAttribute(TARGET_SEMANTICS.TANGENT)),
    }));

    const material = primitive.getMaterial();

    return {
      attributes,
      indices: indexOf(primitive.getIndices()) ?? NO_INDICES,
      material: material ? materials.indexOf(material) : undefined,
      targets,
    };
  });

  return {
    name: mesh.getName() || undefined,
    primitives,
    targetNames: readTargetNames(mesh.getExtras()),
  };
}
