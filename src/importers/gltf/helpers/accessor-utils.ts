/**
 * Accessor Utilities
 *
 * Element access over AccessorView with glTF normalization rules.
 */

import type { AccessorView, AttributeReader } from '../../../interfaces';
import { COMPONENT_TYPES, NO_ACCESSOR } from '../../../constants/mesh';
import { ERROR_MESSAGES } from '../../../constants/errors';
import { MeshErrorFactory } from '../../../errors';

/**
 * Map a normalized integer component onto [0, 1] or [-1, 1]
 */
export function denormalize(value: number, componentType: number): number {
  switch (componentType) {
    case COMPONENT_TYPES.UNSIGNED_BYTE:
      return value / 255;
    case COMPONENT_TYPES.UNSIGNED_SHORT:
      return value / 65535;
    case COMPONENT_TYPES.BYTE:
      return Math.max(value / 127, -1);
    case COMPONENT_TYPES.SHORT:
      return Math.max(value / 32767, -1);
    default:
      return value;
  }
}

/**
 * Read one component as a float, or `fallback` when the accessor has fewer components
 */
export function readFloat(view: AccessorView, element: number, component: number, fallback = 0): number {
  if (component >= view.elementSize) {
    return fallback;
  }
  const raw = view.array[element * view.elementSize + component];
  return view.normalized ? denormalize(raw, view.componentType) : raw;
}

/**
 * Read one component as stored
 */
export function readRaw(view: AccessorView, element: number, component: number): number {
  if (component >= view.elementSize) {
    return 0;
  }
  return view.array[element * view.elementSize + component];
}

/**
 * Read an accessor the description marks as optional
 */
export function readOptional(
  reader: AttributeReader,
  accessorIndex: number | undefined,
  semantic: string,
  expectedCount: number
): AccessorView | null {
  if (accessorIndex === undefined || accessorIndex === NO_ACCESSOR) {
    return null;
  }
  const view = reader.read(accessorIndex);
  if (view.count !== expectedCount) {
    throw MeshErrorFactory.validationError(
      `${semantic} has ${view.count} elements, expected ${expectedCount}`,
      semantic,
      { accessorIndex, expected: expectedCount, actual: view.count }
    );
  }
  return view;
}

/**
 * Ensure an accessor carries at least `minSize` components per element
 */
export function expectElementSize(view: AccessorView, minSize: number, semantic: string): void {
  if (view.elementSize < minSize) {
    throw MeshErrorFactory.validationError(
      `${semantic} needs ${minSize} components per element, got ${view.elementSize}`,
      semantic,
      { elementSize: view.elementSize }
    );
  }
  if (view.array.length < view.count * view.elementSize) {
    throw MeshErrorFactory.validationError(ERROR_MESSAGES.EMPTY_ACCESSOR, semantic, {
      count: view.count,
      length: view.array.length
    });
  }
}
