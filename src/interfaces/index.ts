/**
 * Collaborator Interfaces
 *
 * Contracts the decoder and builder consume from their callers.
 */

/**
 * Typed array types an accessor may be backed by
 */
export type AccessorArray =
  | Int8Array
  | Uint8Array
  | Int16Array
  | Uint16Array
  | Int32Array
  | Uint32Array
  | Float32Array
  | Float64Array;

/**
 * Decoded accessor contents
 */
export interface AccessorView {
  /** glTF component type (5120 - 5126) */
  componentType: number;
  /** Components per element: 1 for SCALAR, 2 for VEC2 and so on */
  elementSize: number;
  /** Element count */
  count: number;
  /** Integer components are mapped to [0, 1] or [-1, 1] */
  normalized: boolean;
  array: AccessorArray;
}

/**
 * Accessor reader
 */
export interface AttributeReader {
  read(accessorIndex: number): AccessorView;
}

export type Vec2 = [number, number];
export type Vec3 = [number, number, number];
export type Vec4 = [number, number, number, number];

/**
 * Converts vectors between coordinate handedness conventions
 */
export interface AxisInverter {
  invertVector3(x: number, y: number, z: number): Vec3;
}

/**
 * Cooperative scheduler for the build pipeline
 */
export interface AwaitCaller {
  /** Suspend until the caller lets the pipeline continue */
  nextFrame(): Promise<void>;
  /** Run a synchronous action and hand back its result */
  run<T>(action: () => T): Promise<T>;
}

/**
 * Resolves a glTF material index into the caller's material handle
 */
export type MaterialResolver<TMaterial> = (materialIndex: number) => TMaterial;
