/**
 * Axis Inverters
 *
 * glTF is right-handed; renderers with a left-handed convention negate one
 * axis on every position, normal and morph delta.
 */

import type { AxisInverter, Vec3 } from '../interfaces';
import type { Axis } from '../schemas';

export const ReverseZ: AxisInverter = {
  invertVector3: (x, y, z): Vec3 => [x, y, -z],
};

export const ReverseX: AxisInverter = {
  invertVector3: (x, y, z): Vec3 => [-x, y, z],
};

export const NoInversion: AxisInverter = {
  invertVector3: (x, y, z): Vec3 => [x, y, z],
};

/**
 * Select the inverter for a configured axis
 */
export function createAxisInverter(axis: Axis): AxisInverter {
  switch (axis) {
    case 'Z':
      return ReverseZ;
    case 'X':
      return ReverseX;
    case 'none':
      return NoInversion;
  }
}
