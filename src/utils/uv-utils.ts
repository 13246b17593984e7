/**
 * UV Decoding
 *
 * The V axis is flipped on import. Older exports of one generator wrote
 * TEXCOORD_0 with a plain sign flip instead, so those assets are decoded
 * with the legacy rule. The mode is resolved once per asset.
 */

import type { Vec2 } from '../interfaces';
import type { LegacyUvConfig } from '../schemas';

export enum UvDecodeMode {
  /** (u, v) -> (u, 1 - v) */
  FlipV = 'flip-v',
  /** (u, v) -> (u, -v) */
  LegacyFlipY = 'legacy-flip-y',
}

export function decodeUv(mode: UvDecodeMode, u: number, v: number): Vec2 {
  switch (mode) {
    case UvDecodeMode.FlipV:
      return [u, 1 - v];
    case UvDecodeMode.LegacyFlipY:
      return [u, -v];
  }
}

/**
 * Parse "<prefix><major>.<minor>[...]" into a version pair
 */
export function parseGeneratorVersion(generator: string | undefined, prefix: string): { major: number; minor: number } | null {
  if (!generator || !generator.startsWith(prefix)) {
    return null;
  }

  const [majorText, minorText] = generator.slice(prefix.length).split('.');
  const major = Number.parseInt(majorText ?? '', 10);
  const minor = Number.parseInt(minorText ?? '', 10);
  if (Number.isNaN(major) || Number.isNaN(minor)) {
    return null;
  }

  return { major, minor };
}

/**
 * Resolve the TEXCOORD_0 decode mode from the asset generator string
 */
export function resolveUvDecodeMode(generator: string | undefined, legacy: LegacyUvConfig): UvDecodeMode {
  const version = parseGeneratorVersion(generator, legacy.generatorPrefix);
  if (!version) {
    return UvDecodeMode.FlipV;
  }

  const older = version.major < legacy.major
    || (version.major === legacy.major && version.minor < legacy.minor);

  return older ? UvDecodeMode.LegacyFlipY : UvDecodeMode.FlipV;
}
