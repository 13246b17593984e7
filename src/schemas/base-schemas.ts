/**
 * Base Schemas
 *
 * Common validation schemas shared by the config and mesh description schemas.
 */

import { z } from 'zod';
import { LogLevel } from '../utils/logger';

/**
 * Axis negated when converting glTF's right-handed space
 */
export const AxisSchema = z.enum(['Z', 'X', 'none']);

/**
 * Log level schema
 */
export const LogLevelSchema = z.nativeEnum(LogLevel);

/**
 * Accessor index schema
 */
export const AccessorIndexSchema = z.number().int().nonnegative();
