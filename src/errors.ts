/**
 * Error Classes for Mesh Import
 *
 * Tagged union hierarchy with Zod validation details where they apply.
 */

import { ZodError, ZodIssue } from 'zod';
import { ERROR_CODES } from './constants/errors';

/**
 * Base Mesh Error Class
 *
 * Base error class for all mesh import operations with tagged union pattern.
 */
export abstract class BaseMeshError extends Error {
  abstract readonly _tag: string;
  abstract readonly code: string;
  readonly timestamp: Date;
  readonly context?: Record<string, unknown>;

  constructor(message: string, context?: Record<string, unknown>) {
    super(message);
    this.name = this.constructor.name;
    this.timestamp = new Date();
    this.context = context;
  }

  /**
   * Get error details for logging
   */
  getDetails(): Record<string, unknown> {
    return {
      name: this.name,
      message: this.message,
      code: this.code,
      tag: this._tag,
      timestamp: this.timestamp,
      context: this.context,
    };
  }
}

/**
 * Mesh Configuration Error
 *
 * Error for importer configuration validation failures.
 */
export class MeshConfigError extends BaseMeshError {
  readonly _tag = 'MeshConfigError' as const;
  readonly code = ERROR_CODES.CONFIG_VALIDATION_ERROR;
  readonly configKey: string;
  readonly zodError?: ZodError;

  constructor(message: string, configKey: string, zodError?: ZodError) {
    super(message, { configKey, zodError });
    this.configKey = configKey;
    this.zodError = zodError;
  }

  /**
   * Get formatted validation errors
   */
  getFormattedErrors(): string[] {
    return this.zodError?.issues.map(issue =>
      `${issue.path.join('.')}: ${issue.message}`
    ) || [];
  }
}

/**
 * Mesh Validation Error
 *
 * Error for malformed mesh descriptions or accessor lookups.
 */
export class MeshValidationError extends BaseMeshError {
  readonly _tag = 'MeshValidationError' as const;
  readonly code = ERROR_CODES.VALIDATION_ERROR;
  readonly field: string;
  readonly zodError?: ZodError;

  constructor(message: string, field: string, context?: Record<string, unknown>, zodError?: ZodError) {
    super(message, { field, ...context });
    this.field = field;
    this.zodError = zodError;
  }

  /**
   * Get Zod validation issues
   */
  getValidationIssues(): ZodIssue[] {
    return this.zodError?.issues || [];
  }
}

/**
 * Unsupported Index Format Error
 *
 * Index accessors must be 8, 16 or 32 bit unsigned integers.
 */
export class UnsupportedIndexFormatError extends BaseMeshError {
  readonly _tag = 'UnsupportedIndexFormatError' as const;
  readonly code = ERROR_CODES.UNSUPPORTED_INDEX_FORMAT;
  readonly componentType: number;

  constructor(message: string, componentType: number, context?: Record<string, unknown>) {
    super(message, { componentType, ...context });
    this.componentType = componentType;
  }
}

/**
 * Morph Target Length Error
 *
 * Raised in independent-buffer mode when a delta accessor does not match
 * the primitive's vertex count.
 */
export class MorphTargetLengthError extends BaseMeshError {
  readonly _tag = 'MorphTargetLengthError' as const;
  readonly code = ERROR_CODES.MORPH_TARGET_LENGTH_MISMATCH;
  readonly expected: number;
  readonly actual: number;

  constructor(message: string, expected: number, actual: number, context?: Record<string, unknown>) {
    super(message, { expected, actual, ...context });
    this.expected = expected;
    this.actual = actual;
  }
}

/**
 * Mesh Build Cancelled Error
 */
export class MeshBuildCancelledError extends BaseMeshError {
  readonly _tag = 'MeshBuildCancelledError' as const;
  readonly code = ERROR_CODES.BUILD_CANCELLED;
  readonly stage: string;

  constructor(message: string, stage: string, context?: Record<string, unknown>) {
    super(message, { stage, ...context });
    this.stage = stage;
  }
}

/**
 * Mesh Decode Error
 *
 * Error for document loading and preprocessing failures.
 */
export class MeshDecodeError extends BaseMeshError {
  readonly _tag = 'MeshDecodeError' as const;
  readonly code = ERROR_CODES.DECODE_ERROR;
  readonly stage: string;

  constructor(message: string, stage: string, context?: Record<string, unknown>) {
    super(message, { stage, ...context });
    this.stage = stage;
  }
}

/**
 * Union type for all mesh import errors
 */
export type MeshError =
  | MeshConfigError
  | MeshValidationError
  | UnsupportedIndexFormatError
  | MorphTargetLengthError
  | MeshBuildCancelledError
  | MeshDecodeError;

/**
 * Error factory functions
 */
export const MeshErrorFactory = {
  configError(message: string, configKey: string, zodError?: ZodError): MeshConfigError {
    return new MeshConfigError(message, configKey, zodError);
  },

  validationError(message: string, field: string, context?: Record<string, unknown>, zodError?: ZodError): MeshValidationError {
    return new MeshValidationError(message, field, context, zodError);
  },

  unsupportedIndexFormat(message: string, componentType: number, context?: Record<string, unknown>): UnsupportedIndexFormatError {
    return new UnsupportedIndexFormatError(message, componentType, context);
  },

  morphTargetLength(message: string, expected: number, actual: number, context?: Record<string, unknown>): MorphTargetLengthError {
    return new MorphTargetLengthError(message, expected, actual, context);
  },

  buildCancelled(message: string, stage: string, context?: Record<string, unknown>): MeshBuildCancelledError {
    return new MeshBuildCancelledError(message, stage, context);
  },

  decodeError(message: string, stage: string, context?: Record<string, unknown>): MeshDecodeError {
    return new MeshDecodeError(message, stage, context);
  },
};

/**
 * Type guard for errors raised by this library
 */
export function isMeshError(error: unknown): error is MeshError {
  return error instanceof BaseMeshError;
}
