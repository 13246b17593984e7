import { expect } from 'vitest';
import type { AccessorArray, AccessorView, AttributeReader } from '../../src/interfaces';
import { COMPONENT_TYPES } from '../../src/constants/mesh';
import { Logger, LogLevel } from '../../src/utils/logger';

/**
 * In-memory accessor table
 */
export class FakeAttributeReader implements AttributeReader {
  private readonly views: AccessorView[] = [];

  add(
    array: AccessorArray,
    elementSize: number,
    componentType: number = COMPONENT_TYPES.FLOAT,
    normalized = false
  ): number {
    this.views.push({ componentType, elementSize, count: array.length / elementSize, normalized, array });
    return this.views.length - 1;
  }

  read(accessorIndex: number): AccessorView {
    const view = this.views[accessorIndex];
    if (!view) {
      throw new Error(`no accessor ${accessorIndex}`);
    }
    return view;
  }
}

export function quietLogger(): Logger {
  return new Logger({ level: LogLevel.ERROR, timestamp: false });
}

export function expectArrayClose(actual: ArrayLike<number>, expected: number[], digits = 5): void {
  expect(actual.length).toBe(expected.length);
  expected.forEach((value, i) => {
    expect(actual[i]).toBeCloseTo(value, digits);
  });
}
