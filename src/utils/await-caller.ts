/**
 * Await Callers
 *
 * Checkpoint strategies for the cooperative build pipeline.
 */

import type { AwaitCaller } from '../interfaces';

/**
 * Continues on the microtask queue; never lets timers or I/O run
 */
export class ImmediateAwaitCaller implements AwaitCaller {
  async nextFrame(): Promise<void> {
    await Promise.resolve();
  }

  async run<T>(action: () => T): Promise<T> {
    return action();
  }
}

/**
 * Yields to the Node.js event loop at every checkpoint
 */
export class TaskQueueAwaitCaller implements AwaitCaller {
  nextFrame(): Promise<void> {
    return new Promise<void>(resolve => {
      setImmediate(() => resolve());
    });
  }

  async run<T>(action: () => T): Promise<T> {
    await this.nextFrame();
    return action();
  }
}
