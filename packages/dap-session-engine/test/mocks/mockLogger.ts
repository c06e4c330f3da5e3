import * as sinon from 'sinon';
import type { LoggerInterface } from '../../src/logging';

export const createMockLogger = (): LoggerInterface => {
  const stub = () => sinon.stub();
  return {
    trace: stub(),
    debug: stub(),
    info: stub(),
    warn: stub(),
    error: stub(),
    child: sinon.stub().callsFake(() => createMockLogger()),
  };
};

/**
 * Runs `action` and returns what it threw or rejected with.
 */
export async function captureError(action: () => unknown): Promise<unknown> {
  try {
    await action();
  } catch (e: unknown) {
    return e;
  }
  throw new Error('Expected the action to fail, but it succeeded');
}
