import { expect } from 'chai';
import * as sinon from 'sinon';
import { LoggerInterface, childLogger, createLogger } from '../src/logging';
import { createMockLogger } from './mocks/mockLogger';

describe('logging', () => {
  it('creates a logger with every level and a child factory', () => {
    const logger = createLogger({ level: 'silent' });

    expect(() => {
      logger.info('plain message');
      logger.debug({ seq: 1 }, 'with bindings');
      logger.warn('with extra args', { seq: 2 });
    }).to.not.throw();
    expect(logger.child).to.be.a('function');
  });

  it('binds context through child when the logger has one', () => {
    const logger = createMockLogger();

    const child = childLogger(logger, { component: 'Test' });

    expect(child).to.not.equal(logger);
  });

  it('returns the logger itself when it has no child factory', () => {
    const flat: LoggerInterface = {
      trace: sinon.stub<unknown[], void>(),
      debug: sinon.stub<unknown[], void>(),
      info: sinon.stub<unknown[], void>(),
      warn: sinon.stub<unknown[], void>(),
      error: sinon.stub<unknown[], void>(),
    };

    expect(childLogger(flat, { component: 'Test' })).to.equal(flat);
  });
});
