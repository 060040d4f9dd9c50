import assert from 'node:assert/strict';
import { EventEmitter } from 'node:events';
import test from 'node:test';

import { registerProcessObservers, type ObserverLogger } from '../registerProcessObservers.js';

function createLogger(): ObserverLogger & { errors: string[]; infos: string[] } {
  const errors: string[] = [];
  const infos: string[] = [];
  return {
    errors,
    infos,
    error: (_obj: unknown, msg?: string) => {
      errors.push(msg ?? '');
    },
    info: (msg: string) => {
      infos.push(msg);
    },
  };
}

test('closes the server once even when both shutdown signals arrive', async () => {
  const proc = new EventEmitter();
  const logger = createLogger();
  let closed = 0;

  registerProcessObservers({
    proc,
    logger,
    shutdown: async () => {
      closed += 1;
    },
  });

  proc.emit('SIGTERM');
  proc.emit('SIGINT');
  await new Promise<void>((resolve) => {
    setImmediate(() => resolve());
  });

  assert.equal(closed, 1);
  assert.deepEqual(logger.infos, ['received SIGTERM, closing server']);
});

test('logs uncaught exceptions and unhandled rejections', () => {
  const proc = new EventEmitter();
  const logger = createLogger();

  registerProcessObservers({ proc, logger, shutdown: async () => {} });

  proc.emit('uncaughtException', new Error('boom'));
  proc.emit('unhandledRejection', 'nope');

  assert.deepEqual(logger.errors, ['uncaught exception', 'unhandled rejection']);
});

test('registers listeners only once per process', () => {
  const proc = new EventEmitter();
  const logger = createLogger();

  registerProcessObservers({ proc, logger, shutdown: async () => {} });
  registerProcessObservers({ proc, logger, shutdown: async () => {} });

  assert.equal(proc.listenerCount('SIGINT'), 1);
  assert.equal(proc.listenerCount('uncaughtException'), 1);
});

test('logs a failed shutdown instead of rejecting', async () => {
  const proc = new EventEmitter();
  const logger = createLogger();

  registerProcessObservers({
    proc,
    logger,
    shutdown: async () => {
      throw new Error('close failed');
    },
  });

  proc.emit('SIGINT');
  await new Promise<void>((resolve) => {
    setImmediate(() => resolve());
  });

  assert.deepEqual(logger.errors, ['failed to close server']);
});
