import assert from 'node:assert/strict';
import test from 'node:test';

import {
  UpstreamNotConfiguredError,
  UpstreamResponseError,
  UpstreamTimeoutError,
  UpstreamUnreachableError,
} from '@prompt-relay/relay-core';

import { ErrorDomainMapper } from './errorDomainMapper.js';

const mapper = new ErrorDomainMapper();

test('not configured and unreachable both map to 503 with distinct codes', () => {
  const notConfigured = mapper.map(new UpstreamNotConfiguredError());
  const unreachable = mapper.map(new UpstreamUnreachableError('connect ECONNREFUSED'));

  assert.equal(notConfigured.statusCode, 503);
  assert.equal(notConfigured.errorCode, 'E_NOT_CONFIGURED');
  assert.match(notConfigured.detail, /not configured/);

  assert.equal(unreachable.statusCode, 503);
  assert.equal(unreachable.errorCode, 'E_UNREACHABLE');
  assert.match(unreachable.detail, /^Cannot connect/);
});

test('timeout maps to 504 and reports the deadline in seconds', () => {
  const mapped = mapper.map(new UpstreamTimeoutError(300_000));

  assert.deepEqual(mapped, {
    statusCode: 504,
    errorCode: 'E_TIMEOUT',
    detail: 'Model server timed out after 300s. Generation can take a few minutes, please try again.',
  });
});

test('upstream errors keep the upstream status code and message', () => {
  const mapped = mapper.map(new UpstreamResponseError(429, 'Upstream request failed with status 429: busy'));

  assert.deepEqual(mapped, {
    statusCode: 429,
    errorCode: 'E_UPSTREAM',
    detail: 'Upstream request failed with status 429: busy',
  });
});

test('anything else becomes an opaque 500', () => {
  assert.deepEqual(mapper.map(new Error('secret internals')), {
    statusCode: 500,
    errorCode: 'E_UNEXPECTED',
    detail: 'Internal Server Error',
  });
  assert.equal(mapper.map('string failure').statusCode, 500);
});
