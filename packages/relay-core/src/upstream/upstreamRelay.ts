import {
  UpstreamNotConfiguredError,
  UpstreamResponseError,
  UpstreamTimeoutError,
  UpstreamUnreachableError,
} from './errors.js';
import type { FetchImpl, GenerationResult, PromptRelay, StatusResult } from './types.js';
import { buildUpstreamUrl, normalizeUpstreamBase } from './upstreamUrl.js';

export const DEFAULT_GENERATE_TIMEOUT_MS = 300_000;
export const DEFAULT_STATUS_TIMEOUT_MS = 10_000;

const NOT_CONFIGURED_REASON = 'not configured';

function resolveFetch(): FetchImpl {
  if (typeof globalThis.fetch === 'function') {
    return globalThis.fetch;
  }

  throw new Error(
    'Global fetch API is not available in this runtime. Provide fetchImpl when constructing UpstreamRelay.',
  );
}

function describeFailure(error: unknown): string {
  if (!(error instanceof Error)) {
    return String(error);
  }

  const { cause } = error;
  if (cause instanceof Error && cause.message && cause.message !== error.message) {
    return `${error.message} (${cause.message})`;
  }

  return error.message;
}

export interface UpstreamRelayOptions {
  fetchImpl?: FetchImpl;
  generateTimeoutMs?: number;
  statusTimeoutMs?: number;
}

type ExchangeOutcome =
  | { kind: 'response'; status: number; ok: boolean; body: string }
  | { kind: 'timeout' }
  | { kind: 'unreachable'; error: unknown };

export class UpstreamRelay implements PromptRelay {
  private readonly baseUrl: string;

  private readonly fetchImpl: FetchImpl;

  private readonly generateTimeoutMs: number;

  private readonly statusTimeoutMs: number;

  constructor(baseUrl: string, options: UpstreamRelayOptions = {}) {
    this.baseUrl = normalizeUpstreamBase(baseUrl);
    this.fetchImpl = options.fetchImpl ?? resolveFetch();
    this.generateTimeoutMs = options.generateTimeoutMs ?? DEFAULT_GENERATE_TIMEOUT_MS;
    this.statusTimeoutMs = options.statusTimeoutMs ?? DEFAULT_STATUS_TIMEOUT_MS;
  }

  isConfigured(): boolean {
    return this.baseUrl.length > 0;
  }

  async generate(prompt: string): Promise<GenerationResult> {
    if (!this.isConfigured()) {
      throw new UpstreamNotConfiguredError();
    }

    const url = buildUpstreamUrl(this.baseUrl, '/generate');
    const outcome = await this.exchange(
      url,
      {
        method: 'POST',
        headers: { 'Content-Type': 'application/json' },
        body: JSON.stringify({ prompt }),
      },
      this.generateTimeoutMs,
    );

    if (outcome.kind === 'timeout') {
      throw new UpstreamTimeoutError(this.generateTimeoutMs);
    }

    if (outcome.kind === 'unreachable') {
      throw new UpstreamUnreachableError(
        `Cannot connect to upstream at ${this.baseUrl}: ${describeFailure(outcome.error)}`,
        { cause: outcome.error },
      );
    }

    if (!outcome.ok) {
      throw new UpstreamResponseError(
        outcome.status,
        `Upstream request failed with status ${outcome.status}: ${outcome.body}`,
      );
    }

    try {
      JSON.parse(outcome.body);
    } catch (error) {
      throw new UpstreamResponseError(
        502,
        `Upstream returned a body that is not JSON: ${describeFailure(error)}`,
      );
    }

    return { raw: outcome.body };
  }

  async checkStatus(): Promise<StatusResult> {
    if (!this.isConfigured()) {
      return { online: false, reason: NOT_CONFIGURED_REASON };
    }

    const url = buildUpstreamUrl(this.baseUrl, '/health');
    const outcome = await this.exchange(url, { method: 'GET' }, this.statusTimeoutMs);

    if (outcome.kind === 'timeout') {
      return { online: false, reason: `timed out after ${this.statusTimeoutMs}ms` };
    }

    if (outcome.kind === 'unreachable') {
      return { online: false, reason: `cannot connect: ${describeFailure(outcome.error)}` };
    }

    if (!outcome.ok) {
      return { online: false, reason: `upstream responded with status ${outcome.status}` };
    }

    try {
      const detail: unknown = JSON.parse(outcome.body);
      return { online: true, detail };
    } catch (error) {
      return { online: false, reason: `malformed health response: ${describeFailure(error)}` };
    }
  }

  /**
   * Performs one request and reads its body under a single deadline.
   * Never rejects; transport failures come back as outcomes.
   */
  private async exchange(url: string, init: RequestInit, timeoutMs: number): Promise<ExchangeOutcome> {
    const controller = new AbortController();
    const timeout = setTimeout(() => controller.abort(), timeoutMs);

    try {
      const response = await this.fetchImpl(url, { ...init, signal: controller.signal });
      const body = await response.text();
      return { kind: 'response', status: response.status, ok: response.ok, body };
    } catch (error) {
      if (controller.signal.aborted) {
        return { kind: 'timeout' };
      }
      return { kind: 'unreachable', error };
    } finally {
      clearTimeout(timeout);
    }
  }
}

export default UpstreamRelay;
