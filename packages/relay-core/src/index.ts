export type {
  FetchImpl,
  GenerationRequest,
  GenerationResult,
  PromptRelay,
  StatusResult,
} from './upstream/types.js';
export {
  DEFAULT_GENERATE_TIMEOUT_MS,
  DEFAULT_STATUS_TIMEOUT_MS,
  UpstreamRelay,
} from './upstream/upstreamRelay.js';
export type { UpstreamRelayOptions } from './upstream/upstreamRelay.js';
export {
  UpstreamNotConfiguredError,
  UpstreamResponseError,
  UpstreamTimeoutError,
  UpstreamUnreachableError,
  isRelayError,
} from './upstream/errors.js';
export type { RelayError, RelayErrorKind } from './upstream/errors.js';
export { buildUpstreamUrl, normalizeUpstreamBase } from './upstream/upstreamUrl.js';
