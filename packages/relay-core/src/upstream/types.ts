export type FetchImpl = typeof globalThis.fetch;

export interface GenerationRequest {
  prompt: string;
}

/**
 * Upstream JSON body as the exact text received. It is checked to be JSON
 * but never re-encoded, so large integers and `1.0` survive the relay.
 */
export interface GenerationResult {
  raw: string;
}

export type StatusResult =
  | { online: true; detail: unknown }
  | { online: false; reason: string };

export interface PromptRelay {
  isConfigured(): boolean;
  generate(prompt: string): Promise<GenerationResult>;
  checkStatus(): Promise<StatusResult>;
}
