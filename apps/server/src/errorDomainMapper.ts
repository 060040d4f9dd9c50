import {
  UpstreamNotConfiguredError,
  UpstreamResponseError,
  UpstreamTimeoutError,
  UpstreamUnreachableError,
} from '@prompt-relay/relay-core';

export interface MappedError {
  statusCode: number;
  errorCode: string;
  detail: string;
}

export class ErrorDomainMapper {
  map(error: unknown): MappedError {
    if (error instanceof UpstreamNotConfiguredError) {
      return this.build(
        'E_NOT_CONFIGURED',
        503,
        'Upstream not configured. Set COLAB_API_URL in your .env file.',
      );
    }

    if (error instanceof UpstreamUnreachableError) {
      return this.build(
        'E_UNREACHABLE',
        503,
        'Cannot connect to the model server. Make sure the notebook serving it is running.',
      );
    }

    if (error instanceof UpstreamTimeoutError) {
      const seconds = Math.round(error.timeoutMs / 1000);
      return this.build(
        'E_TIMEOUT',
        504,
        `Model server timed out after ${seconds}s. Generation can take a few minutes, please try again.`,
      );
    }

    if (error instanceof UpstreamResponseError) {
      return this.build('E_UPSTREAM', error.status, error.message);
    }

    return this.build('E_UNEXPECTED', 500, 'Internal Server Error');
  }

  // eslint-disable-next-line class-methods-use-this
  private build(errorCode: string, statusCode: number, detail: string): MappedError {
    return { statusCode, errorCode, detail };
  }
}
