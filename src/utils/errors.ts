import axios from 'axios';

export class AppError extends Error {
  constructor(
    message: string,
    public readonly statusCode = 500,
  ) {
    super(message);
    this.name = new.target.name;
  }
}

// Missing key, URL or model. Raised before any network I/O.
export class ConfigurationError extends AppError {
  constructor(message: string) {
    super(message, 500);
  }
}

export class ValidationError extends AppError {
  constructor(message: string) {
    super(message, 400);
  }
}

export class NotFoundError extends AppError {
  constructor(message: string) {
    super(message, 404);
  }
}

export type ProviderErrorKind = 'http' | 'network' | 'timeout' | 'response';

export class ProviderError extends AppError {
  constructor(
    public readonly kind: ProviderErrorKind,
    public readonly target: string,
    message: string,
    public readonly status?: number,
  ) {
    super(message, 502);
  }
}

export class LlmParseError extends AppError {
  constructor(
    message: string,
    public readonly preview: string,
  ) {
    super(message, 502);
  }
}

export interface IProviderFailure {
  label: string;
  error: Error;
}

export class LlmFallbackError extends AppError {
  constructor(public readonly failures: IProviderFailure[]) {
    super(describeFailures(failures), 502);
  }
}

function describeFailures(failures: IProviderFailure[]): string {
  const [primary, ...rest] = failures.map(
    (f) => `${f.error.name}: ${f.error.message}`,
  );
  if (rest.length === 0) {
    return `Primary LLM failed (${primary}).`;
  }
  return `Primary LLM failed (${primary}) and fallback also failed (${rest.join('; ')}).`;
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

// Maps an axios failure onto the provider error taxonomy.
export function toProviderError(error: unknown, target: string): Error {
  if (error instanceof AppError) {
    return error;
  }
  if (axios.isAxiosError(error)) {
    if (error.response) {
      return new ProviderError(
        'http',
        target,
        `${target} responded with HTTP ${error.response.status}`,
        error.response.status,
      );
    }
    if (error.code === 'ECONNABORTED' || error.code === 'ETIMEDOUT') {
      return new ProviderError('timeout', target, `${target} request timed out`);
    }
    return new ProviderError(
      'network',
      target,
      `${target} request failed: ${error.message}`,
    );
  }
  if (error instanceof Error) {
    return error;
  }
  return new ProviderError('network', target, `${target} request failed: ${String(error)}`);
}
