/**
 * Error classes shared by the pipeline and the Gemini client
 */

/**
 * Base class for every error raised by this package
 */
export class TranscribeError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'TranscribeError';

    // Maintains proper stack trace for where our error was thrown (only available on V8)
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, this.constructor);
    }
  }
}

/**
 * Missing credential, invalid chunk/overlap combination, missing input file, bad template
 */
export class ConfigurationError extends TranscribeError {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigurationError';
  }
}

/**
 * ffmpeg / ffprobe exited non-zero or produced unusable output
 */
export class ExternalToolError extends TranscribeError {
  command: string;
  exitCode?: number;
  stderr: string;

  constructor(message: string, command: string, exitCode?: number, stderr = '') {
    super(message);
    this.name = 'ExternalToolError';
    this.command = command;
    this.exitCode = exitCode;
    this.stderr = stderr;
  }
}

/**
 * Base class for all remote service errors
 */
export class APIError extends TranscribeError {
  statusCode?: number;
  errorCode?: string;
  details?: Record<string, unknown>;

  constructor(
    message: string,
    statusCode?: number,
    errorCode?: string,
    details?: Record<string, unknown>
  ) {
    super(message);
    this.name = 'APIError';
    this.statusCode = statusCode;
    this.errorCode = errorCode;
    this.details = details;
  }

  toString(): string {
    const parts = [this.message];
    if (this.statusCode) {
      parts.push(`(status: ${this.statusCode})`);
    }
    if (this.errorCode) {
      parts.push(`(code: ${this.errorCode})`);
    }
    return parts.join(' ');
  }
}

/**
 * Non-success HTTP status; carries the raw body for diagnostics
 */
export class RemoteTransportError extends APIError {
  body: string;

  constructor(message: string, statusCode: number, body: string, errorCode?: string) {
    super(message, statusCode, errorCode);
    this.name = 'RemoteTransportError';
    this.body = body;
  }
}

/**
 * Invalid or missing API key (401 / 403)
 */
export class AuthenticationError extends RemoteTransportError {
  constructor(message: string, statusCode: number, body: string, errorCode?: string) {
    super(message, statusCode, body, errorCode);
    this.name = 'AuthenticationError';
  }
}

/**
 * Rate limit exceeded
 */
export class RateLimitError extends RemoteTransportError {
  retryAfter?: number;

  constructor(
    message: string,
    statusCode: number,
    body: string,
    retryAfter?: number,
    errorCode?: string
  ) {
    super(message, statusCode, body, errorCode);
    this.name = 'RateLimitError';
    this.retryAfter = retryAfter;
  }
}

/**
 * Server error (5xx)
 */
export class ServerError extends RemoteTransportError {
  constructor(message: string, statusCode: number, body: string, errorCode?: string) {
    super(message, statusCode, body, errorCode);
    this.name = 'ServerError';
  }
}

/**
 * Uploaded file reached the FAILED state
 */
export class RemoteProcessingError extends APIError {
  fileName: string;

  constructor(message: string, fileName: string) {
    super(message);
    this.name = 'RemoteProcessingError';
    this.fileName = fileName;
  }
}

/**
 * Success status, but the body is missing what we need
 */
export class ResponseShapeError extends APIError {
  raw: string;

  constructor(message: string, raw: string) {
    super(message);
    this.name = 'ResponseShapeError';
    this.raw = raw;
  }
}

/**
 * Network connection error
 */
export class NetworkError extends APIError {
  constructor(message: string) {
    super(message);
    this.name = 'NetworkError';
  }
}

/**
 * Request timeout, or a file that never became ready
 */
export class TimeoutError extends APIError {
  constructor(message: string) {
    super(message);
    this.name = 'TimeoutError';
  }
}

function errorMessageFromBody(body: string): { message?: string; status?: string } {
  try {
    const parsed: unknown = JSON.parse(body);
    if (typeof parsed === 'object' && parsed !== null && 'error' in parsed) {
      const inner: unknown = parsed.error;
      if (typeof inner === 'object' && inner !== null) {
        return {
          message: 'message' in inner && typeof inner.message === 'string' ? inner.message : undefined,
          status: 'status' in inner && typeof inner.status === 'string' ? inner.status : undefined,
        };
      }
    }
  } catch {
    // Response might not be JSON
  }
  return {};
}

/**
 * Map a failed response to the matching error and throw it
 */
export function handleErrorResponse(response: Response, body: string, action: string): never {
  const statusCode = response.status;
  const parsed = errorMessageFromBody(body);
  const reason = parsed.message || response.statusText || `HTTP ${statusCode}`;
  const message = `${action} failed: ${statusCode} ${reason}`;

  if (statusCode === 401 || statusCode === 403) {
    throw new AuthenticationError(message, statusCode, body, parsed.status);
  } else if (statusCode === 429) {
    const retryAfter = response.headers.get('Retry-After');
    const retryAfterSeconds = retryAfter ? parseInt(retryAfter, 10) : undefined;
    throw new RateLimitError(
      message,
      statusCode,
      body,
      Number.isFinite(retryAfterSeconds) ? retryAfterSeconds : undefined,
      parsed.status
    );
  } else if (statusCode >= 500) {
    throw new ServerError(message, statusCode, body, parsed.status);
  }
  throw new RemoteTransportError(message, statusCode, body, parsed.status);
}
