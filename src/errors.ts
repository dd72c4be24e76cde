/**
 * Error taxonomy for request handling
 * Every failure is converted to one of these before a response is written
 */

export const ErrorCode = {
  // Client
  BAD_REQUEST: 'BAD_REQUEST',
  FORBIDDEN: 'FORBIDDEN',
  NOT_FOUND: 'NOT_FOUND',
  METHOD_NOT_ALLOWED: 'METHOD_NOT_ALLOWED',
  PAYLOAD_TOO_LARGE: 'PAYLOAD_TOO_LARGE',
  HEADERS_TOO_LARGE: 'HEADERS_TOO_LARGE',
  CLIENT_CLOSED: 'CLIENT_CLOSED',

  // Gateway
  INTERNAL: 'INTERNAL',

  // Backend
  BACKEND_UNREACHABLE: 'BACKEND_UNREACHABLE',
  BACKEND_PROTOCOL: 'BACKEND_PROTOCOL',
  BACKEND_TIMEOUT: 'BACKEND_TIMEOUT',
} as const;

export type ErrorCodeValue = (typeof ErrorCode)[keyof typeof ErrorCode];

const STATUS: Record<ErrorCodeValue, number> = {
  BAD_REQUEST: 400,
  FORBIDDEN: 403,
  NOT_FOUND: 404,
  METHOD_NOT_ALLOWED: 405,
  PAYLOAD_TOO_LARGE: 413,
  HEADERS_TOO_LARGE: 431,
  // Not sent on the wire in practice; the client is gone
  CLIENT_CLOSED: 499,
  INTERNAL: 500,
  BACKEND_UNREACHABLE: 502,
  BACKEND_PROTOCOL: 502,
  BACKEND_TIMEOUT: 504,
};

/**
 * Messages sent to the client; details stay in the logs
 */
const PUBLIC_MESSAGE: Record<ErrorCodeValue, string> = {
  BAD_REQUEST: 'Bad request',
  FORBIDDEN: 'Forbidden',
  NOT_FOUND: 'Not found',
  METHOD_NOT_ALLOWED: 'Method not allowed',
  PAYLOAD_TOO_LARGE: 'Payload too large',
  HEADERS_TOO_LARGE: 'Request header fields too large',
  CLIENT_CLOSED: 'Client closed request',
  INTERNAL: 'Internal server error',
  BACKEND_UNREACHABLE: 'Bad gateway',
  BACKEND_PROTOCOL: 'Bad gateway',
  BACKEND_TIMEOUT: 'Gateway timeout',
};

export class GatewayError extends Error {
  readonly code: ErrorCodeValue;
  readonly status: number;

  constructor(code: ErrorCodeValue, message?: string, options?: { cause?: unknown }) {
    super(message ?? PUBLIC_MESSAGE[code], options);
    this.name = 'GatewayError';
    this.code = code;
    this.status = STATUS[code];
  }

  get publicMessage(): string {
    return PUBLIC_MESSAGE[this.code];
  }
}

export function isGatewayError(error: unknown): error is GatewayError {
  return error instanceof GatewayError;
}

/**
 * Anything that is not already a GatewayError is an internal fault
 */
export function toGatewayError(error: unknown): GatewayError {
  if (isGatewayError(error)) {
    return error;
  }
  const message = error instanceof Error ? error.message : String(error);
  return new GatewayError(ErrorCode.INTERNAL, message, { cause: error });
}

/**
 * `code` of a Node system error, if any
 */
export function errorCodeOf(error: unknown): string | undefined {
  if (error instanceof Error && 'code' in error && typeof error.code === 'string') {
    return error.code;
  }
  return undefined;
}
