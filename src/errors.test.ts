import { describe, it, expect } from 'vitest';
import { ErrorCode, GatewayError, errorCodeOf, isGatewayError, toGatewayError } from './errors.js';

describe('GatewayError', () => {
  it('should carry the status for its code', () => {
    expect(new GatewayError(ErrorCode.BACKEND_TIMEOUT).status).toBe(504);
    expect(new GatewayError(ErrorCode.BACKEND_UNREACHABLE).status).toBe(502);
    expect(new GatewayError(ErrorCode.PAYLOAD_TOO_LARGE).status).toBe(413);
  });

  it('should keep internal detail out of the public message', () => {
    const error = new GatewayError(ErrorCode.NOT_FOUND, 'Path escapes static root: /static/../x');

    expect(error.message).toBe('Path escapes static root: /static/../x');
    expect(error.publicMessage).toBe('Not found');
  });

  it('should default the message to the public one', () => {
    expect(new GatewayError(ErrorCode.FORBIDDEN).message).toBe('Forbidden');
  });
});

describe('toGatewayError', () => {
  it('should return gateway errors unchanged', () => {
    const error = new GatewayError(ErrorCode.BAD_REQUEST);

    expect(toGatewayError(error)).toBe(error);
  });

  it('should wrap anything else as an internal fault', () => {
    const cause = new Error('disk on fire');
    const error = toGatewayError(cause);

    expect(isGatewayError(error)).toBe(true);
    expect(error.code).toBe('INTERNAL');
    expect(error.status).toBe(500);
    expect(error.message).toBe('disk on fire');
    expect(error.cause).toBe(cause);
  });

  it('should wrap non-error values', () => {
    expect(toGatewayError('boom').message).toBe('boom');
  });
});

describe('errorCodeOf', () => {
  it('should read the code of a system error', () => {
    const error = Object.assign(new Error('missing'), { code: 'ENOENT' });

    expect(errorCodeOf(error)).toBe('ENOENT');
  });

  it('should return undefined for plain values', () => {
    expect(errorCodeOf(new Error('plain'))).toBeUndefined();
    expect(errorCodeOf({ code: 'ENOENT' })).toBeUndefined();
  });
});
