/**
 * Request body size admission control
 * Runs before routing; oversized requests never reach a handler
 */

import { Transform, type Readable, type TransformCallback } from 'node:stream';
import type { IncomingMessage } from 'node:http';
import type { Request, Response, NextFunction, RequestHandler } from 'express';
import { ErrorCode, GatewayError } from './errors.js';
import type { AdmissionDecision } from './types.js';

const admitted = new WeakMap<IncomingMessage, Readable>();

/**
 * Decide on a declared body length
 * A limit of 0 disables the check
 */
export function checkContentLength(
  declared: number | undefined,
  limit: number
): AdmissionDecision {
  if (limit === 0 || declared === undefined || declared <= limit) {
    return { accepted: true };
  }
  return { accepted: false, reason: 'too_large' };
}

/**
 * Parse a Content-Length header value
 * Returns undefined when absent, null when malformed
 */
export function parseContentLength(value: string | undefined): number | undefined | null {
  if (value === undefined) {
    return undefined;
  }
  if (!/^\d+$/.test(value.trim())) {
    return null;
  }
  const length = Number(value.trim());
  return Number.isSafeInteger(length) ? length : null;
}

/**
 * Pass-through stream that fails once more than `limit` bytes go through it
 */
export function createByteLimiter(limit: number): Transform {
  let seen = 0;

  return new Transform({
    transform(chunk: Buffer, _encoding: BufferEncoding, callback: TransformCallback) {
      seen += chunk.length;
      if (seen > limit) {
        callback(
          new GatewayError(ErrorCode.PAYLOAD_TOO_LARGE, `Request body exceeded ${limit} bytes`)
        );
        return;
      }
      callback(null, chunk);
    },
  });
}

/**
 * Without a Content-Length, only a chunked request carries a body
 */
export function hasBody(req: IncomingMessage): boolean {
  return req.headers['content-length'] !== undefined || req.headers['transfer-encoding'] !== undefined;
}

/**
 * Body stream a handler should read for this request
 * Requests that did not pass through the filter read the raw stream
 */
export function admittedBody(req: IncomingMessage): Readable {
  return admitted.get(req) ?? req;
}

/**
 * Express middleware enforcing the body limit on every route
 */
export function admissionFilter(limit: number): RequestHandler {
  return (req: Request, res: Response, next: NextFunction) => {
    const declared = parseContentLength(req.headers['content-length']);

    if (declared === null) {
      res.setHeader('Connection', 'close');
      next(new GatewayError(ErrorCode.BAD_REQUEST, 'Malformed Content-Length header'));
      return;
    }

    const decision = checkContentLength(declared, limit);
    if (!decision.accepted) {
      // The unread body would otherwise be drained on a kept-alive socket
      res.setHeader('Connection', 'close');
      next(
        new GatewayError(
          ErrorCode.PAYLOAD_TOO_LARGE,
          `Declared body of ${declared} bytes exceeds limit of ${limit}`
        )
      );
      return;
    }

    if (declared === undefined && hasBody(req) && limit > 0) {
      const limiter = createByteLimiter(limit);
      req.on('error', (error) => limiter.destroy(error));
      limiter.on('error', () => {
        if (!res.headersSent) {
          res.setHeader('Connection', 'close');
        }
      });
      admitted.set(req, req.pipe(limiter));
    }

    next();
  };
}
