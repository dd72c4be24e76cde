/**
 * Backend forwarder
 *
 * One TCP connection per request: the request goes out as a uwsgi packet
 * followed by its body, the response head is parsed, and the rest of the
 * response is streamed back to the client.
 */

import net, { type Socket } from 'node:net';
import { Transform, type Readable, type TransformCallback } from 'node:stream';
import { pipeline } from 'node:stream/promises';
import { buffer } from 'node:stream/consumers';
import type { Request, Response } from 'express';
import { admittedBody, hasBody, parseContentLength } from './admission.js';
import { ErrorCode, GatewayError, errorCodeOf, isGatewayError, toGatewayError } from './errors.js';
import type { Logger } from './logger.js';
import type { BackendAddress, ResponseHead } from './types.js';
import { buildRequestVars, encodePacket, parseResponseHead } from './uwsgi.js';

export interface ForwardOptions {
  backend: BackendAddress;
  /** Bounds connect plus the wait for the response head, and each idle gap after it */
  timeoutMs: number;
  documentRoot: string;
  serverPort: number;
  logger?: Logger;
}

interface BackendReply {
  head: ResponseHead;
  socket: Socket;
}

// Connection-scoped; Node frames the client response itself
const HOP_BY_HOP = new Set([
  'connection',
  'keep-alive',
  'proxy-connection',
  'transfer-encoding',
  'te',
  'trailer',
  'upgrade',
]);

/**
 * Pass-through that fails when the byte count disagrees with `expected`
 */
export function createLengthGuard(expected: number | undefined): Transform {
  let seen = 0;

  return new Transform({
    transform(chunk: Buffer, _encoding: BufferEncoding, callback: TransformCallback) {
      seen += chunk.length;
      if (expected !== undefined && seen > expected) {
        callback(
          new GatewayError(
            ErrorCode.BACKEND_PROTOCOL,
            `Backend sent more than its declared ${expected} bytes`
          )
        );
        return;
      }
      callback(null, chunk);
    },
    flush(callback: TransformCallback) {
      if (expected !== undefined && seen < expected) {
        callback(
          new GatewayError(
            ErrorCode.BACKEND_PROTOCOL,
            `Backend closed after ${seen} of ${expected} declared bytes`
          )
        );
        return;
      }
      callback();
    },
  });
}

/**
 * A chunked body has to be measured before CONTENT_LENGTH can be sent
 */
async function collectBody(body: Readable): Promise<Buffer> {
  try {
    return await buffer(body);
  } catch (error) {
    if (isGatewayError(error)) {
      throw error;
    }
    throw new GatewayError(ErrorCode.CLIENT_CLOSED, 'Request body aborted', { cause: error });
  }
}

/**
 * Send the packet and body, resolve once the response head has arrived
 */
function openExchange(
  packet: Buffer,
  body: Readable | Buffer,
  options: ForwardOptions,
  signal: AbortSignal
): Promise<BackendReply> {
  const { host, port } = options.backend;

  return new Promise<BackendReply>((resolve, reject) => {
    const socket = net.connect({ host, port });
    let received: Buffer = Buffer.alloc(0);
    let connected = false;
    let settled = false;

    const fail = (error: GatewayError): void => {
      if (settled) {
        return;
      }
      settled = true;
      detach();
      socket.destroy();
      reject(error);
    };

    const onTimeout = (): void => {
      fail(
        new GatewayError(
          ErrorCode.BACKEND_TIMEOUT,
          `No response from ${host}:${port} within ${options.timeoutMs}ms`
        )
      );
    };

    const onAbort = (): void => {
      fail(new GatewayError(ErrorCode.CLIENT_CLOSED, 'Client disconnected before backend responded'));
    };

    const onConnect = (): void => {
      connected = true;
      options.logger?.debug(`connected to ${host}:${port}`);
      socket.write(packet);

      if (Buffer.isBuffer(body)) {
        socket.end(body);
        return;
      }

      body.on('error', (error: Error) => {
        fail(
          isGatewayError(error)
            ? error
            : new GatewayError(ErrorCode.CLIENT_CLOSED, 'Request body aborted', { cause: error })
        );
      });
      body.pipe(socket);
    };

    const onData = (chunk: Buffer): void => {
      received = received.length === 0 ? chunk : Buffer.concat([received, chunk]);

      let head: ResponseHead | null;
      try {
        head = parseResponseHead(received);
      } catch (error) {
        fail(toGatewayError(error));
        return;
      }
      if (head === null) {
        return;
      }

      settled = true;
      detach();
      socket.pause();
      resolve({ head, socket });
    };

    // Stays attached after the head; the streaming pipeline reports later errors
    const onError = (error: Error): void => {
      fail(
        connected
          ? new GatewayError(ErrorCode.BACKEND_PROTOCOL, `Backend connection failed: ${error.message}`, {
              cause: error,
            })
          : new GatewayError(
              ErrorCode.BACKEND_UNREACHABLE,
              `Cannot connect to ${host}:${port}: ${error.message}`,
              { cause: error }
            )
      );
    };

    const onClose = (): void => {
      fail(
        new GatewayError(
          ErrorCode.BACKEND_PROTOCOL,
          `Backend closed after ${received.length} bytes without a complete response head`
        )
      );
    };

    const timer = setTimeout(onTimeout, options.timeoutMs);

    function detach(): void {
      clearTimeout(timer);
      signal.removeEventListener('abort', onAbort);
      socket.off('connect', onConnect);
      socket.off('data', onData);
      socket.off('close', onClose);
    }

    socket.on('connect', onConnect);
    socket.on('data', onData);
    socket.on('error', onError);
    socket.on('close', onClose);

    if (signal.aborted) {
      onAbort();
      return;
    }
    signal.addEventListener('abort', onAbort, { once: true });
  });
}

/**
 * Status line and headers from the backend onto the client response
 */
function applyHead(res: Response, head: ResponseHead): void {
  res.status(head.statusCode);
  if (head.statusMessage) {
    res.statusMessage = head.statusMessage;
  }

  const seen = new Set<string>();
  for (const [name, value] of head.headers) {
    const lower = name.toLowerCase();
    if (HOP_BY_HOP.has(lower)) {
      continue;
    }
    // Backend values replace defaults set earlier in the chain
    if (seen.has(lower)) {
      res.appendHeader(name, value);
    } else {
      res.setHeader(name, value);
      seen.add(lower);
    }
  }
}

function declaredResponseLength(req: Request, head: ResponseHead): number | undefined {
  const { statusCode } = head;
  if (req.method === 'HEAD' || statusCode < 200 || statusCode === 204 || statusCode === 304) {
    return undefined;
  }

  const header = head.headers.find(([name]) => name.toLowerCase() === 'content-length');
  if (header === undefined) {
    return undefined;
  }

  const length = parseContentLength(header[1]);
  if (length === null || length === undefined) {
    throw new GatewayError(ErrorCode.BACKEND_PROTOCOL, `Invalid backend Content-Length: ${header[1]}`);
  }
  return length;
}

/**
 * Relay `req` to the backend and stream its answer into `res`
 */
export async function forwardRequest(req: Request, res: Response, options: ForwardOptions): Promise<void> {
  const declared = parseContentLength(req.headers['content-length']);
  if (declared === null) {
    throw new GatewayError(ErrorCode.BAD_REQUEST, 'Malformed Content-Length header');
  }

  let body: Readable | Buffer;
  let contentLength: number | undefined;
  if (declared !== undefined) {
    body = admittedBody(req);
    contentLength = declared;
  } else if (hasBody(req)) {
    body = await collectBody(admittedBody(req));
    contentLength = body.length;
  } else {
    body = Buffer.alloc(0);
    contentLength = undefined;
  }

  const packet = encodePacket(
    buildRequestVars(req, {
      contentLength,
      documentRoot: options.documentRoot,
      serverPort: options.serverPort,
    })
  );

  const controller = new AbortController();
  const onClientClose = (): void => {
    if (!res.writableFinished) {
      controller.abort();
    }
  };
  res.once('close', onClientClose);

  let reply: BackendReply;
  try {
    reply = await openExchange(packet, body, options, controller.signal);
  } finally {
    res.off('close', onClientClose);
  }

  const { head, socket } = reply;
  let expected: number | undefined;
  try {
    expected = declaredResponseLength(req, head);
  } catch (error) {
    socket.destroy();
    throw error;
  }

  applyHead(res, head);
  if (head.rest.length > 0) {
    socket.unshift(head.rest);
  }

  socket.setTimeout(options.timeoutMs, () => {
    socket.destroy(
      new GatewayError(ErrorCode.BACKEND_TIMEOUT, `Backend idle for ${options.timeoutMs}ms mid-response`)
    );
  });

  try {
    await pipeline(socket, createLengthGuard(expected), res);
  } catch (error) {
    if (isGatewayError(error)) {
      throw error;
    }
    if (errorCodeOf(error) === 'ERR_STREAM_PREMATURE_CLOSE') {
      throw new GatewayError(ErrorCode.CLIENT_CLOSED, 'Client disconnected mid-response', {
        cause: error,
      });
    }
    throw new GatewayError(ErrorCode.BACKEND_PROTOCOL, 'Backend connection failed mid-response', {
      cause: error,
    });
  }
}
