/**
 * Static file handler
 * Serves files below a mount root; never lists directories
 */

import path from 'node:path';
import { open, realpath, type FileHandle } from 'node:fs/promises';
import { Writable } from 'node:stream';
import { pipeline } from 'node:stream/promises';
import type { Request, Response } from 'express';
import { admittedBody } from './admission.js';
import { ErrorCode, GatewayError, errorCodeOf, isGatewayError } from './errors.js';
import type { StaticMount } from './types.js';

const NOT_FOUND_CODES = new Set(['ENOENT', 'ENOTDIR', 'ENAMETOOLONG', 'ELOOP']);
const FORBIDDEN_CODES = new Set(['EACCES', 'EPERM']);

function isWithin(root: string, candidate: string): boolean {
  const rootWithSep = root.endsWith(path.sep) ? root : root + path.sep;
  return candidate === root || candidate.startsWith(rootWithSep);
}

function fromFsError(error: unknown, filePath: string): GatewayError {
  const code = errorCodeOf(error);
  if (code !== undefined && NOT_FOUND_CODES.has(code)) {
    return new GatewayError(ErrorCode.NOT_FOUND, `No such file: ${filePath}`, { cause: error });
  }
  if (code !== undefined && FORBIDDEN_CODES.has(code)) {
    return new GatewayError(ErrorCode.FORBIDDEN, `Permission denied: ${filePath}`, {
      cause: error,
    });
  }
  return new GatewayError(ErrorCode.INTERNAL, `Failed to read ${filePath}`, { cause: error });
}

/**
 * Map a request path below `prefix` onto a file path below `root`
 * Returns null when the result would leave the root
 */
export function resolveStaticPath(root: string, prefix: string, requestPath: string): string | null {
  const remainder = prefix === '/' ? requestPath : requestPath.slice(prefix.length);

  let decoded: string;
  try {
    decoded = decodeURIComponent(remainder);
  } catch (error) {
    throw new GatewayError(ErrorCode.BAD_REQUEST, 'Malformed percent-encoding in path', {
      cause: error,
    });
  }

  if (decoded.includes('\0')) {
    return null;
  }

  const base = path.resolve(root);
  const candidate = path.resolve(base, decoded.replace(/^\/+/, ''));

  return isWithin(base, candidate) ? candidate : null;
}

/**
 * Read and discard the admitted request body
 * Rejects with PAYLOAD_TOO_LARGE once a chunked body passes the limit
 */
async function discardBody(req: Request): Promise<void> {
  const sink = new Writable({
    write(_chunk: Buffer, _encoding, callback) {
      callback();
    },
  });

  try {
    await pipeline(admittedBody(req), sink);
  } catch (error) {
    if (isGatewayError(error)) {
      throw error;
    }
    throw new GatewayError(ErrorCode.CLIENT_CLOSED, 'Client closed while sending a body', {
      cause: error,
    });
  }
}

/**
 * Stream a file from `mount` for a GET or HEAD request
 */
export async function serveStatic(req: Request, res: Response, mount: StaticMount): Promise<void> {
  await discardBody(req);

  if (req.method !== 'GET' && req.method !== 'HEAD') {
    res.setHeader('Allow', 'GET, HEAD');
    throw new GatewayError(ErrorCode.METHOD_NOT_ALLOWED, `${req.method} on static path`);
  }

  const candidate = resolveStaticPath(mount.root, mount.prefix, req.path);
  if (candidate === null) {
    throw new GatewayError(ErrorCode.NOT_FOUND, `Path escapes static root: ${req.path}`);
  }

  // Symlinks inside the root must not lead out of it
  let realRoot: string;
  let realFile: string;
  try {
    realRoot = await realpath(mount.root);
    realFile = await realpath(candidate);
  } catch (error) {
    throw fromFsError(error, candidate);
  }

  if (!isWithin(realRoot, realFile)) {
    throw new GatewayError(ErrorCode.NOT_FOUND, `Symlink escapes static root: ${req.path}`);
  }

  let handle: FileHandle;
  try {
    handle = await open(realFile, 'r');
  } catch (error) {
    throw fromFsError(error, realFile);
  }

  let size: number;
  let modified: Date;
  try {
    const stats = await handle.stat();
    if (!stats.isFile()) {
      throw new GatewayError(ErrorCode.NOT_FOUND, `Not a regular file: ${realFile}`);
    }
    size = stats.size;
    modified = stats.mtime;
  } catch (error) {
    await handle.close();
    throw error instanceof GatewayError ? error : fromFsError(error, realFile);
  }

  res.status(200);
  res.type(path.extname(realFile) || 'application/octet-stream');
  res.setHeader('Content-Length', String(size));
  res.setHeader('Last-Modified', modified.toUTCString());

  if (req.method === 'HEAD') {
    await handle.close();
    res.end();
    return;
  }

  try {
    await pipeline(handle.createReadStream(), res);
  } catch (error) {
    if (errorCodeOf(error) === 'ERR_STREAM_PREMATURE_CLOSE') {
      throw new GatewayError(ErrorCode.CLIENT_CLOSED, `Client went away during ${realFile}`, {
        cause: error,
      });
    }
    throw new GatewayError(ErrorCode.INTERNAL, `Failed while streaming ${realFile}`, {
      cause: error,
    });
  }
}
