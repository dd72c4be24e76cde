/**
 * uwsgi wire codec
 *
 * Request packet: a 4-byte header (modifier1, little-endian u16 size of the
 * vars block, modifier2) followed by the vars block, where each var is a
 * u16 LE key length, the key, a u16 LE value length and the value. The
 * request body follows the packet. The application answers with an HTTP
 * status line, headers and body, then closes the connection.
 */

import type { IncomingMessage } from 'node:http';
import { ErrorCode, GatewayError } from './errors.js';
import type { ResponseHead, VarList } from './types.js';

/** modifier1 for a WSGI application */
export const MODIFIER_WSGI = 0;

const HEADER_BYTES = 4;
const MAX_U16 = 0xffff;

/** Largest response head accepted from the backend */
export const MAX_RESPONSE_HEAD_BYTES = 64 * 1024;

const HEAD_TERMINATOR = Buffer.from('\r\n\r\n', 'latin1');
const STATUS_LINE = /^HTTP\/\d\.\d (\d{3})(?: (.*))?$/;

// Carried as CONTENT_TYPE / CONTENT_LENGTH instead of HTTP_ vars
const CGI_HEADERS = new Set(['content-type', 'content-length']);

export interface DecodedPacket {
  modifier1: number;
  modifier2: number;
  vars: Array<[string, string]>;
  /** Offset of the first body byte within the decoded buffer */
  bodyOffset: number;
}

export interface RequestVarsContext {
  /** Body length sent after the packet; undefined when there is no body */
  contentLength: number | undefined;
  documentRoot: string;
  serverPort: number;
}

export function encodeVars(vars: VarList): Buffer {
  const parts: Buffer[] = [];
  let size = 0;

  for (const [key, value] of vars) {
    const keyBytes = Buffer.from(key, 'utf8');
    const valueBytes = Buffer.from(value, 'utf8');

    if (keyBytes.length > MAX_U16 || valueBytes.length > MAX_U16) {
      throw new GatewayError(ErrorCode.HEADERS_TOO_LARGE, `uwsgi var ${key} is too long`);
    }

    const entry = Buffer.alloc(4 + keyBytes.length + valueBytes.length);
    entry.writeUInt16LE(keyBytes.length, 0);
    keyBytes.copy(entry, 2);
    entry.writeUInt16LE(valueBytes.length, 2 + keyBytes.length);
    valueBytes.copy(entry, 4 + keyBytes.length);

    parts.push(entry);
    size += entry.length;
  }

  if (size > MAX_U16) {
    throw new GatewayError(
      ErrorCode.HEADERS_TOO_LARGE,
      `uwsgi vars block of ${size} bytes exceeds ${MAX_U16}`
    );
  }

  return Buffer.concat(parts, size);
}

export function encodePacket(vars: VarList, modifier1 = MODIFIER_WSGI, modifier2 = 0): Buffer {
  const block = encodeVars(vars);
  const header = Buffer.alloc(HEADER_BYTES);
  header.writeUInt8(modifier1, 0);
  header.writeUInt16LE(block.length, 1);
  header.writeUInt8(modifier2, 3);
  return Buffer.concat([header, block]);
}

/**
 * Decode a request packet from the start of `buffer`
 * Returns null while the packet is still incomplete
 */
export function decodePacket(buffer: Buffer): DecodedPacket | null {
  if (buffer.length < HEADER_BYTES) {
    return null;
  }

  const size = buffer.readUInt16LE(1);
  const end = HEADER_BYTES + size;
  if (buffer.length < end) {
    return null;
  }

  const vars: Array<[string, string]> = [];
  let offset = HEADER_BYTES;

  const readString = (): string => {
    if (offset + 2 > end) {
      throw new Error('Malformed uwsgi packet: truncated length');
    }
    const length = buffer.readUInt16LE(offset);
    offset += 2;
    if (offset + length > end) {
      throw new Error('Malformed uwsgi packet: truncated string');
    }
    const text = buffer.toString('utf8', offset, offset + length);
    offset += length;
    return text;
  };

  while (offset < end) {
    const key = readString();
    const value = readString();
    vars.push([key, value]);
  }

  return {
    modifier1: buffer.readUInt8(0),
    modifier2: buffer.readUInt8(3),
    vars,
    bodyOffset: end,
  };
}

/**
 * "X-Request-Id" -> "HTTP_X_REQUEST_ID"
 */
export function headerVarName(name: string): string {
  return `HTTP_${name.toUpperCase().replace(/-/g, '_')}`;
}

function splitUrl(url: string): { pathname: string; query: string } {
  const index = url.indexOf('?');
  return index === -1
    ? { pathname: url, query: '' }
    : { pathname: url.slice(0, index), query: url.slice(index + 1) };
}

function serverName(host: string | undefined): string {
  if (!host) {
    return 'localhost';
  }
  // Bracketed IPv6 literal keeps its brackets
  const match = /^(\[[^\]]*\]|[^:]*)/.exec(host);
  return match?.[1] || 'localhost';
}

/**
 * Environment-style vars describing an inbound request
 * Header lines are passed one var each, in arrival order
 */
export function buildRequestVars(
  req: IncomingMessage,
  context: RequestVarsContext
): Array<[string, string]> {
  const requestUri = req.url ?? '/';
  const { pathname, query } = splitUrl(requestUri);

  let pathInfo: string;
  try {
    pathInfo = decodeURIComponent(pathname);
  } catch (error) {
    throw new GatewayError(ErrorCode.BAD_REQUEST, 'Malformed percent-encoding in path', {
      cause: error,
    });
  }

  const contentType = req.headers['content-type'];
  const vars: Array<[string, string]> = [
    ['QUERY_STRING', query],
    ['REQUEST_METHOD', req.method ?? 'GET'],
    ['CONTENT_TYPE', contentType ?? ''],
    ['CONTENT_LENGTH', context.contentLength === undefined ? '' : String(context.contentLength)],
    ['REQUEST_URI', requestUri],
    ['PATH_INFO', pathInfo],
    ['DOCUMENT_ROOT', context.documentRoot],
    ['SERVER_PROTOCOL', `HTTP/${req.httpVersion}`],
    ['REQUEST_SCHEME', 'http'],
    ['REMOTE_ADDR', req.socket.remoteAddress ?? ''],
    ['REMOTE_PORT', req.socket.remotePort === undefined ? '' : String(req.socket.remotePort)],
    ['SERVER_PORT', String(context.serverPort)],
    ['SERVER_NAME', serverName(req.headers.host)],
  ];

  const raw = req.rawHeaders;
  for (let i = 0; i + 1 < raw.length; i += 2) {
    const name = raw[i];
    // Underscored names would collide with their dashed spelling
    if (name.includes('_') || CGI_HEADERS.has(name.toLowerCase())) {
      continue;
    }
    vars.push([headerVarName(name), raw[i + 1]]);
  }

  return vars;
}

/**
 * Parse the backend's status line and headers
 * Returns null until the blank line ending the head has arrived
 */
export function parseResponseHead(buffer: Buffer): ResponseHead | null {
  const end = buffer.indexOf(HEAD_TERMINATOR);

  if (end === -1) {
    if (buffer.length > MAX_RESPONSE_HEAD_BYTES) {
      throw new GatewayError(ErrorCode.BACKEND_PROTOCOL, 'Backend response head too large');
    }
    return null;
  }

  if (end > MAX_RESPONSE_HEAD_BYTES) {
    throw new GatewayError(ErrorCode.BACKEND_PROTOCOL, 'Backend response head too large');
  }

  const [statusLine, ...lines] = buffer.toString('latin1', 0, end).split('\r\n');
  const status = STATUS_LINE.exec(statusLine);
  if (!status) {
    throw new GatewayError(
      ErrorCode.BACKEND_PROTOCOL,
      `Malformed backend status line: ${JSON.stringify(statusLine.slice(0, 80))}`
    );
  }

  const headers: Array<[string, string]> = [];
  for (const line of lines) {
    const colon = line.indexOf(':');
    if (colon <= 0) {
      throw new GatewayError(
        ErrorCode.BACKEND_PROTOCOL,
        `Malformed backend header line: ${JSON.stringify(line.slice(0, 80))}`
      );
    }
    headers.push([line.slice(0, colon).trim(), line.slice(colon + 1).trim()]);
  }

  return {
    statusCode: parseInt(status[1], 10),
    statusMessage: status[2] ?? '',
    headers,
    rest: buffer.subarray(end + HEAD_TERMINATOR.length),
  };
}
