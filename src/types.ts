/**
 * Type definitions for the edge gateway
 */

/**
 * Verbosity threshold for the logger
 */
export type LogLevel = 'silent' | 'error' | 'warn' | 'info' | 'debug';

/**
 * Host/port pair of the backend application server
 */
export interface BackendAddress {
  readonly host: string;
  readonly port: number;
}

/**
 * A URL prefix served from a directory on disk
 */
export interface StaticMount {
  readonly prefix: string;
  readonly root: string;
}

/**
 * Gateway configuration, resolved once at startup and never mutated
 */
export interface ResolvedConfig {
  /** Port bound on all interfaces */
  readonly listenPort: number;
  /** URL prefix mapped onto staticRoot, e.g. "/static" */
  readonly staticUrlPrefix: string;
  /** Absolute directory holding static assets */
  readonly staticRoot: string;
  /** Optional second mount for uploaded media */
  readonly media?: StaticMount;
  readonly backend: BackendAddress;
  /** Largest accepted request body; 0 disables the limit */
  readonly maxBodyBytes: number;
  /** Deadline for connecting to the backend and receiving its response head */
  readonly backendTimeoutMs: number;
  readonly logLevel: LogLevel;
}

export interface StaticRoute {
  readonly prefix: string;
  readonly kind: 'static';
  readonly root: string;
}

export interface DynamicRoute {
  readonly prefix: string;
  readonly kind: 'dynamic';
}

export type Route = StaticRoute | DynamicRoute;

/**
 * Outcome of the declared-length admission check
 */
export type AdmissionDecision =
  | { readonly accepted: true }
  | { readonly accepted: false; readonly reason: 'too_large' };

/**
 * Ordered key/value pairs; duplicates are allowed
 */
export type VarList = ReadonlyArray<readonly [string, string]>;

/**
 * Status line and headers read back from the backend
 */
export interface ResponseHead {
  statusCode: number;
  statusMessage: string;
  headers: Array<[string, string]>;
  /** Body bytes that arrived in the same reads as the head */
  rest: Buffer;
}
