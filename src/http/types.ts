/**
 * HTTP subset types
 *
 * One request per connection, Content-Length bodies only, `Connection: close`
 * on every response.
 */

// ============================================================================
// Requests
// ============================================================================

export type HttpMethod = 'GET' | 'HEAD' | 'POST';

export const ALLOWED_METHODS: readonly HttpMethod[] = ['GET', 'HEAD', 'POST'];

export function isAllowedMethod(method: string): method is HttpMethod {
  return ALLOWED_METHODS.some((allowed) => allowed === method);
}

export interface HttpRequest {
  method: HttpMethod;
  rawPath: string; // request target exactly as sent
  path: string; // percent-decoded path, query removed
  query: string | null;
  version: string;
  rawHeaders: string; // header block without the request line
  headers: Record<string, string>; // lower-cased names, first occurrence wins
  host?: string;
  contentLength: number;
  body: Buffer;
}

export type ParseError =
  | { kind: 'bad_request'; status: 400; message: string }
  | { kind: 'method_not_allowed'; status: 405; method: string };

export type ParseResult =
  | { success: true; request: HttpRequest }
  | { success: false; error: ParseError };

// ============================================================================
// Routing
// ============================================================================

export type ApiEndpoint = 'submit_test_results' | 'get_test_results' | 'get_logs';

export type ResolvedTarget =
  | { kind: 'static'; filePath: string; status: 200 | 404 }
  | { kind: 'api'; endpoint: ApiEndpoint }
  | { kind: 'rejected'; status: 403 | 404; reason: string };

export type GuardResult =
  | { safe: true; path: string }
  | { safe: false; reason: string };

// ============================================================================
// Responses
// ============================================================================

export interface HttpReply {
  status: number;
  reason?: string; // defaults to the standard phrase for status
  contentType: string;
  body: Buffer;
}

export const STATUS_REASONS: Readonly<Record<number, string>> = {
  200: 'OK',
  400: 'Bad Request',
  403: 'Forbidden',
  404: 'Not Found',
  405: 'Method Not Allowed',
  500: 'Internal Server Error',
  503: 'Service Unavailable',
  504: 'Gateway Timeout',
};

export function reasonPhrase(status: number): string {
  return STATUS_REASONS[status] ?? 'Unknown';
}

export const CONTENT_TYPE_TEXT = 'text/plain; charset=utf-8';
export const CONTENT_TYPE_HTML = 'text/html; charset=utf-8';
export const CONTENT_TYPE_JSON = 'application/json; charset=utf-8';

export function textReply(status: number, text: string, reason?: string): HttpReply {
  return { status, reason, contentType: CONTENT_TYPE_TEXT, body: Buffer.from(text, 'utf-8') };
}

export function jsonReply(status: number, data: unknown): HttpReply {
  return { status, contentType: CONTENT_TYPE_JSON, body: Buffer.from(JSON.stringify(data), 'utf-8') };
}

// ============================================================================
// Connections
// ============================================================================

/**
 * Byte stream for one accepted client. read() resolves to an empty buffer at
 * end of stream and to null when timeoutMs passes with no data.
 */
export interface Connection {
  readonly id: string;
  readonly remoteAddress: string;
  read(timeoutMs: number): Promise<Buffer | null>;
  write(data: Buffer): Promise<void>;
  close(): void;
}

/**
 * Prefix for every log line about a connection: `ip:port [id]`.
 */
export function connectionLabel(connection: Pick<Connection, 'id' | 'remoteAddress'>): string {
  return `${connection.remoteAddress} [${connection.id}]`;
}
