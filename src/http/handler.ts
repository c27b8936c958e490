/**
 * Connection handler: one accepted connection, start to finish.
 *
 *   reading_headers -> parsed -> failure_injected | routed -> responded -> closed
 *
 * Every path ends in `closed`. Errors after parsing become a best-effort 500;
 * nothing escapes to the worker pool.
 */

import { promises as fs } from 'fs';
import { dispatchApi } from '../api/dispatch.js';
import type { TestResultsStore } from '../api/results-store.js';
import type { ServerConfig } from '../config/types.js';
import { describeError } from '../errors.js';
import type { LogBuffer } from '../logging/log-buffer.js';
import { Logger, MAIN_THREAD_NAME } from '../logging/logger.js';
import { getMimeType } from './mime.js';
import { expectedRequestLength, findHeaderEnd, HEADER_TERMINATOR, parseRequest } from './parser.js';
import { ResponseWriter } from './response.js';
import { route } from './router.js';
import {
  Connection,
  connectionLabel,
  HttpMethod,
  HttpReply,
  HttpRequest,
  ParseError,
  reasonPhrase,
  ResolvedTarget,
  textReply,
} from './types.js';

export const MAX_REQUEST_BODY_BYTES = 10 * 1024 * 1024; // 10MB

export type ConnectionState =
  | 'reading_headers'
  | 'parsed'
  | 'failure_injected'
  | 'routed'
  | 'responded'
  | 'closed';

export interface ConnectionOutcome {
  connectionId: string;
  remoteAddress: string;
  method?: HttpMethod;
  path?: string;
  status: number | null; // null when no response was attempted
  bodyBytes: number;
  delivered: boolean;
  injectedFailure: boolean;
  trace: ConnectionState[];
}

export type HandlerConfig = Pick<
  ServerConfig,
  'readTimeoutMs' | 'chunkSize' | 'maxHeaderBytes' | 'indexFile' | 'notFoundPage' | 'failureInjection'
>;

export interface ConnectionHandlerOptions {
  config: HandlerConfig;
  sandboxRoot: string;
  logger: Logger;
  logBuffer: LogBuffer;
  results: TestResultsStore;
  random?: () => number;
}

type ReadOutcome =
  | { kind: 'empty'; reason: 'timeout' | 'closed' }
  | { kind: 'invalid'; message: string; data: Buffer }
  | { kind: 'data'; data: Buffer; complete: boolean };

function parseErrorReply(error: ParseError): HttpReply {
  switch (error.kind) {
    case 'bad_request':
      return textReply(400, `${error.message}\n`);
    case 'method_not_allowed':
      return textReply(405, `Method ${error.method} is not supported\n`);
  }
}

function describeParseError(error: ParseError): string {
  return error.kind === 'method_not_allowed' ? `405: method ${error.method} rejected` : `400: ${error.message}`;
}

/**
 * Best guess at the method of a request that failed to parse, so HEAD
 * requests never get a body back.
 */
function looksLikeHead(data: Buffer): boolean {
  return data.subarray(0, 5).toString('latin1').toUpperCase() === 'HEAD ';
}

export class ConnectionHandler {
  private readonly writer: ResponseWriter;
  private readonly random: () => number;

  constructor(private readonly options: ConnectionHandlerOptions) {
    this.writer = new ResponseWriter(options.logger, options.config.chunkSize);
    this.random = options.random ?? Math.random;
  }

  async handle(connection: Connection, workerName: string = MAIN_THREAD_NAME): Promise<ConnectionOutcome> {
    const log = this.options.logger.child(workerName);
    const label = connectionLabel(connection);
    const outcome: ConnectionOutcome = {
      connectionId: connection.id,
      remoteAddress: connection.remoteAddress,
      status: null,
      bodyBytes: 0,
      delivered: false,
      injectedFailure: false,
      trace: ['reading_headers'],
    };

    try {
      const read = await this.readRequest(connection);

      if (read.kind === 'empty') {
        log.warning(`${label} - No request received (${read.reason})`);
        return outcome;
      }

      if (read.kind === 'invalid') {
        log.warning(`${label} - 400: ${read.message}`);
        await this.reply(connection, textReply(400, `${read.message}\n`), looksLikeHead(read.data), outcome);
        return outcome;
      }

      const parsed = parseRequest(read.data);
      outcome.trace.push('parsed');

      if (!parsed.success) {
        log.warning(`${label} - ${describeParseError(parsed.error)}`);
        await this.reply(connection, parseErrorReply(parsed.error), looksLikeHead(read.data), outcome);
        return outcome;
      }

      const request = parsed.request;
      outcome.method = request.method;
      outcome.path = request.path;
      log.info(`${label} - ${request.method} ${request.rawPath} ${request.version}`);

      if (!read.complete) {
        log.warning(`${label} - 400: body shorter than Content-Length ${request.contentLength}`);
        await this.reply(
          connection,
          textReply(400, 'Request body shorter than Content-Length\n'),
          request.method === 'HEAD',
          outcome
        );
        return outcome;
      }

      await this.serve(connection, request, log, outcome);
    } catch (error) {
      // Only reading can get here; after parsing, serve() owns error handling
      log.error(`${label} - Connection error: ${describeError(error)}`);
    } finally {
      connection.close();
      outcome.trace.push('closed');
    }

    return outcome;
  }

  /**
   * Read until the header block and declared body are buffered, the peer
   * closes, or the read deadline passes.
   */
  private async readRequest(connection: Connection): Promise<ReadOutcome> {
    const { readTimeoutMs, maxHeaderBytes } = this.options.config;
    const deadline = Date.now() + readTimeoutMs;
    let data: Buffer = Buffer.alloc(0);
    let timedOut = false;

    for (;;) {
      const expected = expectedRequestLength(data);
      if (expected === null) {
        if (data.length > maxHeaderBytes) {
          return { kind: 'invalid', message: 'Request header block too large', data };
        }
      } else {
        const headerEnd = findHeaderEnd(data);
        if (headerEnd > maxHeaderBytes) {
          return { kind: 'invalid', message: 'Request header block too large', data };
        }
        if (expected - (headerEnd + HEADER_TERMINATOR.length) > MAX_REQUEST_BODY_BYTES) {
          return { kind: 'invalid', message: 'Request body too large', data };
        }
        if (data.length >= expected) {
          return { kind: 'data', data, complete: true };
        }
      }

      const remaining = deadline - Date.now();
      if (remaining <= 0) {
        timedOut = true;
        break;
      }

      const chunk = await connection.read(remaining);
      if (chunk === null) {
        timedOut = true;
        break;
      }
      if (chunk.length === 0) {
        break;
      }
      data = data.length === 0 ? chunk : Buffer.concat([data, chunk]);
    }

    if (data.length === 0) {
      return { kind: 'empty', reason: timedOut ? 'timeout' : 'closed' };
    }
    return { kind: 'data', data, complete: false };
  }

  private async serve(
    connection: Connection,
    request: HttpRequest,
    log: Logger,
    outcome: ConnectionOutcome
  ): Promise<void> {
    const label = connectionLabel(connection);
    const suppressBody = request.method === 'HEAD';

    try {
      const injected = this.drawInjectedFailure();
      if (injected) {
        outcome.trace.push('failure_injected');
        outcome.injectedFailure = true;
        log.warning(`${label} - Injected ${injected.status} failure for ${request.method} ${request.path}`);
        await this.reply(connection, injected, suppressBody, outcome);
        return;
      }

      const target = await route(request, this.options.sandboxRoot, {
        indexFile: this.options.config.indexFile,
        notFoundPage: this.options.config.notFoundPage,
      });
      outcome.trace.push('routed');

      const reply = await this.replyFor(target, request, log, label);
      await this.reply(connection, reply, suppressBody, outcome);
      this.logResult(target, request, reply, log, label);
    } catch (error) {
      log.error(`${label} - Error processing request: ${describeError(error)}`);
      await this.reply(connection, textReply(500, 'Internal server error\n'), suppressBody, outcome);
    }
  }

  private async replyFor(
    target: ResolvedTarget,
    request: HttpRequest,
    log: Logger,
    label: string
  ): Promise<HttpReply> {
    switch (target.kind) {
      case 'static':
        return {
          status: target.status,
          contentType: getMimeType(target.filePath),
          body: await fs.readFile(target.filePath),
        };
      case 'api':
        return dispatchApi(target.endpoint, request, {
          results: this.options.results,
          logBuffer: this.options.logBuffer,
          logger: log,
          clientLabel: label,
        });
      case 'rejected':
        return textReply(target.status, `${target.reason}\n`);
    }
  }

  private logResult(
    target: ResolvedTarget,
    request: HttpRequest,
    reply: HttpReply,
    log: Logger,
    label: string
  ): void {
    if (target.kind === 'rejected' && target.status === 403) {
      log.warning(`${label} - 403: ${request.path} (${target.reason})`);
    } else if (target.kind === 'api') {
      log.debug(`${label} - ${reply.status}: ${request.method} ${request.path}`);
    } else {
      log.info(`${label} - ${reply.status}: ${request.path} (${reply.body.length} bytes)`);
    }
  }

  private drawInjectedFailure(): HttpReply | null {
    const { enabled, rate, statusCodes } = this.options.config.failureInjection;
    if (!enabled || statusCodes.length === 0 || !(this.random() < rate)) {
      return null;
    }
    const index = Math.min(statusCodes.length - 1, Math.floor(this.random() * statusCodes.length));
    const status = statusCodes[index];
    const phrase = reasonPhrase(status);
    return textReply(status, `Simulated failure: ${status} ${phrase}\n`, `${phrase} (Simulated)`);
  }

  private async reply(
    connection: Connection,
    reply: HttpReply,
    suppressBody: boolean,
    outcome: ConnectionOutcome
  ): Promise<void> {
    outcome.delivered = await this.writer.send(connection, reply, suppressBody);
    outcome.status = reply.status;
    outcome.bodyBytes = suppressBody ? 0 : reply.body.length;
    outcome.trace.push('responded');
  }
}
