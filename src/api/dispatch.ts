/**
 * API dispatch: one case per ApiEndpoint.
 */

import { describeError } from '../errors.js';
import type { LogBuffer } from '../logging/log-buffer.js';
import type { Logger } from '../logging/logger.js';
import {
  ApiEndpoint,
  CONTENT_TYPE_JSON,
  HttpReply,
  HttpRequest,
  jsonReply,
} from '../http/types.js';
import type { TestResultsStore } from './results-store.js';
import {
  ApiErrorResponse,
  LogsResponse,
  SubmitResultsResponse,
  validateTestResultsPayload,
} from './types.js';

export interface ApiContext {
  results: TestResultsStore;
  logBuffer: LogBuffer;
  logger: Logger;
  clientLabel: string; // `ip:port [id]` of the requester, for log lines
  now?: () => Date;
}

function apiError(status: number, error: string): HttpReply {
  const body: ApiErrorResponse = { success: false, error };
  return jsonReply(status, body);
}

function submitTestResults(request: HttpRequest, ctx: ApiContext): HttpReply {
  const text = request.body.toString('utf-8');
  if (!text.trim()) {
    return apiError(400, 'Empty request body');
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(text);
  } catch (error) {
    ctx.logger.warning(`${ctx.clientLabel} - POST /api/test-results - Invalid JSON: ${describeError(error)}`);
    return apiError(400, 'Invalid JSON');
  }

  const validation = validateTestResultsPayload(parsed);
  if (!validation.valid) {
    return apiError(400, validation.error);
  }

  const stored = ctx.results.replace(text, validation.payload.results?.length ?? 0);
  ctx.logger.info(`${ctx.clientLabel} - POST /api/test-results - Stored ${stored.count} test results`);

  const response: SubmitResultsResponse = {
    success: true,
    message: 'Test results stored',
    count: stored.count,
  };
  return jsonReply(200, response);
}

function getTestResults(ctx: ApiContext): HttpReply {
  return {
    status: 200,
    contentType: CONTENT_TYPE_JSON,
    body: Buffer.from(ctx.results.snapshotJson(), 'utf-8'),
  };
}

function getLogs(ctx: ApiContext): HttpReply {
  const response: LogsResponse = {
    timestamp: (ctx.now?.() ?? new Date()).toISOString(),
    logs: ctx.logBuffer.snapshot(),
  };
  return jsonReply(200, response);
}

export function dispatchApi(endpoint: ApiEndpoint, request: HttpRequest, ctx: ApiContext): HttpReply {
  switch (endpoint) {
    case 'submit_test_results':
      return submitTestResults(request, ctx);
    case 'get_test_results':
      return getTestResults(ctx);
    case 'get_logs':
      return getLogs(ctx);
    default: {
      const unhandled: never = endpoint;
      throw new Error(`Unhandled API endpoint: ${String(unhandled)}`);
    }
  }
}
