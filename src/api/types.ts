/**
 * JSON API types for exchanging load-test telemetry
 */

import type { ApiEndpoint, HttpMethod } from '../http/types.js';

// ============================================================================
// Request / response bodies
// ============================================================================

/**
 * Payload POSTed by the load client. Only `results` is inspected; the rest is
 * stored and echoed back untouched.
 */
export interface TestResultsPayload {
  [key: string]: unknown;
  timestamp?: unknown;
  total_requests?: unknown;
  results?: unknown[];
}

export interface SubmitResultsResponse {
  success: true;
  message: string;
  count: number;
}

export interface LogsResponse {
  timestamp: string;
  logs: readonly string[];
}

export interface ApiErrorResponse {
  success: false;
  error: string;
}

export type PayloadValidationResult =
  | { valid: true; payload: TestResultsPayload }
  | { valid: false; error: string };

export function validateTestResultsPayload(value: unknown): PayloadValidationResult {
  if (typeof value !== 'object' || value === null || Array.isArray(value)) {
    return { valid: false, error: 'Payload must be a JSON object' };
  }
  const payload: TestResultsPayload = { ...value };
  if (payload.results !== undefined && !Array.isArray(payload.results)) {
    return { valid: false, error: 'results must be an array' };
  }
  return { valid: true, payload };
}

// ============================================================================
// Endpoint table
// ============================================================================

export const API_PREFIX = '/api/';

export interface ApiRoute {
  method: HttpMethod;
  path: string;
}

/**
 * Closed set of API endpoints. Adding one means adding a member to
 * ApiEndpoint, a row here and a case in dispatchApi.
 */
export const API_ROUTES: Readonly<Record<ApiEndpoint, ApiRoute>> = {
  submit_test_results: { method: 'POST', path: '/api/test-results' },
  get_test_results: { method: 'GET', path: '/api/test-results' },
  get_logs: { method: 'GET', path: '/api/logs' },
};

const API_ENDPOINTS: readonly ApiEndpoint[] = ['submit_test_results', 'get_test_results', 'get_logs'];

export function matchApiEndpoint(method: HttpMethod, path: string): ApiEndpoint | null {
  for (const endpoint of API_ENDPOINTS) {
    const route = API_ROUTES[endpoint];
    if (route.method === method && route.path === path) {
      return endpoint;
    }
  }
  return null;
}
