import { isDeepStrictEqual } from 'node:util';
import { request } from 'undici';
import { extractJsonPath } from './jsonpath.js';
import { describeError } from './errors.js';
import type { Expectation, JsonValue, Request, StatusExpectation } from './suite.js';
import type { TestResult } from './types.js';
import type { VariableContext } from './variables.js';

// RFC 9110 token characters
const METHOD_PATTERN = /^[!#$%&'*+\-.^_`|~0-9A-Za-z]+$/;
const INTEGER_PATTERN = /^[+-]?\d+$/;

export interface ExecutorOptions {
  /** Per-request timeout in milliseconds, covering dispatch and body read */
  timeout: number;
}

export interface PreparedRequest {
  method: string;
  url: URL;
  headers: Record<string, string>;
  body?: string;
}

interface SentResponse {
  status: number;
  text(): Promise<string>;
}

/**
 * fetch refuses a body on GET and HEAD, so those requests go out through
 * undici's `request` instead. Everything else uses fetch.
 */
async function send(prepared: PreparedRequest, signal: AbortSignal): Promise<SentResponse> {
  const method = prepared.method.toUpperCase();
  if (prepared.body !== undefined && (method === 'GET' || method === 'HEAD')) {
    const response = await request(prepared.url, {
      method,
      headers: prepared.headers,
      body: prepared.body,
      signal,
    });
    return { status: response.statusCode, text: () => response.body.text() };
  }

  return fetch(prepared.url, {
    method: prepared.method,
    headers: prepared.headers,
    body: prepared.body,
    signal,
  });
}

export class RequestExecutor {
  private timeout: number;

  constructor(options: ExecutorOptions) {
    this.timeout = options.timeout;
  }

  getTimeout(): number {
    return this.timeout;
  }

  /**
   * Sends one templated request and checks the response against the
   * expectation. Every failure, from a malformed URL to a timed-out socket,
   * is reported in the returned result rather than thrown.
   */
  async execute(
    name: string,
    request: Request,
    expectation: Expectation | undefined,
    context: VariableContext
  ): Promise<TestResult> {
    const start = performance.now();

    let prepared: PreparedRequest;
    try {
      prepared = prepareRequest(request, context);
    } catch (error) {
      return { name, passed: false, duration: performance.now() - start, error: describeError(error) };
    }

    const controller = new AbortController();
    const timer = setTimeout(() => controller.abort(), this.timeout);

    try {
      let response: SentResponse;
      try {
        response = await send(prepared, controller.signal);
      } catch (error) {
        return {
          name,
          passed: false,
          duration: performance.now() - start,
          error: controller.signal.aborted
            ? `Request timed out after ${this.timeout}ms`
            : `Failed to send HTTP request: ${describeTransportError(error)}`,
        };
      }

      const duration = performance.now() - start;
      const status = response.status;

      let body: string;
      try {
        body = await response.text();
      } catch (error) {
        return {
          name,
          passed: false,
          duration: performance.now() - start,
          error: `Failed to read response body: ${describeTransportError(error)}`,
          responseStatus: status,
        };
      }

      if (!expectation) {
        return {
          name,
          passed: status < 400,
          duration,
          ...(status >= 400 && { error: `HTTP ${status}` }),
          responseStatus: status,
          responseBody: body,
        };
      }

      const failure = validateResponse(status, body, expectation, context);
      return {
        name,
        passed: failure === undefined,
        duration,
        ...(failure !== undefined && { error: failure }),
        responseStatus: status,
        responseBody: body,
      };
    } finally {
      clearTimeout(timer);
    }
  }
}

export function prepareRequest(request: Request, context: VariableContext): PreparedRequest {
  const rawUrl = context.substitute(request.url);
  let url: URL;
  try {
    url = new URL(rawUrl);
  } catch {
    throw new Error(`Invalid URL: ${rawUrl}`);
  }

  for (const [key, value] of Object.entries(request.params ?? {})) {
    url.searchParams.append(context.substitute(key), context.substitute(value));
  }

  if (!METHOD_PATTERN.test(request.method)) {
    throw new Error(`Invalid HTTP method: ${request.method}`);
  }

  const headers: Record<string, string> = {};
  for (const [key, value] of Object.entries(request.headers ?? {})) {
    headers[context.substitute(key)] = context.substitute(value);
  }

  return {
    method: request.method,
    url,
    headers,
    ...(request.body !== undefined && { body: context.substitute(request.body) }),
  };
}

/**
 * Returns the first failed assertion, or undefined when the response meets
 * the expectation. `schema` and `headers` expectations are not evaluated.
 */
export function validateResponse(
  status: number,
  body: string,
  expectation: Expectation,
  context: VariableContext
): string | undefined {
  if (expectation.status !== undefined) {
    const expected = resolveStatus(expectation.status, context);
    if (typeof expected === 'string') {
      return expected;
    }
    if (status !== expected) {
      return `Expected status ${expected} but got ${status}`;
    }
  }

  const assertions = Object.entries(expectation.jsonpath ?? {});
  if (assertions.length === 0) {
    return undefined;
  }

  let json: JsonValue;
  try {
    json = JSON.parse(body);
  } catch {
    return 'Response body is not valid JSON';
  }

  for (const [path, expected] of assertions) {
    let actual: JsonValue;
    try {
      actual = extractJsonPath(json, path);
    } catch (error) {
      return describeError(error);
    }

    const wanted = coerceExpected(expected, context);
    if (!isDeepStrictEqual(actual, wanted)) {
      return `JSONPath assertion failed for '${path}': expected ${JSON.stringify(wanted)} but got ${JSON.stringify(actual)}`;
    }
  }

  return undefined;
}

/** Returns the numeric code, or an error message when a template does not resolve to one. */
function resolveStatus(status: StatusExpectation, context: VariableContext): number | string {
  if (typeof status === 'number') {
    return status;
  }
  const substituted = context.substitute(status);
  const code = /^\d+$/.test(substituted) ? parseInt(substituted, 10) : NaN;
  if (!Number.isInteger(code) || code > 65535) {
    return `Invalid status code: ${substituted}`;
  }
  return code;
}

/**
 * Only the expected side is coerced: a substituted string that reads as an
 * integer becomes a number, `true`/`false` become booleans, anything else
 * stays a string.
 */
export function coerceExpected(expected: JsonValue, context: VariableContext): JsonValue {
  if (typeof expected !== 'string') {
    return expected;
  }

  const substituted = context.substitute(expected);
  if (INTEGER_PATTERN.test(substituted)) {
    const parsed = Number(substituted);
    if (Number.isSafeInteger(parsed)) {
      // "-0" compares equal to an actual 0
      return parsed === 0 ? 0 : parsed;
    }
  }
  if (substituted === 'true') return true;
  if (substituted === 'false') return false;
  return substituted;
}

function describeTransportError(error: unknown): string {
  const message = describeError(error);
  if (error instanceof Error && error.cause !== undefined) {
    return `${message} (${describeError(error.cause)})`;
  }
  return message;
}
