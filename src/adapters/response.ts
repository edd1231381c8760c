/**
 * Shared adapter contract: one request, one expected status, one decoded
 * body. Each adapter returns a StepOutcome the orchestrator records.
 */

import { z } from 'zod';
import { FlowError, httpStatusError, remoteStateError } from '../domain/errors';
import { EnvironmentConfig } from '../domain/environment';
import { Credentials, StepKey } from '../domain/run';
import { HttpResponse, HttpTransport } from '../transport/http-transport';

/** Everything an adapter needs besides its typed request. */
export interface AdapterContext {
  transport: HttpTransport;
  credentials: Credentials;
  environment: EnvironmentConfig;
}

/** What one step produced: the recorded status/body plus the typed output fed forward. */
export interface StepOutcome<T> {
  status: number;
  body: Record<string, unknown>;
  output: T;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/** Response text, as UTF-8. */
export function responseText(res: HttpResponse): string {
  return res.bytes.toString('utf-8');
}

/**
 * Decode a response body into a key/value record. Non-object JSON is
 * wrapped as `{ items }`, non-JSON text as `{ raw }`, an empty body as `{}`.
 */
export function decodeBody(res: HttpResponse): Record<string, unknown> {
  const text = responseText(res);
  if (text.trim().length === 0) return {};
  let parsed: unknown;
  try {
    parsed = JSON.parse(text);
  } catch {
    return { raw: text };
  }
  return isRecord(parsed) ? parsed : { items: parsed };
}

/** Throw an `http_status` error unless the response has the expected status. */
export function expectStatus(stepKey: StepKey, res: HttpResponse, expected: number): void {
  if (res.status !== expected) {
    throw new FlowError(
      httpStatusError(stepKey, expected, res.status, responseText(res), res.method, res.url),
    );
  }
}

/**
 * Validate a decoded body. A body that is missing what the flow needs is a
 * `remote_state` error: the call succeeded but the data is wrong.
 */
export function parseBody<S extends z.ZodTypeAny>(
  stepKey: StepKey,
  schema: S,
  body: Record<string, unknown>,
): z.infer<S> {
  const result = schema.safeParse(body);
  if (!result.success) {
    const issues = result.error.issues.map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`);
    throw new FlowError(
      remoteStateError(stepKey, `unexpected response body (${issues.join('; ')})`, { issues, body }),
    );
  }
  return result.data;
}

/** Vendor ids arrive as integers; some endpoints serialize them as strings. */
export const idSchema = z.union([
  z.number().int(),
  z.string().regex(/^\d+$/).transform((value) => Number(value)),
]);
