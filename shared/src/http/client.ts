import type { z } from 'zod';
import { errorBodySchema } from '../contracts.js';
import { CycleError, type ErrorKind } from '../errors.js';
import { describeIssues } from './json.js';

export type FetchLike = (input: string, init?: RequestInit) => Promise<Response>;

export interface RequestOptions<T> {
  method?: 'GET' | 'POST';
  body?: unknown;
  schema: z.ZodType<T>;
  timeoutMs: number;
  /** Kind reported when the peer answers with an error that names none */
  failureKind: ErrorKind;
  fetchImpl?: FetchLike;
}

/** undefined when the body is not JSON */
function parseJson(text: string): unknown {
  try {
    return JSON.parse(text);
  } catch {
    return undefined;
  }
}

function failureFromBody(status: number, raw: unknown, fallback: ErrorKind): CycleError {
  const body = errorBodySchema.safeParse(raw);
  const message = body.success ? body.data.message : `Request failed with status ${status}`;

  if (status === 409) return new CycleError('Busy', message);
  if (body.success && body.data.kind) return new CycleError(body.data.kind, message);
  return new CycleError(fallback, message);
}

/**
 * Issue exactly one JSON request with a hard timeout. Never retries: a
 * repeated capture or motor call would act on hardware twice.
 *
 * Timeouts and connection failures become TransportError, bodies that break
 * the contract become ProtocolError, and error bodies from the peer keep the
 * kind the peer reported.
 */
export async function requestJson<T>(url: string, options: RequestOptions<T>): Promise<T> {
  const fetchImpl = options.fetchImpl ?? fetch;
  const controller = new AbortController();
  const timeoutId = setTimeout(() => controller.abort(), options.timeoutMs);

  let status: number;
  let text: string;
  try {
    const response = await fetchImpl(url, {
      method: options.method ?? 'GET',
      headers: { 'Content-Type': 'application/json' },
      ...(options.body !== undefined && { body: JSON.stringify(options.body) }),
      signal: controller.signal,
    });
    status = response.status;
    text = await response.text();
  } catch (error) {
    if (error instanceof Error && error.name === 'AbortError') {
      throw new CycleError('TransportError', `Request to ${url} timed out after ${options.timeoutMs}ms`);
    }
    const message = error instanceof Error ? error.message : String(error);
    throw new CycleError('TransportError', `Could not reach ${url}: ${message}`, { cause: error });
  } finally {
    clearTimeout(timeoutId);
  }

  // Error statuses are mapped even when the body is an HTML page from a proxy.
  const raw = parseJson(text);
  if (status < 200 || status >= 300) {
    throw failureFromBody(status, raw, options.failureKind);
  }
  if (raw === undefined) {
    throw new CycleError('ProtocolError', `Response from ${url} is not JSON`);
  }

  const parsed = options.schema.safeParse(raw);
  if (!parsed.success) {
    throw new CycleError('ProtocolError', `Unexpected response from ${url}: ${describeIssues(parsed.error)}`);
  }
  return parsed.data;
}
