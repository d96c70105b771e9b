import type { z } from 'zod';
import { CycleError, httpStatusFor, type CycleFailure } from '../errors.js';
import type { ErrorBody } from '../contracts.js';
import { corsHeaders } from './cors.js';

export function json(body: unknown, status = 200): Response {
  return new Response(JSON.stringify(body), {
    status,
    headers: { ...corsHeaders, 'Content-Type': 'application/json' },
  });
}

export function errorResponse(failure: CycleFailure, status = httpStatusFor(failure.kind)): Response {
  const body: ErrorBody = { status: 'error', message: failure.message, kind: failure.kind };
  return json(body, status);
}

export function preflight(): Response {
  return new Response(null, { status: 204, headers: corsHeaders });
}

/** Parse and validate a request body, failing with ProtocolError on bad input. */
export async function readBody<T>(req: Request, schema: z.ZodType<T>): Promise<T> {
  let raw: unknown;
  try {
    const text = await req.text();
    raw = text.length === 0 ? {} : JSON.parse(text);
  } catch {
    throw new CycleError('ProtocolError', 'Request body is not valid JSON');
  }

  const parsed = schema.safeParse(raw);
  if (!parsed.success) {
    throw new CycleError('ProtocolError', `Invalid request body: ${describeIssues(parsed.error)}`);
  }
  return parsed.data;
}

export function describeIssues(error: z.ZodError): string {
  return error.issues
    .map((issue) => (issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message))
    .join('; ');
}
