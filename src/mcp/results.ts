/**
 * Typed tool outcomes and their rendering into MCP CallToolResult payloads.
 *
 * Handlers never let an exception reach the transport: `runTool` catches it,
 * classifies it into a {@link ToolError} and the client receives a JSON body
 * `{ error, code?, message }` flagged with `isError`.
 */
import type { CallToolResult } from '@modelcontextprotocol/sdk/types.js';

export type ToolErrorKind =
  | 'auth_failed'
  | 'token_expired'
  | 'insufficient_scope'
  | 'rate_limited'
  | 'not_found'
  | 'gmail_api_error'
  | 'command_failed';

export interface ToolError {
  kind: ToolErrorKind;
  message: string;
  code?: number;
}

export type ToolOutcome<T> =
  | { ok: true; value: T }
  | { ok: false; error: ToolError };

export type ErrorClassifier = (error: unknown) => ToolError;

export function ok<T>(value: T): ToolOutcome<T> {
  return { ok: true, value };
}

export function fail<T = never>(error: ToolError): ToolOutcome<T> {
  return { ok: false, error };
}

export function errorMessage(error: unknown): string {
  if (error instanceof Error) return error.message;
  return String(error);
}

/**
 * Run an adapter call and capture any thrown error as a typed outcome.
 */
export async function runTool<T>(
  call: () => Promise<T>,
  classify: ErrorClassifier
): Promise<ToolOutcome<T>> {
  try {
    return ok(await call());
  } catch (error) {
    return fail(classify(error));
  }
}

export function textResult(text: string, isError = false): CallToolResult {
  return isError
    ? { content: [{ type: 'text', text }], isError: true }
    : { content: [{ type: 'text', text }] };
}

export function jsonResult(value: unknown, isError = false): CallToolResult {
  return textResult(JSON.stringify(value, null, 2), isError);
}

export function errorResult(error: ToolError): CallToolResult {
  const body: { error: ToolErrorKind; code?: number; message?: string } = { error: error.kind };
  if (error.code !== undefined) body.code = error.code;
  body.message = error.message;
  return jsonResult(body, true);
}

/**
 * Render an outcome whose value is structured data as JSON text.
 */
export function toJsonToolResult<T>(outcome: ToolOutcome<T>): CallToolResult {
  return outcome.ok ? jsonResult(outcome.value) : errorResult(outcome.error);
}

/**
 * Render an outcome whose value is already the text to return.
 */
export function toTextToolResult(outcome: ToolOutcome<string>): CallToolResult {
  return outcome.ok ? textResult(outcome.value) : errorResult(outcome.error);
}
