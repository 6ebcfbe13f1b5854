/**
 * Classify Gmail API failures into tool error kinds
 */
import { errorMessage, type ToolError } from '../mcp/results.js';

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null;
}

/**
 * HTTP status of a googleapis (gaxios) error, if it carries one
 */
export function statusOf(error: unknown): number | undefined {
  if (!isRecord(error)) return undefined;
  if (isRecord(error.response) && typeof error.response.status === 'number') {
    return error.response.status;
  }
  if (typeof error.code === 'number') return error.code;
  if (typeof error.status === 'number') return error.status;
  return undefined;
}

function isAuthFailure(message: string): boolean {
  return (
    message.includes('invalid_grant') ||
    message.includes('invalid_client') ||
    message.includes('unauthorized_client') ||
    message.includes('OAuth')
  );
}

export function classifyGmailError(error: unknown): ToolError {
  const code = statusOf(error);
  const message = errorMessage(error) || 'Unknown Gmail API error';

  // Token expired or revoked
  if (code === 401) {
    return {
      kind: 'token_expired',
      code,
      message: `Gmail access token rejected. Delete token.json and re-authenticate. (${message})`
    };
  }

  if (code === 403 && message.toLowerCase().includes('insufficient')) {
    return {
      kind: 'insufficient_scope',
      code,
      message: 'Gmail access not authorized for this operation. Delete token.json and re-authenticate to grant the required scopes.'
    };
  }

  if (code === 429 || (code === 403 && message.toLowerCase().includes('rate'))) {
    return {
      kind: 'rate_limited',
      code,
      message: 'Gmail API rate limit exceeded. Please wait a moment and try again.'
    };
  }

  if (code === 404) {
    return { kind: 'not_found', code, message };
  }

  // No HTTP status: failed before reaching the API, during authentication
  if (code === undefined && isAuthFailure(message)) {
    return { kind: 'auth_failed', message };
  }

  return code === undefined
    ? { kind: 'gmail_api_error', message }
    : { kind: 'gmail_api_error', code, message };
}
