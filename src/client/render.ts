/**
 * Render agent output for the terminal as indented JSON.
 */

interface MessageLike {
  role: string;
  content: unknown;
}

function isMessageLike(value: unknown): value is MessageLike {
  return (
    typeof value === 'object' &&
    value !== null &&
    'content' in value &&
    'role' in value &&
    typeof value.role === 'string'
  );
}

/**
 * Message-like values (anything with a role and content) become `{ type, content }`
 */
function messageReplacer(_key: string, value: unknown): unknown {
  if (isMessageLike(value)) {
    return { type: value.role, content: value.content };
  }
  return value;
}

/**
 * JSON rendering of `value`; falls back to its plain string form when it
 * cannot be serialized.
 */
export function renderResponse(value: unknown): string {
  try {
    return JSON.stringify(value, messageReplacer, 2) ?? String(value);
  } catch {
    return String(value);
  }
}
