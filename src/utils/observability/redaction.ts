const SECRET_KEY_PATTERN = /(token|secret|password|api[_-]?key|authorization|cookie|encryption[_-]?key|auth[_-]?tag|credentials?$|^code$|^state$)/i;
const ADDRESS_KEY_PATTERN = /^(to|from|sender|recipient|email|address)$/i;
const CONTENT_KEY_PATTERN = /^(body|content|utterance|fact|facts|memory|memories|instructions|prompt|snippet)$/i;

const EMAIL_PATTERN = /([A-Za-z0-9._%+-]+)@([A-Za-z0-9.-]+\.[A-Za-z]{2,})/g;

const MAX_DEPTH = 6;

function maskEmailMatch(_match: string, local: string, domain: string): string {
  return `${local.slice(0, 1)}***@${domain}`;
}

/**
 * Mask the local part of every email address in a string.
 * `alex@example.com` becomes `a***@example.com`.
 */
export function redactEmailAddress(value: string): string {
  return value.replace(EMAIL_PATTERN, maskEmailMatch);
}

function redactString(key: string | undefined, value: string): string {
  if (key && SECRET_KEY_PATTERN.test(key)) {
    return '[REDACTED]';
  }
  if (key && CONTENT_KEY_PATTERN.test(key)) {
    return `[REDACTED_TEXT len=${value.length}]`;
  }
  return redactEmailAddress(value);
}

function redactUnknown(value: unknown, key: string | undefined, depth: number): unknown {
  if (depth > MAX_DEPTH) return '[TRUNCATED]';
  if (value === null || value === undefined) return value;

  if (typeof value === 'number' || typeof value === 'boolean') {
    return value;
  }

  if (typeof value === 'string') {
    return redactString(key, value);
  }

  if (value instanceof Error) {
    return {
      name: value.name,
      message: redactEmailAddress(value.message),
      stack: process.env.NODE_ENV === 'development' ? value.stack : undefined,
    };
  }

  if (Array.isArray(value)) {
    if (key && CONTENT_KEY_PATTERN.test(key)) {
      return `[REDACTED_ARRAY len=${value.length}]`;
    }
    return value.map((item) => redactUnknown(item, key, depth + 1));
  }

  if (typeof value === 'object') {
    const result: Record<string, unknown> = {};
    for (const [childKey, childValue] of Object.entries(value)) {
      if (SECRET_KEY_PATTERN.test(childKey) && typeof childValue !== 'boolean' && typeof childValue !== 'number') {
        result[childKey] = '[REDACTED]';
        continue;
      }
      if (ADDRESS_KEY_PATTERN.test(childKey) && typeof childValue === 'string') {
        result[childKey] = redactEmailAddress(childValue);
        continue;
      }
      result[childKey] = redactUnknown(childValue, childKey, depth + 1);
    }
    return result;
  }

  return String(value);
}

export function redactSecrets(value: Record<string, unknown>): Record<string, unknown> {
  const redacted = redactUnknown(value, undefined, 0);
  return typeof redacted === 'object' && redacted !== null && !Array.isArray(redacted)
    ? { ...redacted }
    : {};
}
