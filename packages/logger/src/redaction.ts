export type RedactionMode = 'development' | 'staging' | 'production' | 'test';

const SENSITIVE_KEY_REGEX =
  /(password|secret|token|authorization|authentication|cookie|api[_-]?key|client[_-]?secret)/i;

const REDACTED = '[REDACTED_TOKEN]';

export function redactContext(
  context: Record<string, unknown>,
  mode: RedactionMode
): Record<string, unknown> {
  const out: Record<string, unknown> = {};
  for (const [k, v] of Object.entries(context)) {
    out[k] = redactEntry(k, v, mode);
  }
  return out;
}

function redactEntry(key: string, value: unknown, mode: RedactionMode): unknown {
  if (SENSITIVE_KEY_REGEX.test(key)) return REDACTED;
  if (key === 'stack' && typeof value === 'string') return truncateStack(value, mode);
  return redactDeepInternal(value, mode, key);
}

function redactDeepInternal(value: unknown, mode: RedactionMode, key: string | undefined): unknown {
  if (value == null) return value;
  if (typeof value === 'string') {
    if (key && SENSITIVE_KEY_REGEX.test(key)) return REDACTED;
    return redactStringValue(value, mode);
  }
  if (typeof value === 'number' || typeof value === 'boolean') return value;
  if (value instanceof Error) {
    const out: Record<string, unknown> = {
      name: value.name,
      message: value.message,
    };
    if (typeof value.stack === 'string') {
      out['stack'] = truncateStack(value.stack, mode);
    }
    if (value.cause !== undefined) {
      out['cause'] = redactDeepInternal(value.cause, mode, 'cause');
    }
    return out;
  }
  if (Array.isArray(value)) {
    return value.map((item) => redactDeepInternal(item, mode, key));
  }
  if (typeof value === 'object') {
    const out: Record<string, unknown> = {};
    for (const [k, v] of Object.entries(value)) {
      out[k] = redactEntry(k, v, mode);
    }
    return out;
  }
  return value;
}

function truncateStack(stack: string, mode: RedactionMode): string {
  if (mode !== 'production') return stack;
  return stack.split('\n').slice(0, 3).join('\n');
}

function redactStringValue(input: string, mode: RedactionMode): string {
  if (mode === 'test') return input;
  const value = input.trim();
  if (!value) return input;

  const emailMatch = /^([^@\s]+)@([^@\s]+)$/.exec(value);
  if (emailMatch) {
    const local = emailMatch[1] ?? '';
    const domain = emailMatch[2] ?? '';
    const tld = domain.split('.').pop() ?? 'com';
    const firstChar = local.slice(0, 1) || 'x';
    return `${firstChar}***@***.${tld}`;
  }

  // Bearer tokens and similar opaque credentials. Item ids and SKUs stay well below this length.
  const bare = value.replace(/^bearer\s+/i, '');
  if (/^[A-Za-z0-9_.-]{32,}$/.test(bare)) {
    return `${bare.slice(0, 4)}***${bare.slice(-4)}`;
  }

  return input;
}
