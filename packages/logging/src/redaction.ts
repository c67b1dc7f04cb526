const DEFAULT_SENSITIVE_SUBSTRINGS = [
  'token',
  'secret',
  'password',
  'passwd',
  'authorization',
  'cookie',
  'credential',
  'apikey',
  'api_key',
  'privatekey',
  'private_key'
] as const;

const REDACTED_VALUE = '[REDACTED]';
const MAX_RECURSION_DEPTH = 12;
const DEFAULT_MAX_BODY_LOG_LENGTH = 2000;

const normalizeKey = (value: string) => value.trim().toLowerCase().replace(/[^a-z0-9_]/gu, '');

const isSensitiveKey = ({
  key,
  extraSensitiveKeys
}: {
  key: string;
  extraSensitiveKeys: Set<string>;
}) => {
  const normalized = normalizeKey(key);
  if (extraSensitiveKeys.has(normalized)) {
    return true;
  }

  return DEFAULT_SENSITIVE_SUBSTRINGS.some(entry => normalized.includes(entry));
};

const toExtraKeySet = (extraSensitiveKeys: string[]) =>
  new Set(extraSensitiveKeys.map(item => normalizeKey(item)).filter(item => item.length > 0));

const sanitizeErrorForLog = (error: Error) => ({
  name: error.name,
  message: error.message,
  ...(error.stack ? {stack: error.stack} : {})
});

type SanitizeState = {
  seen: WeakSet<object>;
  extraSensitiveKeys: Set<string>;
};

const sanitizeEntries = ({
  value,
  depth,
  state
}: {
  value: object;
  depth: number;
  state: SanitizeState;
}): Record<string, unknown> =>
  Object.fromEntries(
    Object.entries(value).map(([key, entryValue]: [string, unknown]) => {
      if (isSensitiveKey({key, extraSensitiveKeys: state.extraSensitiveKeys})) {
        return [key, REDACTED_VALUE] as const;
      }

      return [key, sanitizeInternal({value: entryValue, depth: depth + 1, state})] as const;
    })
  );

const sanitizeInternal = ({
  value,
  depth,
  state
}: {
  value: unknown;
  depth: number;
  state: SanitizeState;
}): unknown => {
  if (depth > MAX_RECURSION_DEPTH) {
    return '[TRUNCATED]';
  }

  if (value === null || value === undefined) {
    return value;
  }

  if (typeof value === 'string' || typeof value === 'number' || typeof value === 'boolean') {
    return value;
  }

  if (typeof value === 'bigint') {
    return value.toString();
  }

  if (typeof value === 'symbol') {
    return value.toString();
  }

  if (typeof value === 'function') {
    return '[FUNCTION]';
  }

  if (value instanceof Date) {
    return Number.isNaN(value.getTime()) ? '[INVALID_DATE]' : value.toISOString();
  }

  if (value instanceof Error) {
    return sanitizeErrorForLog(value);
  }

  if (Buffer.isBuffer(value)) {
    return `<binary data: ${value.byteLength} bytes>`;
  }

  if (Array.isArray(value)) {
    return value.map((item: unknown) => sanitizeInternal({value: item, depth: depth + 1, state}));
  }

  if (state.seen.has(value)) {
    return '[CIRCULAR]';
  }

  state.seen.add(value);
  return sanitizeEntries({value, depth, state});
};

export const sanitizeForLog = ({
  value,
  extraSensitiveKeys = []
}: {
  value: unknown;
  extraSensitiveKeys?: string[];
}): unknown =>
  sanitizeInternal({
    value,
    depth: 0,
    state: {seen: new WeakSet<object>(), extraSensitiveKeys: toExtraKeySet(extraSensitiveKeys)}
  });

export const sanitizeRecordForLog = ({
  value,
  extraSensitiveKeys = []
}: {
  value: Record<string, unknown>;
  extraSensitiveKeys?: string[];
}): Record<string, unknown> => {
  const state: SanitizeState = {
    seen: new WeakSet<object>([value]),
    extraSensitiveKeys: toExtraKeySet(extraSensitiveKeys)
  };

  return sanitizeEntries({value, depth: 0, state});
};

const truncate = ({text, maxLength, marker}: {text: string; maxLength: number; marker: string}) =>
  text.length > maxLength ? `${text.slice(0, maxLength)}${marker}` : text;

const parseJsonOrUndefined = (text: string): unknown => {
  try {
    return JSON.parse(text) as unknown;
  } catch {
    return undefined;
  }
};

/**
 * Renders a request or response body for debug logs. JSON bodies are
 * sanitized and pretty-printed; anything else is logged as UTF-8 text.
 */
export const formatBodyForLog = ({
  body,
  maxLength = DEFAULT_MAX_BODY_LOG_LENGTH,
  extraSensitiveKeys = []
}: {
  body: Buffer | undefined;
  maxLength?: number;
  extraSensitiveKeys?: string[];
}): string | undefined => {
  if (!body || body.byteLength === 0) {
    return undefined;
  }

  const text = body.toString('utf8');
  const parsed = parseJsonOrUndefined(text);
  if (parsed === undefined) {
    return truncate({text, maxLength, marker: '...(truncated)'});
  }

  const formatted = JSON.stringify(sanitizeForLog({value: parsed, extraSensitiveKeys}), null, 2);
  return truncate({text: formatted, maxLength, marker: '\n...(truncated)'});
};
