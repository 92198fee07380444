const SENSITIVE_KEY_FRAGMENTS = [
  'token',
  'secret',
  'password',
  'authorization',
  'cookie',
  'privatekey',
  'private_key',
  'material',
  'pem'
] as const;

const REDACTED = '[REDACTED]';
const MAX_DEPTH = 12;

// PEM armour, including a block cut off before its END line.
const PEM_BLOCK = /-----BEGIN ([A-Z0-9 ]+)-----[\s\S]*?(?:-----END \1-----|$)/gu;
const URL_USERINFO = /\b([a-z][a-z0-9+.-]*:\/\/)[^\s/@]+@/giu;

const normalizeKey = (value: string) => value.trim().toLowerCase().replace(/[^a-z0-9_]/gu, '');

/**
 * Masks certificate and key material and URL credentials inside free text,
 * such as validator output or an error message that quotes an upload.
 */
const scrubText = (text: string) =>
  text
    .replace(PEM_BLOCK, (_block, label: string) => `[REDACTED ${label}]`)
    .replace(URL_USERINFO, `$1${REDACTED}@`);

type Walk = (value: unknown, depth: number) => unknown;

const errorCodeOf = (error: Error) =>
  'code' in error && (typeof error.code === 'string' || typeof error.code === 'number') ? error.code : undefined;

const summarizeError = (error: Error, depth: number, walk: Walk) => {
  const code = errorCodeOf(error);
  return {
    name: error.name,
    message: scrubText(error.message),
    ...(code === undefined ? {} : {code}),
    ...(error.stack ? {stack: scrubText(error.stack)} : {}),
    ...(error.cause === undefined ? {} : {cause: walk(error.cause, depth + 1)})
  };
};

const createWalker = (sensitiveKeys: ReadonlySet<string>): Walk => {
  const seen = new WeakSet<object>();

  const isSensitive = (key: string) => {
    const normalized = normalizeKey(key);
    return sensitiveKeys.has(normalized) || SENSITIVE_KEY_FRAGMENTS.some(fragment => normalized.includes(fragment));
  };

  const walk: Walk = (value, depth) => {
    if (depth > MAX_DEPTH) {
      return '[TRUNCATED]';
    }

    switch (typeof value) {
      case 'string':
        return scrubText(value);
      case 'number':
      case 'boolean':
      case 'undefined':
        return value;
      case 'bigint':
      case 'symbol':
        return value.toString();
      case 'function':
        return '[FUNCTION]';
      default:
        break;
    }

    if (value === null) {
      return null;
    }
    if (value instanceof Date) {
      return Number.isNaN(value.getTime()) ? '[INVALID_DATE]' : value.toISOString();
    }
    if (value instanceof Buffer) {
      return `[BUFFER ${value.length} bytes]`;
    }
    if (value instanceof Error) {
      return summarizeError(value, depth, walk);
    }
    if (seen.has(value)) {
      return '[CIRCULAR]';
    }
    seen.add(value);

    if (Array.isArray(value)) {
      return value.map(item => walk(item, depth + 1));
    }
    if (value instanceof Map) {
      return walk(Object.fromEntries(value), depth);
    }
    if (value instanceof Set) {
      return walk([...value], depth);
    }

    return Object.fromEntries(
      Object.entries(value).map(([key, entry]) => [key, isSensitive(key) ? REDACTED : walk(entry, depth + 1)])
    );
  };

  return walk;
};

/**
 * Copies `value` into something safe to serialize: sensitive keys are masked
 * whole, strings are scrubbed, errors keep their code and cause chain, and
 * cycles and deep nesting are cut.
 */
export const sanitizeForLog = ({
  value,
  extraSensitiveKeys = []
}: {
  value: unknown;
  extraSensitiveKeys?: string[];
}): unknown => {
  const sensitiveKeys = new Set(extraSensitiveKeys.map(normalizeKey).filter(key => key.length > 0));
  return createWalker(sensitiveKeys)(value, 0);
};
