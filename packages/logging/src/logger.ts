import type {Writable} from 'node:stream';

import {LogEventSchema, type LogEvent} from '@hostplane/schemas';
import {z} from 'zod';

import {getLogContext, type LogContext} from './context';
import {sanitizeForLog} from './redaction';

export const LogLevelSchema = z.enum(['debug', 'info', 'warn', 'error', 'fatal', 'silent']);
export type LogLevel = z.infer<typeof LogLevelSchema>;

const EmittableLogLevelSchema = z.enum(['debug', 'info', 'warn', 'error', 'fatal']);
type EmittableLogLevel = z.infer<typeof EmittableLogLevelSchema>;

export const LogEventInputSchema = z
  .object({
    level: EmittableLogLevelSchema,
    event: z.string().min(1),
    component: z.string().min(1),
    message: z.string().min(1).optional(),
    correlation_id: z.string().min(1).max(128).optional(),
    request_id: z.string().min(1).max(128).optional(),
    session_id: z.string().min(1).optional(),
    certificate_id: z.string().min(1).optional(),
    reason_code: z.string().min(1).optional(),
    duration_ms: z.number().int().gte(0).optional(),
    status_code: z.number().int().gte(100).lte(599).optional(),
    route: z.string().min(1).optional(),
    method: z.string().min(1).optional(),
    metadata: z.record(z.string(), z.unknown()).optional()
  })
  .strict();

export type LogEventInput = z.infer<typeof LogEventInputSchema>;

type LevelInput = Omit<LogEventInput, 'level'>;

// Fields a child logger stamps on every event it emits.
export type LogBindings = Partial<Pick<LogEventInput, 'component' | 'session_id' | 'certificate_id'>>;

type ChildInput = Omit<LevelInput, 'component'> & {component?: string};

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
  fatal: 50,
  silent: 90
};

export type StructuredLogWriter = {
  stdout: Pick<Writable, 'write'>;
  stderr: Pick<Writable, 'write'>;
};

export type StructuredLoggerOptions = {
  service: string;
  env: string;
  level: LogLevel;
  now?: () => Date;
  writer?: StructuredLogWriter;
  extraSensitiveKeys?: string[];
};

export type StructuredLogger = {
  log: (input: LogEventInput) => void;
  debug: (input: LevelInput) => void;
  info: (input: LevelInput) => void;
  warn: (input: LevelInput) => void;
  error: (input: LevelInput) => void;
  fatal: (input: LevelInput) => void;
  child: (bindings: LogBindings) => BoundLogger;
};

export type BoundLogger = {
  debug: (input: ChildInput) => void;
  info: (input: ChildInput) => void;
  warn: (input: ChildInput) => void;
  error: (input: ChildInput) => void;
  fatal: (input: ChildInput) => void;
};

const defaultWriter: StructuredLogWriter = {
  stdout: process.stdout,
  stderr: process.stderr
};

const isRecord = (value: unknown): value is Record<string, unknown> =>
  typeof value === 'object' && value !== null && !Array.isArray(value);

const chooseStream = ({level, writer}: {level: EmittableLogLevel; writer: StructuredLogWriter}) =>
  level === 'error' || level === 'fatal' ? writer.stderr : writer.stdout;

const resolveContext = ({context, input}: {context: LogContext | undefined; input: LogEventInput}) => ({
  correlation_id: input.correlation_id ?? context?.correlation_id ?? 'n/a',
  request_id: input.request_id ?? context?.request_id ?? 'n/a',
  session_id: input.session_id ?? context?.session_id,
  certificate_id: input.certificate_id ?? context?.certificate_id,
  route: input.route ?? context?.route,
  method: input.method ?? context?.method
});

const createEnvelope = ({
  input,
  options,
  context
}: {
  input: LogEventInput;
  options: StructuredLoggerOptions;
  context: LogContext | undefined;
}): LogEvent => {
  const resolved = resolveContext({context, input});
  const sanitizedMetadata = sanitizeForLog({
    value: input.metadata ?? {},
    extraSensitiveKeys: options.extraSensitiveKeys
  });

  return LogEventSchema.parse({
    ts: (options.now ?? (() => new Date()))().toISOString(),
    level: input.level,
    service: options.service,
    env: options.env,
    event: input.event,
    component: input.component,
    correlation_id: resolved.correlation_id,
    request_id: resolved.request_id,
    ...(input.message ? {message: input.message} : {}),
    ...(resolved.session_id ? {session_id: resolved.session_id} : {}),
    ...(resolved.certificate_id ? {certificate_id: resolved.certificate_id} : {}),
    ...(input.reason_code ? {reason_code: input.reason_code} : {}),
    ...(input.duration_ms !== undefined ? {duration_ms: input.duration_ms} : {}),
    ...(input.status_code !== undefined ? {status_code: input.status_code} : {}),
    ...(resolved.route ? {route: resolved.route} : {}),
    ...(resolved.method ? {method: resolved.method} : {}),
    metadata: isRecord(sanitizedMetadata) ? sanitizedMetadata : {}
  });
};

const bindLogger = ({
  log,
  bindings
}: {
  log: (input: LogEventInput) => void;
  bindings: LogBindings;
}): BoundLogger => {
  const emit = (level: EmittableLogLevel, input: ChildInput) =>
    log({
      ...bindings,
      ...input,
      component: input.component ?? bindings.component ?? 'unknown',
      level
    });

  return {
    debug: input => emit('debug', input),
    info: input => emit('info', input),
    warn: input => emit('warn', input),
    error: input => emit('error', input),
    fatal: input => emit('fatal', input)
  };
};

export const createStructuredLogger = (options: StructuredLoggerOptions): StructuredLogger => {
  const parsedOptions = {
    ...options,
    level: LogLevelSchema.parse(options.level),
    service: z.string().min(1).parse(options.service),
    env: z.string().min(1).parse(options.env),
    writer: options.writer ?? defaultWriter,
    extraSensitiveKeys: options.extraSensitiveKeys ?? []
  };

  const log = (rawInput: LogEventInput) => {
    try {
      const input = LogEventInputSchema.parse(rawInput);
      if (LEVEL_ORDER[input.level] < LEVEL_ORDER[parsedOptions.level]) {
        return;
      }

      const envelope = createEnvelope({
        input,
        options: parsedOptions,
        context: getLogContext()
      });
      chooseStream({level: input.level, writer: parsedOptions.writer}).write(`${JSON.stringify(envelope)}\n`);
    } catch {
      // Logging failures must never break runtime behavior.
    }
  };

  return {
    log,
    debug: input => log({...input, level: 'debug'}),
    info: input => log({...input, level: 'info'}),
    warn: input => log({...input, level: 'warn'}),
    error: input => log({...input, level: 'error'}),
    fatal: input => log({...input, level: 'fatal'}),
    child: bindings => bindLogger({log, bindings})
  };
};

export const createNoopLogger = (): StructuredLogger => {
  const log = () => undefined;
  return {
    log,
    debug: log,
    info: log,
    warn: log,
    error: log,
    fatal: log,
    child: bindings => bindLogger({log, bindings})
  };
};
