import type {Writable} from 'node:stream';

import {LogEventSchema, LogLevelNameSchema, type LogEvent} from '@jira-relay/schemas';
import {z} from 'zod';

import {getLogContext, LogContextSchema, type LogContext} from './context';
import {sanitizeRecordForLog} from './redaction';

export const LogLevelSchema = z.enum(['debug', 'info', 'warn', 'error', 'fatal', 'silent']);
export type LogLevel = z.infer<typeof LogLevelSchema>;
type EmittableLogLevel = z.infer<typeof LogLevelNameSchema>;

const LEVEL_ORDER = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
  fatal: 50,
  silent: 90
} as const satisfies Record<LogLevel, number>;

/**
 * What a call site hands the logger. Request-scoped fields given here win
 * over the ones held in the active log context.
 */
export const LogEventInputSchema = LogContextSchema.extend({
  level: LogLevelNameSchema,
  event: z.string().min(1),
  component: z.string().min(1),
  message: z.string().min(1).optional(),
  reason_code: z.string().min(1).optional(),
  duration_ms: z.number().int().gte(0).optional(),
  status_code: z.number().int().gte(100).lte(599).optional(),
  metadata: z.record(z.string(), z.unknown()).optional()
}).strict();

export type LogEventInput = z.infer<typeof LogEventInputSchema>;
type LevelledInput = Omit<LogEventInput, 'level'>;

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
  isLevelEnabled: (level: EmittableLogLevel) => boolean;
  debug: (input: LevelledInput) => void;
  info: (input: LevelledInput) => void;
  warn: (input: LevelledInput) => void;
  error: (input: LevelledInput) => void;
  fatal: (input: LevelledInput) => void;
};

const processWriter: StructuredLogWriter = {
  stdout: process.stdout,
  stderr: process.stderr
};

const withoutUndefined = (value: Record<string, unknown>) =>
  Object.fromEntries(Object.entries(value).filter(([, entry]) => entry !== undefined));

type ResolvedOptions = Required<Omit<StructuredLoggerOptions, 'writer'>> & {writer: StructuredLogWriter};

const buildEnvelope = ({
  input,
  options,
  context
}: {
  input: LogEventInput;
  options: ResolvedOptions;
  context: LogContext | undefined;
}): LogEvent => {
  const {level, metadata, ...fields} = input;

  return LogEventSchema.parse({
    ts: options.now().toISOString(),
    level,
    service: options.service,
    env: options.env,
    correlation_id: 'n/a',
    request_id: 'n/a',
    ...withoutUndefined({...context}),
    ...withoutUndefined(fields),
    metadata: sanitizeRecordForLog({value: metadata ?? {}, extraSensitiveKeys: options.extraSensitiveKeys})
  });
};

export const createStructuredLogger = (options: StructuredLoggerOptions): StructuredLogger => {
  const resolved: ResolvedOptions = {
    service: z.string().min(1).parse(options.service),
    env: z.string().min(1).parse(options.env),
    level: LogLevelSchema.parse(options.level),
    now: options.now ?? (() => new Date()),
    writer: options.writer ?? processWriter,
    extraSensitiveKeys: options.extraSensitiveKeys ?? []
  };
  const threshold = LEVEL_ORDER[resolved.level];

  const isLevelEnabled = (level: EmittableLogLevel) => LEVEL_ORDER[level] >= threshold;

  const log = (rawInput: LogEventInput) => {
    const input = LogEventInputSchema.parse(rawInput);
    if (!isLevelEnabled(input.level)) {
      return;
    }

    const stream = input.level === 'error' || input.level === 'fatal' ? resolved.writer.stderr : resolved.writer.stdout;
    try {
      stream.write(`${JSON.stringify(buildEnvelope({input, options: resolved, context: getLogContext()}))}\n`);
    } catch {
      // A broken sink must not take the request down with it.
    }
  };

  const at =
    (level: EmittableLogLevel) =>
    (input: LevelledInput): void =>
      log({...input, level});

  return {
    log,
    isLevelEnabled,
    debug: at('debug'),
    info: at('info'),
    warn: at('warn'),
    error: at('error'),
    fatal: at('fatal')
  };
};

export const createNoopLogger = (): StructuredLogger => {
  const ignore = () => undefined;

  return {
    log: ignore,
    isLevelEnabled: () => false,
    debug: ignore,
    info: ignore,
    warn: ignore,
    error: ignore,
    fatal: ignore
  };
};
