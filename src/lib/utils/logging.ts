/**
 * Effect Logging - Structured logging utilities for flow recording.
 * Provides Effect-based logging with module/operation context.
 */

import {
  Array as EffectArray,
  Effect,
  Layer,
  List,
  Logger,
  LogLevel,
  pipe,
} from 'effect';
import { ConfigService } from '../services/config';

// ============= Log Level Configuration =============

/**
 * Available log levels in order of severity.
 */
export const LOG_LEVELS = {
  trace: LogLevel.Trace,
  debug: LogLevel.Debug,
  info: LogLevel.Info,
  warn: LogLevel.Warning,
  error: LogLevel.Error,
  none: LogLevel.None,
} as const;

export type LogLevelName = keyof typeof LOG_LEVELS;

// ============= Structured Log Context =============

/**
 * Context for structured logging.
 */
export interface LogContext {
  readonly module?: string;
  readonly operation?: string;
  readonly id?: string | undefined;
  readonly instruction?: string | undefined;
  readonly duration?: number;
  readonly metadata?: Record<string, unknown>;
}

/**
 * Error context for error logging.
 */
export interface ErrorLogContext extends LogContext {
  readonly error: unknown;
}

// ============= Core Logging Functions =============

const createLogMessage = (message: string, context?: LogContext): string => {
  const parts: string[] = [];

  if (context?.module) {
    parts.push(`[${context.module}]`);
  }

  if (context?.operation) {
    parts.push(`${context.operation}:`);
  }

  parts.push(message);

  const contextParts: string[] = [];

  if (context?.id) {
    contextParts.push(`id=${context.id}`);
  }

  if (context?.instruction) {
    contextParts.push(`instruction=${context.instruction}`);
  }

  if (context?.duration !== undefined) {
    contextParts.push(`duration=${context.duration}ms`);
  }

  if (context?.metadata) {
    for (const [key, value] of Object.entries(context.metadata)) {
      contextParts.push(`${key}=${String(value)}`);
    }
  }

  if (contextParts.length > 0) {
    parts.push(`(${contextParts.join(', ')})`);
  }

  return parts.join(' ');
};

const describeError = (error: unknown): string => {
  if (error instanceof Error) {
    return `Error: ${error.message}`;
  }
  if (typeof error === 'object' && error !== null && '_tag' in error) {
    const tag = String(error._tag);
    const message = 'message' in error ? String(error.message) : '';
    return `TaggedError: ${tag} - ${message}`;
  }
  return `Error: ${String(error)}`;
};

export const logDebug = (
  message: string,
  context?: LogContext
): Effect.Effect<void> => Effect.logDebug(createLogMessage(message, context));

export const logInfo = (
  message: string,
  context?: LogContext
): Effect.Effect<void> => Effect.logInfo(createLogMessage(message, context));

export const logWarn = (
  message: string,
  context?: LogContext
): Effect.Effect<void> =>
  Effect.logWarning(createLogMessage(message, context));

/**
 * Log at error level with the failure appended to the message.
 */
export const logError = (
  message: string,
  context?: ErrorLogContext
): Effect.Effect<void> => {
  const base = createLogMessage(message, context);
  return Effect.logError(
    context?.error !== undefined
      ? `${base} | ${describeError(context.error)}`
      : base
  );
};

// ============= Logging Combinators =============

/**
 * Wrap an effect with start/complete/failure logging at debug level.
 */
export const withOperationLogging = <A, E, R>(
  operation: string,
  effect: Effect.Effect<A, E, R>,
  context?: LogContext
): Effect.Effect<A, E, R> =>
  Effect.gen(function* () {
    const startTime = Date.now();

    yield* logDebug(`Starting ${operation}`, context);

    return yield* pipe(
      effect,
      Effect.tap(() =>
        logDebug(`Completed ${operation}`, {
          ...context,
          duration: Date.now() - startTime,
        })
      ),
      Effect.tapError((error) =>
        logError(`Failed ${operation}`, { ...context, error })
      )
    );
  });

// ============= Logger Configuration =============

/**
 * Console logger printing timestamp, level, spans and message.
 */
export const createFlowLogger = (): Logger.Logger<unknown, void> =>
  Logger.make(({ logLevel, message, spans }) => {
    const timestamp = new Date().toISOString();
    const spanInfo =
      List.size(spans) > 0
        ? ` [${EffectArray.fromIterable(spans)
            .map((s) => s.label)
            .join(' > ')}]`
        : '';
    const text = Array.isArray(message)
      ? message.map((part) => String(part)).join(' ')
      : String(message);

    console.log(`${timestamp} ${logLevel.label}${spanInfo} ${text}`);
  });

/**
 * Replace the default logger and set the minimum level.
 */
export const loggingLayer = (level: LogLevelName): Layer.Layer<never> =>
  Layer.merge(
    Logger.replace(Logger.defaultLogger, createFlowLogger()),
    Logger.minimumLogLevel(LOG_LEVELS[level])
  );

/**
 * Run an effect under the logger at the level the ConfigService holds.
 */
export const withConfiguredLogging = <A, E, R>(
  effect: Effect.Effect<A, E, R>
): Effect.Effect<A, E, R | ConfigService> =>
  Effect.gen(function* () {
    const config = yield* ConfigService;
    const { level } = yield* config.get('logging');
    return yield* Effect.provide(effect, loggingLayer(level));
  });
