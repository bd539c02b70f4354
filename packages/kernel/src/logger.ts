/**
 * Logger - Structured logging with tick context injection
 *
 * Built on pino. Every line written while a root runs a tick carries the
 * root name, tick number and phase of that tick.
 *
 * @example
 * ```typescript
 * import { Logger } from 'tessera-kernel';
 *
 * Logger.configure({ level: 'debug' });
 *
 * const log = Logger.for('Reconciler');
 * log.debug({ effects: 4 }, 'diff complete');
 * // {"level":20,"component":"Reconciler","root":"hud","tick":7,"phase":"reconcile",...}
 * ```
 */

import pino, {
  type Logger as PinoLogger,
  type LoggerOptions,
  type TransportSingleOptions,
  type TransportMultiOptions,
  type DestinationStream,
} from "pino";
import { Context, type KernelContext } from "./context";

// =============================================================================
// Types
// =============================================================================

/**
 * Log levels supported by the kernel logger, least to most severe.
 * `silent` disables all output.
 */
export type LogLevel = "trace" | "debug" | "info" | "warn" | "error" | "fatal" | "silent";

const LOG_LEVELS: readonly LogLevel[] = ["trace", "debug", "info", "warn", "error", "fatal", "silent"];

export function isLogLevel(value: unknown): value is LogLevel {
  return typeof value === "string" && LOG_LEVELS.some((level) => level === value);
}

/**
 * Function to extract fields from KernelContext for logging.
 * Return an object with fields to include in every log entry.
 *
 * @see {@link composeContextFields} - Combine multiple extractors
 */
export type ContextFieldsExtractor = (ctx: KernelContext) => Record<string, unknown>;

export interface LoggerConfig {
  /** Log level (default: LOG_LEVEL env var, then 'info') */
  level?: LogLevel;
  /** Pino transport configuration */
  transport?: TransportSingleOptions | TransportMultiOptions;
  /** Write to this stream instead of stdout or a transport */
  destination?: DestinationStream;
  /** Inject tick context into every log (default: true) */
  includeContext?: boolean;
  /**
   * Custom function to extract fields from context, added on top of the
   * default root/tick/phase fields.
   *
   * @example
   * ```typescript
   * Logger.configure({
   *   contextFields: (ctx) => ({ scene: ctx.metadata.scene }),
   * });
   * ```
   */
  contextFields?: ContextFieldsExtractor;
  /** Base properties to include in every log */
  base?: Record<string, unknown>;
  /** Custom mixin function for additional properties */
  mixin?: () => Record<string, unknown>;
  /** Pretty print (default: true only when NODE_ENV is 'development') */
  prettyPrint?: boolean;
  /**
   * Replace existing config instead of merging (default: false).
   */
  replace?: boolean;
}

/**
 * Log method signature supporting both message-first and object-first forms.
 *
 * @example
 * ```typescript
 * log.info('tick committed');
 * log.warn({ identity, effect: 'mount' }, 'host rejected effect');
 * ```
 */
export interface LogMethod {
  (msg: string, ...args: unknown[]): void;
  (obj: Record<string, unknown>, msg?: string, ...args: unknown[]): void;
}

/**
 * Kernel logger interface with structured logging and context injection.
 */
export interface KernelLogger {
  trace: LogMethod;
  debug: LogMethod;
  info: LogMethod;
  warn: LogMethod;
  error: LogMethod;
  fatal: LogMethod;

  /** Create a child logger with additional bindings */
  child(bindings: Record<string, unknown>): KernelLogger;

  /** Get the current log level */
  level: LogLevel;

  /** Check if a level is enabled */
  isLevelEnabled(level: LogLevel): boolean;
}

// =============================================================================
// Implementation
// =============================================================================

let globalLogger: PinoLogger | null = null;
let globalConfig: LoggerConfig = {};

const defaultContextFieldsExtractor: ContextFieldsExtractor = (ctx) => ({
  root: ctx.root,
  tick: ctx.tick,
  phase: ctx.phase,
});

function getContextFields(config: LoggerConfig): Record<string, unknown> {
  if (config.includeContext === false) {
    return {};
  }

  const ctx = Context.tryGet();
  if (!ctx) {
    return {};
  }

  const extractor = config.contextFields ?? defaultContextFieldsExtractor;
  return extractor(ctx);
}

function resolveLevel(config: LoggerConfig): LogLevel {
  if (config.level) {
    return config.level;
  }
  const fromEnv = process.env.LOG_LEVEL;
  return isLogLevel(fromEnv) ? fromEnv : "info";
}

function createPinoOptions(config: LoggerConfig): LoggerOptions {
  const usePretty = config.prettyPrint ?? process.env.NODE_ENV === "development";

  const options: LoggerOptions = {
    level: resolveLevel(config),
    base: config.base ?? { pid: process.pid },

    // Mixin runs on every log to inject context
    mixin: () => {
      const contextFields = getContextFields(config);
      const customFields = config.mixin?.() ?? {};
      return { ...contextFields, ...customFields };
    },

    timestamp: pino.stdTimeFunctions.isoTime,
  };

  if (config.destination) {
    return options;
  }

  if (config.transport) {
    options.transport = config.transport;
  } else if (usePretty) {
    options.transport = {
      target: "pino-pretty",
      options: {
        colorize: true,
        translateTime: "SYS:standard",
        ignore: "pid,hostname",
      },
    };
  }

  return options;
}

function createPino(config: LoggerConfig): PinoLogger {
  const options = createPinoOptions(config);
  return config.destination ? pino(options, config.destination) : pino(options);
}

function currentLevel(pinoLogger: PinoLogger): LogLevel {
  return isLogLevel(pinoLogger.level) ? pinoLogger.level : "info";
}

function wrapLogger(pinoLogger: PinoLogger): KernelLogger {
  return {
    trace: pinoLogger.trace.bind(pinoLogger),
    debug: pinoLogger.debug.bind(pinoLogger),
    info: pinoLogger.info.bind(pinoLogger),
    warn: pinoLogger.warn.bind(pinoLogger),
    error: pinoLogger.error.bind(pinoLogger),
    fatal: pinoLogger.fatal.bind(pinoLogger),

    child(bindings: Record<string, unknown>): KernelLogger {
      return wrapLogger(pinoLogger.child(bindings));
    },

    get level(): LogLevel {
      return currentLevel(pinoLogger);
    },

    isLevelEnabled(level: LogLevel): boolean {
      return pinoLogger.isLevelEnabled(level);
    },
  };
}

function getOrCreateGlobalLogger(): PinoLogger {
  if (!globalLogger) {
    globalLogger = createPino(globalConfig);
  }
  return globalLogger;
}

// =============================================================================
// Public API
// =============================================================================

/**
 * Logger singleton.
 *
 * Loggers handed out by `for()` and `child()` are bound to the global pino
 * instance at the time they are created; call `configure()` before building
 * roots.
 */
export const Logger = {
  /**
   * Configure the global logger. Merges with the previous configuration
   * unless `replace` is set.
   */
  configure(config: LoggerConfig): void {
    if (config.replace) {
      globalConfig = config;
    } else {
      globalConfig = { ...globalConfig, ...config };
    }

    if (config.contextFields) {
      globalConfig.contextFields = composeContextFields(defaultContextFields, config.contextFields);
    } else if (!globalConfig.contextFields) {
      globalConfig.contextFields = defaultContextFields;
    }

    globalLogger = createPino(globalConfig);
  },

  /**
   * Get the global logger instance.
   */
  get(): KernelLogger {
    return wrapLogger(getOrCreateGlobalLogger());
  },

  /**
   * Create a child logger scoped to a component or name.
   *
   * @example
   * ```typescript
   * const log = Logger.for('Applier');
   *
   * class Scheduler {
   *   private log = Logger.for(this);
   * }
   * ```
   */
  for(nameOrComponent: string | object): KernelLogger {
    const name =
      typeof nameOrComponent === "string" ? nameOrComponent : nameOrComponent.constructor.name;
    return wrapLogger(getOrCreateGlobalLogger().child({ component: name }));
  },

  /**
   * Create a child logger with custom bindings.
   */
  child(bindings: Record<string, unknown>): KernelLogger {
    return wrapLogger(getOrCreateGlobalLogger().child(bindings));
  },

  /**
   * Create a standalone logger instance with custom config.
   * Does not affect the global logger.
   */
  create(config: LoggerConfig = {}): KernelLogger {
    return wrapLogger(createPino(config));
  },

  get level(): LogLevel {
    return currentLevel(getOrCreateGlobalLogger());
  },

  setLevel(level: LogLevel): void {
    getOrCreateGlobalLogger().level = level;
  },

  isLevelEnabled(level: LogLevel): boolean {
    return getOrCreateGlobalLogger().isLevelEnabled(level);
  },

  /**
   * Reset the global logger (mainly for testing).
   */
  reset(): void {
    globalLogger = null;
    globalConfig = {};
  },
};

// =============================================================================
// Helpers
// =============================================================================

/**
 * Compose multiple context field extractors into one.
 * Later extractors override earlier ones for the same keys.
 */
export function composeContextFields(
  ...extractors: ContextFieldsExtractor[]
): ContextFieldsExtractor {
  return (ctx) => {
    const result: Record<string, unknown> = {};
    for (const extractor of extractors) {
      Object.assign(result, extractor(ctx));
    }
    return result;
  };
}

/**
 * The default context fields extractor: root, tick and phase.
 */
export const defaultContextFields = defaultContextFieldsExtractor;

export type { PinoLogger, TransportSingleOptions, TransportMultiOptions };
