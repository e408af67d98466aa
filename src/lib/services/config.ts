/**
 * ConfigService - Centralized configuration management
 *
 * Holds the recording format indicators, the dangling link policy,
 * the numeric string policy of the basic parser and the log level.
 */

import { Context, Effect, Either, Layer, Ref, pipe, Schema } from 'effect';
import { ConfigError } from '../errors';

// ============= Configuration Schema =============

export const DanglingLinkPolicySchema = Schema.Literal('ignore', 'warn', 'fail');
export const NumericStringPolicySchema = Schema.Literal('lenient', 'strict');
export const LogLevelSchema = Schema.Literal(
  'trace',
  'debug',
  'info',
  'warn',
  'error',
  'none'
);

export const ConfigSchema = Schema.Struct({
  recording: Schema.Struct({
    idIndicator: Schema.NonEmptyString,
    instructionIndicator: Schema.NonEmptyString,
    commentIndicator: Schema.optional(Schema.NonEmptyString),
    xmlIdPrefix: Schema.NonEmptyString,
    xmlRootName: Schema.NonEmptyString,
    danglingLinks: DanglingLinkPolicySchema,
  }),

  conversion: Schema.Struct({
    numericStrings: NumericStringPolicySchema,
  }),

  logging: Schema.Struct({
    level: LogLevelSchema,
  }),
});

export type Config = Schema.Schema.Type<typeof ConfigSchema>;
export type RecordingConfig = Config['recording'];
export type DanglingLinkPolicy = RecordingConfig['danglingLinks'];
export type NumericStringPolicy = Config['conversion']['numericStrings'];

/**
 * Partial overrides, one level deep.
 */
export interface ConfigOverrides {
  readonly recording?: Partial<Config['recording']>;
  readonly conversion?: Partial<Config['conversion']>;
  readonly logging?: Partial<Config['logging']>;
}

// ============= ConfigService Interface =============

export interface ConfigService {
  /**
   * Get a top-level configuration section
   */
  readonly get: <K extends keyof Config>(key: K) => Effect.Effect<Config[K]>;

  /**
   * Get the entire configuration
   */
  readonly getAll: () => Effect.Effect<Config>;

  /**
   * Merge overrides into the current configuration, validating the result
   */
  readonly update: (
    updates: ConfigOverrides
  ) => Effect.Effect<void, ConfigError>;

  /**
   * Reload configuration from defaults and environment
   */
  readonly reload: () => Effect.Effect<void, ConfigError>;
}

// ============= Context Tag =============

export const ConfigService =
  Context.GenericTag<ConfigService>('@services/Config');

// ============= Default Configuration =============

export const defaultConfig: Config = {
  recording: {
    idIndicator: '#',
    instructionIndicator: '%CHECK:',
    xmlIdPrefix: '_',
    xmlRootName: 'root',
    danglingLinks: 'warn',
  },
  conversion: {
    numericStrings: 'lenient',
  },
  logging: {
    level: 'warn',
  },
};

// ============= Configuration Loading =============

const decodeEnv = <A, I>(
  schema: Schema.Schema<A, I>,
  name: string,
  raw: string | undefined
): Effect.Effect<A | undefined, ConfigError> => {
  if (raw === undefined || raw === '') {
    return Effect.succeed(undefined);
  }
  return pipe(
    Schema.decodeUnknownEither(schema)(raw),
    Either.match({
      onLeft: (error) =>
        Effect.fail(
          new ConfigError({
            message: `Invalid value for ${name}: ${raw}`,
            key: name,
            cause: error,
          })
        ),
      onRight: (value) => Effect.succeed(value),
    })
  );
};

export const loadConfigFromEnv = (
  env: NodeJS.ProcessEnv = process.env
): Effect.Effect<ConfigOverrides, ConfigError> =>
  Effect.gen(function* () {
    const idIndicator = yield* decodeEnv(
      Schema.NonEmptyString,
      'FLOW_ID_INDICATOR',
      env.FLOW_ID_INDICATOR
    );
    const instructionIndicator = yield* decodeEnv(
      Schema.NonEmptyString,
      'FLOW_INSTRUCTION_INDICATOR',
      env.FLOW_INSTRUCTION_INDICATOR
    );
    const commentIndicator = yield* decodeEnv(
      Schema.NonEmptyString,
      'FLOW_COMMENT_INDICATOR',
      env.FLOW_COMMENT_INDICATOR
    );
    const danglingLinks = yield* decodeEnv(
      DanglingLinkPolicySchema,
      'FLOW_DANGLING_LINKS',
      env.FLOW_DANGLING_LINKS
    );
    const numericStrings = yield* decodeEnv(
      NumericStringPolicySchema,
      'FLOW_NUMERIC_STRINGS',
      env.FLOW_NUMERIC_STRINGS
    );
    const level = yield* decodeEnv(LogLevelSchema, 'LOG_LEVEL', env.LOG_LEVEL);

    return {
      recording: {
        ...(idIndicator !== undefined && { idIndicator }),
        ...(instructionIndicator !== undefined && { instructionIndicator }),
        ...(commentIndicator !== undefined && { commentIndicator }),
        ...(danglingLinks !== undefined && { danglingLinks }),
      },
      conversion: {
        ...(numericStrings !== undefined && { numericStrings }),
      },
      logging: {
        ...(level !== undefined && { level }),
      },
    };
  });

export const mergeConfigs = (
  base: Config,
  overrides: ConfigOverrides
): Config => ({
  recording: { ...base.recording, ...overrides.recording },
  conversion: { ...base.conversion, ...overrides.conversion },
  logging: { ...base.logging, ...overrides.logging },
});

const validateConfig = (config: Config): Effect.Effect<Config, ConfigError> =>
  pipe(
    Schema.decodeUnknownEither(ConfigSchema)(config),
    Either.match({
      onLeft: (error) =>
        Effect.fail(
          new ConfigError({
            message: `Invalid configuration: ${error.message}`,
            cause: error,
          })
        ),
      onRight: (valid) => Effect.succeed(valid),
    })
  );

// ============= Service Implementation =============

export const makeConfigService = (
  initialConfig: Config
): Effect.Effect<ConfigService, ConfigError> =>
  Effect.gen(function* () {
    const validated = yield* validateConfig(initialConfig);
    const configRef = yield* Ref.make(validated);

    return {
      get: <K extends keyof Config>(key: K) =>
        Effect.map(Ref.get(configRef), (config) => config[key]),

      getAll: () => Ref.get(configRef),

      update: (updates: ConfigOverrides) =>
        Effect.gen(function* () {
          const current = yield* Ref.get(configRef);
          const next = yield* validateConfig(mergeConfigs(current, updates));
          yield* Ref.set(configRef, next);
        }),

      reload: () =>
        Effect.gen(function* () {
          const envConfig = yield* loadConfigFromEnv();
          const next = yield* validateConfig(
            mergeConfigs(defaultConfig, envConfig)
          );
          yield* Ref.set(configRef, next);
        }),
    };
  });

// ============= Layer Implementations =============

/**
 * Live implementation that loads config from environment
 */
export const ConfigServiceLive = Layer.effect(
  ConfigService,
  Effect.gen(function* () {
    const envConfig = yield* loadConfigFromEnv();
    return yield* makeConfigService(mergeConfigs(defaultConfig, envConfig));
  })
);

/**
 * Test implementation with custom config
 */
export const ConfigServiceTest = (config: ConfigOverrides = {}) =>
  Layer.effect(
    ConfigService,
    makeConfigService(mergeConfigs(defaultConfig, config))
  );

/**
 * Default implementation with default config
 */
export const ConfigServiceDefault = Layer.effect(
  ConfigService,
  makeConfigService(defaultConfig)
);

// ============= Helper Functions =============

/**
 * Read the recording section of the current configuration
 */
export const getRecordingConfig = Effect.gen(function* () {
  const config = yield* ConfigService;
  return yield* config.get('recording');
});
