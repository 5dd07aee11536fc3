import { Effect, Layer, Schema } from 'effect';
import * as fs from 'fs/promises';
import { ConfigurationError } from '../errors.js';

/**
 * What happens to state entries that stop appearing in the listing.
 *
 * @group Configuration
 * @public
 */
export type StaleEntryRetention =
  | { readonly mode: 'keep' }
  | { readonly mode: 'prune'; readonly maxAgeMs: number };

/**
 * Configuration options for the harvester.
 *
 * Controls the page scheduler, failure recovery and change detection.
 * Every option has a default; see {@link makeHarvestConfig}.
 *
 * @group Configuration
 * @public
 */
export interface HarvestConfigOptions {
  /** Highest page index ever visited (default: 500) */
  readonly pageCeiling: number;
  /** Sequential pages scanned per run while the baseline is building (default: 50) */
  readonly perRunPageLimit: number;
  /** Pages rescanned from the top of the listing once the baseline is complete (default: 10) */
  readonly deltaWindowSize: number;
  /** Pages from the top revisited each run while building, 0 to disable (default: 2) */
  readonly frontRefreshSize: number;
  /** Wall-clock budget of one run in milliseconds (default: 15 minutes) */
  readonly runBudgetMs: number;
  /** Additional attempts per page after the first failure (default: 2) */
  readonly maxRetries: number;
  /** Base backoff delay; retry n waits base × 2^(n-1) plus jitter (default: 2000) */
  readonly backoffBaseMs: number;
  /** Upper bound (exclusive) of the random jitter added to each backoff (default: 500) */
  readonly backoffJitterMs: number;
  /** Number of recent page outcomes observed by the circuit breaker (default: 8) */
  readonly breakerWindowSize: number;
  /** Error ratio at which the breaker trips, in (0, 1] (default: 0.5) */
  readonly breakerErrorThreshold: number;
  /**
   * Weight of a backend error page in the breaker window. Transient errors weigh 1.
   *
   * @default 2
   */
  readonly backendUnavailableWeight: number;
  /** Cooldown sleep when the breaker trips (default: 60 seconds) */
  readonly cooldownMs: number;
  /** Cooldowns allowed per run before the run is aborted (default: 2) */
  readonly maxCooldownsPerRun: number;
  /** Failed pages replayed at the start of a run (default: 20) */
  readonly failedPageBatchSize: number;
  /** Attempts after which a failed page is abandoned (default: 5) */
  readonly failedPageMaxAttempts: number;
  /** Consecutive empty sequential pages that mark the end of the listing (default: 2) */
  readonly emptyPageTolerance: number;
  /** Timeout of a single fetch in milliseconds (default: 45 seconds) */
  readonly fetchTimeoutMs: number;
  /**
   * Fields compared to detect an update. When undefined every field is compared.
   *
   * @example
   * ```typescript
   * significantFields: ['phase', 'construction_type', 'address']
   * ```
   */
  readonly significantFields?: readonly string[];
  /**
   * Which runs seed the state store without emitting changes.
   * - `first-run`: only a run whose prior state is empty
   * - `until-complete`: every run that starts before the baseline is complete
   *
   * @default 'first-run'
   */
  readonly quietBaseline: 'first-run' | 'until-complete';
  /** Retention of entries that are no longer observed (default: keep forever) */
  readonly staleEntryRetention: StaleEntryRetention;
  /** Case-insensitive phrases identifying a backend error page (default: none) */
  readonly errorPageMarkers: readonly string[];
}

/**
 * Service interface for accessing harvest configuration.
 *
 * @group Configuration
 * @public
 */
export interface HarvestConfigService {
  /** Get the complete configuration options */
  getOptions: () => Effect.Effect<HarvestConfigOptions>;
  /** Get the run budget in milliseconds */
  getRunBudgetMs: () => Effect.Effect<number>;
  /** Get the fields compared by the delta engine (undefined means all) */
  getSignificantFields: () => Effect.Effect<readonly string[] | undefined>;
  /** Get the error page markers */
  getErrorPageMarkers: () => Effect.Effect<readonly string[]>;
}

export const DEFAULT_HARVEST_OPTIONS: HarvestConfigOptions = Object.freeze<HarvestConfigOptions>({
  pageCeiling: 500,
  perRunPageLimit: 50,
  deltaWindowSize: 10,
  frontRefreshSize: 2,
  runBudgetMs: 15 * 60_000,
  maxRetries: 2,
  backoffBaseMs: 2000,
  backoffJitterMs: 500,
  breakerWindowSize: 8,
  breakerErrorThreshold: 0.5,
  backendUnavailableWeight: 2,
  cooldownMs: 60_000,
  maxCooldownsPerRun: 2,
  failedPageBatchSize: 20,
  failedPageMaxAttempts: 5,
  emptyPageTolerance: 2,
  fetchTimeoutMs: 45_000,
  quietBaseline: 'first-run',
  staleEntryRetention: { mode: 'keep' },
  errorPageMarkers: [],
});

/**
 * The main HarvestConfig service for dependency injection.
 *
 * @example
 * ```typescript
 * const program = Effect.gen(function* () {
 *   const config = yield* HarvestConfig;
 *   const options = yield* config.getOptions();
 *   console.log(`Ceiling: ${options.pageCeiling}`);
 * });
 *
 * await Effect.runPromise(
 *   program.pipe(Effect.provide(HarvestConfig.Live({ pageCeiling: 120 })))
 * );
 * ```
 *
 * @group Configuration
 * @public
 */
export class HarvestConfig extends Effect.Service<HarvestConfigService>()(
  'delta-harvester/HarvestConfig',
  {
    effect: Effect.sync(() => makeHarvestConfig({})),
  }
) {
  /**
   * Creates a Layer that provides HarvestConfig with custom options.
   * Fails with ConfigurationError when the merged options are invalid.
   */
  static Live = (
    config: Partial<HarvestConfigOptions> | HarvestConfigService
  ) => {
    const service: Effect.Effect<HarvestConfigService, ConfigurationError> =
      'getOptions' in config
        ? Effect.succeed(config)
        : validateHarvestOptions({ ...DEFAULT_HARVEST_OPTIONS, ...config }).pipe(
            Effect.map(makeHarvestConfig)
          );
    return Layer.effect(HarvestConfig, service);
  };

  /**
   * Creates a Layer from a JSON file holding a subset of the options.
   */
  static fromFile = (filePath: string) =>
    Layer.effect(
      HarvestConfig,
      loadHarvestOptionsFile(filePath).pipe(
        Effect.flatMap((options) =>
          validateHarvestOptions({ ...DEFAULT_HARVEST_OPTIONS, ...options })
        ),
        Effect.map(makeHarvestConfig)
      )
    );
}

/**
 * Creates a HarvestConfigService with the given options merged over the defaults.
 *
 * @group Configuration
 * @public
 */
export const makeHarvestConfig = (
  options: Partial<HarvestConfigOptions> = {}
): HarvestConfigService => {
  const config: HarvestConfigOptions = {
    ...DEFAULT_HARVEST_OPTIONS,
    ...options,
  };

  return {
    getOptions: () => Effect.succeed(config),
    getRunBudgetMs: () => Effect.succeed(config.runBudgetMs),
    getSignificantFields: () => Effect.succeed(config.significantFields),
    getErrorPageMarkers: () => Effect.succeed(config.errorPageMarkers),
  };
};

const isPositiveInt = (n: number) => Number.isInteger(n) && n >= 1;
const isNonNegativeInt = (n: number) => Number.isInteger(n) && n >= 0;
const isNonNegative = (n: number) => Number.isFinite(n) && n >= 0;

/**
 * Checks the cross-field constraints of a complete option set.
 *
 * @group Configuration
 * @public
 */
export const validateHarvestOptions = (
  options: HarvestConfigOptions
): Effect.Effect<HarvestConfigOptions, ConfigurationError> => {
  const problems: string[] = [];

  if (!isPositiveInt(options.pageCeiling)) {
    problems.push('pageCeiling must be a positive integer');
  }
  if (!isPositiveInt(options.perRunPageLimit)) {
    problems.push('perRunPageLimit must be a positive integer');
  }
  if (!isPositiveInt(options.deltaWindowSize)) {
    problems.push('deltaWindowSize must be a positive integer');
  }
  if (!isNonNegativeInt(options.frontRefreshSize)) {
    problems.push('frontRefreshSize must be a non-negative integer');
  }
  if (!isNonNegative(options.runBudgetMs)) {
    problems.push('runBudgetMs must be non-negative');
  }
  if (!isNonNegativeInt(options.maxRetries)) {
    problems.push('maxRetries must be a non-negative integer');
  }
  if (!isNonNegative(options.backoffBaseMs) || !isNonNegative(options.backoffJitterMs)) {
    problems.push('backoff delays must be non-negative');
  }
  if (!isPositiveInt(options.breakerWindowSize)) {
    problems.push('breakerWindowSize must be a positive integer');
  }
  if (!(options.breakerErrorThreshold > 0 && options.breakerErrorThreshold <= 1)) {
    problems.push('breakerErrorThreshold must be in (0, 1]');
  }
  if (!(options.backendUnavailableWeight >= 1)) {
    problems.push('backendUnavailableWeight must be at least 1');
  }
  if (!isNonNegative(options.cooldownMs) || !isNonNegativeInt(options.maxCooldownsPerRun)) {
    problems.push('cooldown settings must be non-negative');
  }
  if (!isNonNegativeInt(options.failedPageBatchSize)) {
    problems.push('failedPageBatchSize must be a non-negative integer');
  }
  if (!isPositiveInt(options.failedPageMaxAttempts)) {
    problems.push('failedPageMaxAttempts must be a positive integer');
  }
  if (!isPositiveInt(options.emptyPageTolerance)) {
    problems.push('emptyPageTolerance must be a positive integer');
  }
  if (!(options.fetchTimeoutMs > 0)) {
    problems.push('fetchTimeoutMs must be positive');
  }
  if (
    options.staleEntryRetention.mode === 'prune' &&
    !(options.staleEntryRetention.maxAgeMs > 0)
  ) {
    problems.push('staleEntryRetention.maxAgeMs must be positive');
  }

  return problems.length === 0
    ? Effect.succeed(options)
    : Effect.fail(
        new ConfigurationError({
          message: `Invalid harvest configuration: ${problems.join('; ')}`,
          details: problems,
        })
      );
};

const HarvestOptionsFile = Schema.partial(
  Schema.Struct({
    pageCeiling: Schema.Number,
    perRunPageLimit: Schema.Number,
    deltaWindowSize: Schema.Number,
    frontRefreshSize: Schema.Number,
    runBudgetMs: Schema.Number,
    maxRetries: Schema.Number,
    backoffBaseMs: Schema.Number,
    backoffJitterMs: Schema.Number,
    breakerWindowSize: Schema.Number,
    breakerErrorThreshold: Schema.Number,
    backendUnavailableWeight: Schema.Number,
    cooldownMs: Schema.Number,
    maxCooldownsPerRun: Schema.Number,
    failedPageBatchSize: Schema.Number,
    failedPageMaxAttempts: Schema.Number,
    emptyPageTolerance: Schema.Number,
    fetchTimeoutMs: Schema.Number,
    significantFields: Schema.Array(Schema.String),
    quietBaseline: Schema.Literal('first-run', 'until-complete'),
    staleEntryRetention: Schema.Union(
      Schema.Struct({ mode: Schema.Literal('keep') }),
      Schema.Struct({ mode: Schema.Literal('prune'), maxAgeMs: Schema.Number })
    ),
    errorPageMarkers: Schema.Array(Schema.String),
  })
);

/**
 * Reads a partial option set from a JSON file.
 *
 * @group Configuration
 * @public
 */
export const loadHarvestOptionsFile = (
  filePath: string
): Effect.Effect<Partial<HarvestConfigOptions>, ConfigurationError> =>
  Effect.gen(function* () {
    const content = yield* Effect.tryPromise({
      try: () => fs.readFile(filePath, 'utf8'),
      catch: (error) =>
        new ConfigurationError({
          message: `Failed to read config file ${filePath}: ${error}`,
          details: error,
        }),
    });

    const parsed = yield* Effect.try({
      try: (): unknown => JSON.parse(content),
      catch: (error) =>
        new ConfigurationError({
          message: `Config file ${filePath} is not valid JSON: ${error}`,
          details: error,
        }),
    });

    return yield* Schema.decodeUnknown(HarvestOptionsFile)(parsed).pipe(
      Effect.mapError(
        (error) =>
          new ConfigurationError({
            message: `Config file ${filePath} has invalid options: ${error.message}`,
            details: error,
          })
      )
    );
  });
