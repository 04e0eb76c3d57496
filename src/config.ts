import * as v from "valibot";
import type pino from "pino";
import { ConfigError } from "./errors";
import { describeIssues } from "./schema";

/** Smallest units per ZED. */
export const UNITS_PER_ZED = 100_000_000n;

const LEVELS = ["fatal", "error", "warn", "info", "debug", "trace", "silent"] as const;

export interface ChainConfig {
  readonly chain: {
    readonly blockReward: bigint;
    readonly genesisTimestamp: number;
    readonly genesisMiner: string;
    readonly maxBlockTransactions: number;
    readonly maxFutureDriftMs: number;
  };
  readonly mempool: {
    readonly maxSize: number;
  };
  readonly fees: {
    readonly basePermille: number;
    readonly maxPermille: number;
    readonly tolerancePermille: number;
  };
  readonly difficulty: {
    readonly initialTarget: bigint;
    readonly minTarget: bigint;
    readonly maxTarget: bigint;
    readonly retargetInterval: number;
    readonly targetBlockTimeMs: number;
  };
  readonly guard: {
    readonly enabled: boolean;
    readonly windowMs: number;
    readonly threshold: number;
  };
  readonly log: {
    readonly level: pino.LevelWithSilent;
    readonly pretty: boolean;
  };
}

export type ConfigPatch = { readonly [K in keyof ChainConfig]?: Partial<ChainConfig[K]> };

export const defaultConfig: ChainConfig = {
  chain: {
    blockReward: 80n * UNITS_PER_ZED,
    genesisTimestamp: Date.UTC(2024, 0, 1),
    genesisMiner: "ZED-GENESIS",
    maxBlockTransactions: 512,
    maxFutureDriftMs: 2 * 60 * 60 * 1000,
  },
  mempool: { maxSize: 10_000 },
  fees: { basePermille: 10, maxPermille: 50, tolerancePermille: 1 },
  difficulty: {
    initialTarget: 2n ** 240n,
    minTarget: 2n ** 160n,
    maxTarget: 2n ** 252n,
    retargetInterval: 12,
    targetBlockTimeMs: 5 * 60 * 1000,
  },
  guard: { enabled: true, windowMs: 60 * 60 * 1000, threshold: 10 },
  log: { level: "info", pretty: false },
};

/* ── validation ──────────────────────────────────────────── */
const positiveInt = v.pipe(v.number(), v.safeInteger(), v.minValue(1));
const target = v.pipe(v.bigint(), v.minValue(1n), v.maxValue(2n ** 256n));

const ConfigSchema = v.pipe(
  v.object({
    chain: v.object({
      blockReward: v.pipe(v.bigint(), v.minValue(0n)),
      genesisTimestamp: v.pipe(v.number(), v.safeInteger(), v.minValue(0)),
      genesisMiner: v.pipe(v.string(), v.minLength(1)),
      maxBlockTransactions: positiveInt,
      maxFutureDriftMs: positiveInt,
    }),
    mempool: v.object({ maxSize: positiveInt }),
    fees: v.pipe(
      v.object({
        basePermille: v.pipe(v.number(), v.safeInteger(), v.minValue(0)),
        maxPermille: v.pipe(v.number(), v.safeInteger(), v.maxValue(1000)),
        tolerancePermille: v.pipe(v.number(), v.safeInteger(), v.minValue(0)),
      }),
      v.check((f) => f.basePermille <= f.maxPermille, "fees.basePermille exceeds fees.maxPermille"),
    ),
    difficulty: v.pipe(
      v.object({
        initialTarget: target,
        minTarget: target,
        maxTarget: target,
        retargetInterval: positiveInt,
        targetBlockTimeMs: positiveInt,
      }),
      v.check(
        (d) => d.minTarget <= d.initialTarget && d.initialTarget <= d.maxTarget,
        "difficulty.initialTarget must lie within [minTarget, maxTarget]",
      ),
    ),
    guard: v.object({
      enabled: v.boolean(),
      windowMs: positiveInt,
      threshold: v.pipe(v.number(), v.safeInteger(), v.minValue(0)),
    }),
    log: v.object({ level: v.picklist(LEVELS), pretty: v.boolean() }),
  }),
);

export const validateConfig = (candidate: unknown): ChainConfig => {
  const res = v.safeParse(ConfigSchema, candidate);
  if (!res.success) throw new ConfigError(`invalid config: ${describeIssues(res.issues)}`);
  return res.output;
};

// unset keys in a patch keep the base value
const defined = (o: object | undefined): Record<string, unknown> =>
  Object.fromEntries(Object.entries(o ?? {}).filter(([, x]) => x !== undefined));

export const mergeConfig = (base: ChainConfig, patch: ConfigPatch = {}): ChainConfig =>
  validateConfig({
    chain: { ...base.chain, ...defined(patch.chain) },
    mempool: { ...base.mempool, ...defined(patch.mempool) },
    fees: { ...base.fees, ...defined(patch.fees) },
    difficulty: { ...base.difficulty, ...defined(patch.difficulty) },
    guard: { ...base.guard, ...defined(patch.guard) },
    log: { ...base.log, ...defined(patch.log) },
  });

/* ── environment overrides ───────────────────────────────── */
const envInt = v.pipe(v.string(), v.trim(), v.regex(/^\d+$/, "expected an integer"), v.transform(Number));
const envBool = v.pipe(
  v.picklist(["true", "false", "1", "0"]),
  v.transform((s) => s === "true" || s === "1"),
);

const EnvSchema = v.object({
  ZED_LOG_LEVEL: v.optional(v.picklist(LEVELS)),
  ZED_LOG_PRETTY: v.optional(envBool),
  ZED_GUARD_ENABLED: v.optional(envBool),
  ZED_GUARD_THRESHOLD: v.optional(envInt),
  ZED_GUARD_WINDOW_MS: v.optional(envInt),
  ZED_MEMPOOL_MAX_SIZE: v.optional(envInt),
  ZED_TARGET_BLOCK_TIME_MS: v.optional(envInt),
});

/** Defaults, then `ZED_*` environment variables, then an explicit patch. */
export const loadConfig = (
  env: Record<string, string | undefined> = process.env,
  patch: ConfigPatch = {},
): ChainConfig => {
  const res = v.safeParse(EnvSchema, env);
  if (!res.success) throw new ConfigError(`invalid environment: ${describeIssues(res.issues)}`);
  const e = res.output;

  const fromEnv = mergeConfig(defaultConfig, {
    log: { level: e.ZED_LOG_LEVEL, pretty: e.ZED_LOG_PRETTY },
    guard: {
      enabled: e.ZED_GUARD_ENABLED,
      threshold: e.ZED_GUARD_THRESHOLD,
      windowMs: e.ZED_GUARD_WINDOW_MS,
    },
    mempool: { maxSize: e.ZED_MEMPOOL_MAX_SIZE },
    difficulty: { targetBlockTimeMs: e.ZED_TARGET_BLOCK_TIME_MS },
  });
  return mergeConfig(fromEnv, patch);
};
