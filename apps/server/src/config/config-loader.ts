import { z } from "zod";
import { logger } from "@arena/shared-servers";
import { parseWithSchema, readJsonFile } from "./json-file";
import { combatPolicySchema, type CombatPolicy, type CombatPolicyInput } from "./combat-policy";
import { duelSettingsSchema, type DuelSettings, type DuelSettingsInput } from "./duel-settings";

export interface ArenaConfigInput {
  policy?: CombatPolicyInput;
  duel?: DuelSettingsInput;
}

export interface ArenaConfig {
  readonly policy: CombatPolicy;
  readonly duel: DuelSettings;
}

export interface LoadArenaConfigOptions {
  /** JSON file with optional `policy` and `duel` sections. Defaults to ARENA_CONFIG_PATH. */
  filePath?: string;
  env?: NodeJS.ProcessEnv;
  overrides?: ArenaConfigInput;
}

const configFileSchema = z.object({
  policy: z.record(z.string(), z.unknown()).default({}),
  duel: z.record(z.string(), z.unknown()).default({}),
});

const envSchema = z.object({
  COMBAT_TICK_MS: z.coerce.number().int().positive().optional(),
  COMBAT_IDLE_TIMEOUT_MS: z.coerce.number().int().positive().optional(),
  COMBAT_TIMING_PROVIDER: z.enum(["weapon_table", "legacy_formula"]).optional(),
  COMBAT_INDEPENDENT_TIMERS: z
    .enum(["true", "false"])
    .transform((value) => value === "true")
    .optional(),
});

const readEnvPolicy = (env: NodeJS.ProcessEnv): Record<string, unknown> => {
  const values = parseWithSchema(env, envSchema, "combat environment");
  const policy: Record<string, unknown> = {};
  if (values.COMBAT_TICK_MS !== undefined) {
    policy.globalTickMs = values.COMBAT_TICK_MS;
  }
  if (values.COMBAT_IDLE_TIMEOUT_MS !== undefined) {
    policy.combatIdleTimeoutMs = values.COMBAT_IDLE_TIMEOUT_MS;
  }
  if (values.COMBAT_TIMING_PROVIDER !== undefined) {
    policy.timingProvider = values.COMBAT_TIMING_PROVIDER;
  }
  if (values.COMBAT_INDEPENDENT_TIMERS !== undefined) {
    policy.independentTimers = values.COMBAT_INDEPENDENT_TIMERS;
  }
  return policy;
};

const parseSections = (policyInput: unknown, duelInput: unknown): ArenaConfig =>
  Object.freeze({
    policy: Object.freeze(parseWithSchema(policyInput, combatPolicySchema, "combat policy")),
    duel: Object.freeze(parseWithSchema(duelInput, duelSettingsSchema, "duel settings")),
  });

/** Build a validated, frozen configuration from in-process values only. */
export const createArenaConfig = (input: ArenaConfigInput = {}): ArenaConfig =>
  parseSections(input.policy ?? {}, input.duel ?? {});

/**
 * Resolve configuration from defaults, an optional JSON file, environment
 * variables and programmatic overrides (later sources win).
 */
export const loadArenaConfig = async (
  options: LoadArenaConfigOptions = {},
): Promise<ArenaConfig> => {
  const env = options.env ?? process.env;
  const filePath = options.filePath ?? env.ARENA_CONFIG_PATH;
  const file = filePath
    ? await readJsonFile(filePath, configFileSchema, "arena config")
    : { policy: {}, duel: {} };

  const config = parseSections(
    { ...file.policy, ...readEnvPolicy(env), ...options.overrides?.policy },
    { ...file.duel, ...options.overrides?.duel },
  );

  logger.info(
    {
      filePath,
      tickMs: config.policy.globalTickMs,
      idleTimeoutMs: config.policy.combatIdleTimeoutMs,
      timingProvider: config.policy.timingProvider,
    },
    "Arena configuration loaded",
  );
  return config;
};
