import { logger } from "@arena/shared-servers";
import { CombatTimingStore } from "../combat/combat-timing-store";
import { GlobalPulseScheduler, type PulseMetrics, type Stopwatch } from "../combat/combat-pulse";
import {
  createTimingProvider,
  loadWeaponTimingTable,
  type TimingProvider,
  type WeaponTimingTable,
} from "../combat/timing";
import type { CombatResolver, LineOfSightQuery, ReflectionCheck } from "../combat/types";
import { loadArenaConfig, type ArenaConfig, type LoadArenaConfigOptions } from "../config/config-loader";
import { DuelManager } from "../duel/duel-manager";
import { IndependentTimerDuelRuleset, StandardDuelRuleset } from "../duel/rulesets";
import type { DuelWorld, GoldLedger } from "../duel/types";
import { EventLog } from "../eventLog/event-log";
import { SimulationClock } from "../sim/simulation-clock";
import { SimulationLoop } from "../sim/simulation-loop";
import { CastPipeline } from "../spells/cast-pipeline";
import { loadSpellTimingTable, type SpellTimingTable } from "../spells/spell-timing-table";

export interface CombatRuntimeOptions {
  config: ArenaConfig;
  weaponTable: WeaponTimingTable;
  spellTable?: SpellTimingTable;
  resolver: CombatResolver;
  ledger: GoldLedger;
  world: DuelWorld;
  reflection?: ReflectionCheck;
  lineOfSight?: LineOfSightQuery;
  clock?: SimulationClock;
  events?: EventLog;
  stopwatch?: Stopwatch;
  /** Wall clock for the loop. Defaults to Date.now. */
  wallClock?: () => number;
  /** Duels engage independent timers for participants. Defaults to the policy flag. */
  independentTimerDuels?: boolean;
}

export interface CreateCombatRuntimeOptions
  extends Omit<CombatRuntimeOptions, "config" | "weaponTable" | "spellTable"> {
  configOptions?: LoadArenaConfigOptions;
  weaponTablePath?: string;
  spellTablePath?: string;
}

/**
 * Wires one isolated combat context: clock, event log, timing state, pulse,
 * casts and duels. Nothing runs until `start()`.
 */
export class CombatRuntime {
  readonly config: ArenaConfig;
  readonly clock: SimulationClock;
  readonly events: EventLog;
  readonly timing: TimingProvider;
  readonly store: CombatTimingStore;
  readonly pulse: GlobalPulseScheduler;
  readonly casts: CastPipeline;
  readonly duels: DuelManager;
  private readonly wallClock: () => number;
  private loop: SimulationLoop | undefined;

  constructor(options: CombatRuntimeOptions) {
    const { config } = options;
    const { policy } = config;
    this.config = config;
    this.clock = options.clock ?? new SimulationClock(policy.globalTickMs);
    this.events = options.events ?? new EventLog();
    this.wallClock = options.wallClock ?? Date.now;
    this.timing = createTimingProvider(policy, options.weaponTable);

    const shared = { policy, clock: this.clock, events: this.events };
    this.store = new CombatTimingStore({ ...shared, timing: this.timing });
    this.pulse = new GlobalPulseScheduler({
      ...shared,
      store: this.store,
      resolver: options.resolver,
      stopwatch: options.stopwatch,
    });
    this.casts = new CastPipeline({
      ...shared,
      store: this.store,
      spellTable: options.spellTable,
      reflection: options.reflection,
      lineOfSight: options.lineOfSight,
    });

    const standard = new StandardDuelRuleset(options.world);
    const independent = new IndependentTimerDuelRuleset({
      world: options.world,
      pulse: this.pulse,
      store: this.store,
      clock: this.clock,
      events: this.events,
    });
    const useIndependent = options.independentTimerDuels ?? policy.independentTimers;
    this.duels = new DuelManager({
      settings: config.duel,
      clock: this.clock,
      events: this.events,
      ledger: options.ledger,
      world: options.world,
      createRuleset: () => (useIndependent ? independent : standard),
    });
  }

  get isRunning(): boolean {
    return this.loop?.isRunning ?? false;
  }

  start(): void {
    if (this.loop) {
      logger.warn("Combat runtime already started");
      return;
    }
    this.pulse.start();

    const wallOrigin = this.wallClock();
    const logicalOrigin = this.clock.now();
    this.loop = new SimulationLoop({
      periodMs: this.config.policy.globalTickMs,
      now: this.wallClock,
      onStep: (wallNow) => this.step(logicalOrigin + (wallNow - wallOrigin)),
    });
    this.loop.start();
  }

  /** Fire due timers, then run exactly one pulse tick at the new time. */
  step(nowMs: number): void {
    this.clock.advanceTo(nowMs);
    this.pulse.tick(this.clock.now());
  }

  stop(): void {
    this.loop?.stop();
    this.loop = undefined;
    this.pulse.stop();
  }

  /** Stop and drop every timer and piece of per-actor state. */
  dispose(): void {
    this.stop();
    this.duels.dispose();
    this.store.clear();
    this.clock.clearAll();
  }

  getMetrics(): PulseMetrics {
    return this.pulse.getMetrics();
  }
}

/** Load configuration and timing tables, then build a runtime. */
export const createCombatRuntime = async (
  options: CreateCombatRuntimeOptions,
): Promise<CombatRuntime> => {
  const { configOptions, weaponTablePath, spellTablePath, ...rest } = options;
  const config = await loadArenaConfig(configOptions);
  const [weaponTable, spellTable] = await Promise.all([
    loadWeaponTimingTable(weaponTablePath),
    loadSpellTimingTable(spellTablePath),
  ]);
  return new CombatRuntime({ ...rest, config, weaponTable, spellTable });
};
