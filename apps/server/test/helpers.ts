import { vi } from "vitest";
import type { ArenaEvent } from "@arena/shared-sim";
import type { Stopwatch } from "../src/combat/combat-pulse";
import { parseWeaponTimingTable } from "../src/combat/timing";
import type {
  CombatActor,
  CombatResolver,
  LineOfSightQuery,
  ReflectionCheck,
  Spell,
} from "../src/combat/types";
import type { CombatPolicyInput } from "../src/config/combat-policy";
import { createArenaConfig } from "../src/config/config-loader";
import type { DuelSettingsInput } from "../src/config/duel-settings";
import type { DuelArena, DuelWorld, GoldLedger } from "../src/duel/types";
import { CombatRuntime } from "../src/runtime/combat-runtime";
import { parseSpellTimingTable } from "../src/spells/spell-timing-table";
import spellTiming from "../data/spell-timing.json";
import weaponTiming from "../data/weapon-timing.json";

export type TestActor = { -readonly [K in keyof CombatActor]: CombatActor[K] } & {
  skills: Record<string, number>;
};

export const KATANA = { itemId: 5119, name: "Katana", weaponClass: "one_handed" } as const;
export const LONGSWORD = { itemId: 5048, name: "Longsword", weaponClass: "one_handed" } as const;
export const HALBERD = { itemId: 5182, name: "Halberd", weaponClass: "two_handed" } as const;

export const TEST_ARENA: DuelArena = { id: "arena-1", name: "Test Arena" };

export const createActor = (id: string, overrides: Partial<TestActor> = {}): TestActor => ({
  id,
  name: id,
  isPlayer: false,
  dexterity: 100,
  alive: true,
  deleted: false,
  hits: 100,
  maxHits: 100,
  mounted: false,
  inCombat: false,
  mana: 100,
  skills: {},
  getSkill(skill: string): number {
    return this.skills[skill] ?? 0;
  },
  ...overrides,
});

export const createSpell = (overrides: Partial<Spell> = {}): Spell => ({
  id: "magic_arrow",
  name: "Magic Arrow",
  castDelayMs: 500,
  getManaCost: () => 10,
  consumeReagents: () => true,
  applyEffect: () => {},
  ...overrides,
});

export class TestLedger implements GoldLedger {
  readonly balances = new Map<string, number>();

  readonly debit = vi.fn((actor: CombatActor, amount: number): boolean => {
    const balance = this.getBalance(actor);
    if (balance < amount) {
      return false;
    }
    this.balances.set(actor.id, balance - amount);
    return true;
  });

  readonly credit = vi.fn((actor: CombatActor, amount: number): void => {
    this.balances.set(actor.id, this.getBalance(actor) + amount);
  });

  getBalance(actor: CombatActor): number {
    return this.balances.get(actor.id) ?? 0;
  }

  fund(actor: CombatActor, amount: number): void {
    this.balances.set(actor.id, amount);
  }
}

export const createWorld = () =>
  ({
    teleportToArena: vi.fn(),
    returnFromArena: vi.fn(),
    setFrozen: vi.fn(),
    restore: vi.fn(),
    clearAggression: vi.fn(),
  }) satisfies DuelWorld;

export interface HarnessOptions {
  policy?: CombatPolicyInput;
  duel?: DuelSettingsInput;
  resolver?: CombatResolver;
  reflection?: ReflectionCheck;
  lineOfSight?: LineOfSightQuery;
  stopwatch?: Stopwatch;
  independentTimerDuels?: boolean;
}

export const createHarness = (options: HarnessOptions = {}) => {
  const ledger = new TestLedger();
  const world = createWorld();
  const resolver: CombatResolver = options.resolver ?? {
    getCombatTarget: () => undefined,
    resolveHit: () => {},
  };

  const runtime = new CombatRuntime({
    config: createArenaConfig({ policy: options.policy, duel: options.duel }),
    weaponTable: parseWeaponTimingTable(weaponTiming),
    spellTable: parseSpellTimingTable(spellTiming),
    resolver,
    ledger,
    world,
    reflection: options.reflection,
    lineOfSight: options.lineOfSight,
    stopwatch: options.stopwatch ?? (() => 0),
    independentTimerDuels: options.independentTimerDuels ?? false,
  });

  const recorded: ArenaEvent[] = [];
  runtime.events.subscribe((event) => recorded.push(event));

  return {
    runtime,
    clock: runtime.clock,
    store: runtime.store,
    pulse: runtime.pulse,
    casts: runtime.casts,
    duels: runtime.duels,
    ledger,
    world,
    recorded,
  };
};

export type Harness = ReturnType<typeof createHarness>;
