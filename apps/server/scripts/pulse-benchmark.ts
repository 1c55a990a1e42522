import { logger } from "@arena/shared-servers";
import {
  CombatRuntime,
  createArenaConfig,
  loadWeaponTimingTable,
  type CombatActor,
  type CombatResolver,
  type DuelWorld,
  type GoldLedger,
} from "../src";

const readCount = (value: string | undefined, fallback: number): number => {
  const parsed = Number.parseInt(value ?? "", 10);
  return Number.isNaN(parsed) || parsed <= 0 ? fallback : parsed;
};

const createCombatant = (index: number): CombatActor => ({
  id: `bench-${index}`,
  name: `Combatant ${index}`,
  isPlayer: index % 2 === 0,
  dexterity: 50 + (index % 76),
  alive: true,
  deleted: false,
  hits: 100,
  maxHits: 100,
  mounted: false,
  inCombat: true,
  mana: 100,
  getSkill: () => 0,
});

const run = async (): Promise<void> => {
  const combatants = readCount(process.env.BENCH_COMBATANTS, 500);
  const ticks = readCount(process.env.BENCH_TICKS, 1000);

  const config = createArenaConfig();
  const weaponTable = await loadWeaponTimingTable();
  const actors = Array.from({ length: combatants }, (_, index) => createCombatant(index));

  // Everyone fights their neighbour.
  const resolver: CombatResolver = {
    getCombatTarget: (attacker) => {
      const index = actors.indexOf(attacker);
      return actors[(index + 1) % actors.length];
    },
    resolveHit: () => {},
  };
  const ledger: GoldLedger = { getBalance: () => 0, debit: () => false, credit: () => {} };
  const world: DuelWorld = {
    teleportToArena: () => {},
    returnFromArena: () => {},
    setFrozen: () => {},
    restore: () => {},
    clearAggression: () => {},
  };

  const runtime = new CombatRuntime({ config, weaponTable, resolver, ledger, world });
  runtime.pulse.start();
  for (const actor of actors) {
    runtime.pulse.registerCombatant(actor);
  }

  const tickMs = config.policy.globalTickMs;
  for (let tick = 1; tick <= ticks; tick += 1) {
    runtime.step(tick * tickMs);
  }

  logger.info({ combatants, ticks, ...runtime.getMetrics() }, "Pulse benchmark finished");
  runtime.dispose();
};

try {
  await run();
} catch (error) {
  logger.error({ err: error }, "Pulse benchmark failed");
  throw error;
}
