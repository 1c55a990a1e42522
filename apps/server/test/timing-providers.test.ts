import { describe, expect, it } from "vitest";
import {
  LegacyFormulaTimingProvider,
  WeaponTimingProvider,
  createTimingProvider,
  createTimingSnapshot,
  loadWeaponTimingTable,
  parseWeaponTimingTable,
} from "../src/combat/timing";
import { createArenaConfig } from "../src/config/config-loader";
import { ConfigurationError } from "../src/errors";
import weaponTiming from "../data/weapon-timing.json";
import { HALBERD, KATANA, LONGSWORD, createActor } from "./helpers";

const table = parseWeaponTimingTable(weaponTiming);

describe("WeaponTimingProvider", () => {
  const provider = new WeaponTimingProvider(table);

  it("snaps the katana interval to the nearest pulse at baseline dexterity", () => {
    const player = createActor("p1", { isPlayer: true, dexterity: 100 });

    expect(createTimingSnapshot(provider, player, KATANA)).toEqual({
      attackIntervalMs: 1850,
      animationHitOffsetMs: 300,
      animationDurationMs: 600,
    });
  });

  it("speeds players up with dexterity and caps the bonus", () => {
    const quick = createActor("p1", { isPlayer: true, dexterity: 125 });
    const quicker = createActor("p2", { isPlayer: true, dexterity: 150 });

    expect(provider.getAttackIntervalMs(quick, KATANA)).toBe(1450);
    expect(provider.getAttackIntervalMs(quicker, KATANA)).toBe(1450);
  });

  it("slows low-dexterity players", () => {
    const clumsy = createActor("p1", { isPlayer: true, dexterity: 50 });

    expect(provider.getAttackIntervalMs(clumsy, KATANA)).toBe(2200);
  });

  it("ignores dexterity for non-players", () => {
    const npc = createActor("npc", { isPlayer: false, dexterity: 150 });

    expect(provider.getAttackIntervalMs(npc, KATANA)).toBe(1850);
  });

  it("falls back from item to class to the default entry", () => {
    const actor = createActor("p1", { isPlayer: true });
    const unknownDagger = { itemId: 1, name: "Rusty Dagger", weaponClass: "dagger" } as const;
    const unknown = { itemId: 2, name: "Stick" };

    expect(provider.getAttackIntervalMs(actor, LONGSWORD)).toBe(1200);
    expect(provider.getAttackIntervalMs(actor, HALBERD)).toBe(1000);
    expect(provider.getAnimationHitOffsetMs(HALBERD)).toBe(400);
    expect(provider.getAttackIntervalMs(actor, unknownDagger)).toBe(800);
    expect(provider.getAnimationHitOffsetMs(unknownDagger)).toBe(200);
    expect(provider.getAttackIntervalMs(actor, unknown)).toBe(2000);
    expect(provider.getAttackIntervalMs(actor, undefined)).toBe(2000);
    expect(provider.getAnimationDurationMs(undefined)).toBe(600);
  });

  it("returns the minimum interval for a missing actor", () => {
    expect(provider.getAttackIntervalMs(undefined, KATANA)).toBe(200);
  });

  it("clamps intervals to the supported range", () => {
    const custom = parseWeaponTimingTable({
      ...weaponTiming,
      weapons: [
        { itemId: 10, name: "Anchor", weaponSpeedValue: 150, weaponBaseMs: 1600, animationHitOffsetMs: 300, animationDurationMs: 600 },
        { itemId: 11, name: "Needle", weaponSpeedValue: 3, weaponBaseMs: 1600, animationHitOffsetMs: 100, animationDurationMs: 200 },
      ],
    });
    const customProvider = new WeaponTimingProvider(custom);
    const actor = createActor("p1");

    expect(customProvider.getAttackIntervalMs(actor, { itemId: 10, name: "Anchor" })).toBe(4000);
    expect(customProvider.getAttackIntervalMs(actor, { itemId: 11, name: "Needle" })).toBe(200);
  });
});

describe("LegacyFormulaTimingProvider", () => {
  const policy = createArenaConfig().policy;
  const provider = new LegacyFormulaTimingProvider(table, policy);
  const cleaver = { itemId: 20, name: "Cleaver", weaponClass: "two_handed", legacySpeedSeconds: 3 } as const;

  it("divides weapon speed by dexterity", () => {
    expect(provider.getAttackIntervalMs(createActor("a", { dexterity: 100 }), cleaver)).toBe(3000);
    expect(provider.getAttackIntervalMs(createActor("b", { dexterity: 50 }), cleaver)).toBe(6000);
  });

  it("clamps to the policy swing speed bounds", () => {
    expect(provider.getAttackIntervalMs(createActor("a", { dexterity: 0 }), cleaver)).toBe(10_000);
    expect(provider.getAttackIntervalMs(createActor("b", { dexterity: 1000 }), cleaver)).toBe(500);
  });

  it("uses fixed fallbacks for a missing actor or speed", () => {
    expect(provider.getAttackIntervalMs(undefined, cleaver)).toBe(700);
    expect(provider.getAttackIntervalMs(createActor("a"), KATANA)).toBe(1500);
  });

  it("takes animation timings from class defaults", () => {
    expect(provider.getAnimationHitOffsetMs(cleaver)).toBe(400);
    expect(provider.getAnimationDurationMs(cleaver)).toBe(800);
    expect(provider.getAnimationHitOffsetMs(undefined)).toBe(300);
  });
});

describe("timing tables", () => {
  it("selects the provider named by policy", () => {
    const legacy = createArenaConfig({ policy: { timingProvider: "legacy_formula" } }).policy;

    expect(createTimingProvider(legacy, table).name).toBe("legacy_formula");
    expect(createTimingProvider(createArenaConfig().policy, table).name).toBe("weapon_table");
  });

  it("loads the shipped weapon table", async () => {
    const loaded = await loadWeaponTimingTable();

    expect(loaded.size).toBe(4);
    expect(loaded.lookup(KATANA).name).toBe("Katana");
  });

  it("rejects a malformed table", () => {
    expect(() => parseWeaponTimingTable({ defaultEntry: {}, weapons: [] })).toThrow(
      ConfigurationError,
    );
  });
});
