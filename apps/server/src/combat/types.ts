import type { WeaponClass } from "@arena/shared-sim";

/** A weapon, tool or empty hand the actor swings with. */
export interface Implement {
  readonly itemId: number;
  readonly name: string;
  readonly weaponClass?: WeaponClass;
  /** Base swing speed in seconds, used by the legacy formula. */
  readonly legacySpeedSeconds?: number;
}

/**
 * Narrow view of a game actor. The engine reads these accessors and only
 * writes `mana`; everything else belongs to the host game's object model.
 */
export interface CombatActor {
  readonly id: string;
  readonly name: string;
  readonly isPlayer: boolean;
  readonly dexterity: number;
  readonly alive: boolean;
  readonly deleted: boolean;
  readonly hits: number;
  readonly maxHits: number;
  readonly mounted: boolean;
  readonly inCombat: boolean;
  readonly equipped?: Implement;
  mana: number;
  getSkill(skill: string): number;
}

/** Subset of an actor the timing providers read. */
export type TimingSubject = Pick<CombatActor, "dexterity" | "isPlayer">;

export const isActorAvailable = (actor: CombatActor | undefined): actor is CombatActor =>
  actor !== undefined && actor.alive && !actor.deleted;

/** Spell collaborator. Effect logic and reagent bookkeeping live in the host game. */
export interface Spell {
  readonly id: string;
  readonly name: string;
  /** Skill consulted for cast delay reduction. Defaults to "magery". */
  readonly skill?: string;
  /** Base delay used when the spell timing table has no entry. */
  readonly castDelayMs?: number;
  readonly recoveryMs?: number;
  /** Defaults to true. */
  readonly requiresLineOfSight?: boolean;
  /** Defaults to true. */
  readonly reflectable?: boolean;
  getManaCost(caster: CombatActor): number;
  /** Atomically consume reagents; returns false and consumes nothing when short. */
  consumeReagents(caster: CombatActor): boolean;
  applyEffect(caster: CombatActor, target: CombatActor): void;
}

export interface ReflectionCheck {
  hasReflection(target: CombatActor): boolean;
  consumeReflection?(target: CombatActor): void;
}

export interface LineOfSightQuery {
  hasLineOfSight(from: CombatActor, to: CombatActor): boolean;
}

/** Combat-resolution collaborator driven by the pulse. */
export interface CombatResolver {
  /** Who the attacker is currently fighting, if anyone. */
  getCombatTarget(attacker: CombatActor): CombatActor | undefined;
  resolveHit(attacker: CombatActor, defender: CombatActor, implement: Implement | undefined): void;
}
