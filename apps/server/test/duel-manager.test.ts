import { beforeEach, describe, expect, it, vi } from "vitest";
import { DuelEventType, DuelState, DuelType } from "@arena/shared-sim";
import type { DuelContext } from "../src/duel/duel-context";
import { TEST_ARENA, createActor, createHarness, type Harness, type TestActor } from "./helpers";

const WAGER = 100;

describe("DuelManager", () => {
  let harness: Harness;
  let alice: TestActor;
  let bob: TestActor;

  beforeEach(() => {
    harness = createHarness();
    alice = createActor("alice", { isPlayer: true });
    bob = createActor("bob", { isPlayer: true });
    harness.ledger.fund(alice, 1000);
    harness.ledger.fund(bob, 1000);
  });

  const startDuel = (isLoot = false): DuelContext => {
    const issued = harness.duels.issueChallenge(alice, bob, TEST_ARENA, WAGER, isLoot);
    expect(issued.accepted).toBe(true);
    const accepted = harness.duels.acceptChallenge(bob);
    if (!accepted.accepted) {
      throw new Error(`accept failed: ${accepted.rejectReason}`);
    }
    harness.clock.advanceTo(15_000);
    expect(accepted.context.state).toBe(DuelState.InProgress);
    return accepted.context;
  };

  it("escrows both wagers and walks through teleport and countdown", () => {
    harness.duels.issueChallenge(alice, bob, TEST_ARENA, WAGER, false);
    expect(harness.ledger.getBalance(alice)).toBe(900);

    const accepted = harness.duels.acceptChallenge(bob);
    if (!accepted.accepted) {
      throw new Error("accept failed");
    }
    const { context } = accepted;
    expect(harness.ledger.getBalance(bob)).toBe(900);
    expect(context.state).toBe(DuelState.Waiting);
    expect(context.participants.map((p) => p.teamId)).toEqual([0, 1]);

    harness.clock.advanceTo(5000);
    expect(harness.world.teleportToArena).toHaveBeenCalledWith(alice, TEST_ARENA, 0);
    expect(harness.world.teleportToArena).toHaveBeenCalledWith(bob, TEST_ARENA, 1);
    expect(harness.world.setFrozen).toHaveBeenCalledWith(alice, true);
    expect(context.state).toBe(DuelState.Countdown);

    harness.clock.advanceTo(15_000);
    expect(context.state).toBe(DuelState.InProgress);
    expect(context.startedAtMs).toBe(15_000);
    expect(harness.world.restore).toHaveBeenCalledTimes(2);
    expect(harness.world.setFrozen).toHaveBeenLastCalledWith(bob, false);
  });

  it("ends a 1v1 exactly once on death and pays the winner", () => {
    const context = startDuel();
    const endDuel = vi.spyOn(harness.duels, "endDuel");
    harness.clock.advanceTo(16_000);

    expect(harness.duels.handleDeath(bob, alice)).toBe(true);
    expect(harness.duels.handleDeath(bob, alice)).toBe(false);

    expect(endDuel).toHaveBeenCalledTimes(1);
    expect(endDuel).toHaveBeenCalledWith(context, context.participants[0]);
    expect(harness.duels.endDuel(context, null)).toBe(false);
    expect(context.state).toBe(DuelState.Ending);
    expect(context.participants[0].kills).toBe(1);
    expect(context.participants[1].deaths).toBe(1);
    expect(harness.world.clearAggression).toHaveBeenCalledWith(bob, alice);
    expect(harness.ledger.getBalance(alice)).toBe(1080);
    expect(harness.ledger.getBalance(bob)).toBe(900);

    harness.clock.advanceTo(21_000);
    expect(context.state).toBe(DuelState.Completed);
    expect(harness.duels.getResults()).toEqual([
      {
        contextId: "duel-1",
        arenaId: "arena-1",
        completedAtMs: 21_000,
        type: DuelType.Money1v1,
        winnerIds: ["alice"],
        loserIds: ["bob"],
        durationMs: 1000,
        goldPot: 200,
      },
    ]);
    expect(harness.world.returnFromArena).toHaveBeenCalledTimes(2);
    expect(harness.duels.findContext(alice)).toBeUndefined();
    expect(harness.duels.isArenaBusy(TEST_ARENA)).toBe(false);
  });

  it("refunds an expired challenge exactly once", () => {
    harness.duels.issueChallenge(alice, bob, TEST_ARENA, WAGER, false);

    harness.clock.advanceTo(30_000);
    expect(harness.ledger.getBalance(alice)).toBe(1000);
    expect(harness.duels.getPendingChallenge(bob)).toBeUndefined();
    expect(harness.duels.declineChallenge(bob)).toBe(false);

    harness.clock.advanceTo(90_000);
    expect(harness.ledger.credit).toHaveBeenCalledTimes(1);
    expect(harness.recorded.filter((e) => e.eventType === DuelEventType.ChallengeExpired)).toHaveLength(1);
  });

  it("refunds a declined challenge and clears its timer", () => {
    harness.duels.issueChallenge(alice, bob, TEST_ARENA, WAGER, false);

    expect(harness.duels.declineChallenge(bob)).toBe(true);
    harness.clock.advanceTo(30_000);

    expect(harness.ledger.credit).toHaveBeenCalledTimes(1);
    expect(harness.ledger.getBalance(alice)).toBe(1000);
    expect(harness.clock.pendingTimers).toBe(0);
  });

  it("refunds the initiator when the target cannot pay on accept", () => {
    harness.duels.issueChallenge(alice, bob, TEST_ARENA, WAGER, false);
    harness.ledger.fund(bob, 50);

    expect(harness.duels.acceptChallenge(bob)).toEqual({
      accepted: false,
      error: "DuelRejected",
      rejectReason: "payment_failed",
    });
    expect(harness.ledger.getBalance(alice)).toBe(1000);
    expect(harness.duels.isArenaBusy(TEST_ARENA)).toBe(false);
  });

  it("validates challengers and the arena", () => {
    const carol = createActor("carol", { isPlayer: true });
    const dave = createActor("dave", { isPlayer: true, mounted: true });
    harness.ledger.fund(carol, 1000);
    harness.ledger.fund(dave, 1000);

    expect(harness.duels.issueChallenge(alice, dave, TEST_ARENA, WAGER, false)).toMatchObject({
      rejectReason: "target_unavailable",
    });
    expect(harness.duels.issueChallenge(alice, bob, TEST_ARENA, 5000, false)).toMatchObject({
      rejectReason: "insufficient_gold",
    });
    expect(harness.duels.issueChallenge(alice, alice, TEST_ARENA, WAGER, false)).toMatchObject({
      rejectReason: "self_challenge",
    });

    harness.duels.issueChallenge(alice, bob, TEST_ARENA, WAGER, false);
    expect(harness.duels.issueChallenge(alice, carol, TEST_ARENA, WAGER, false)).toMatchObject({
      rejectReason: "initiator_busy",
    });

    harness.duels.acceptChallenge(bob);
    expect(harness.duels.issueChallenge(carol, createActor("erin"), TEST_ARENA, 0, false)).toMatchObject({
      rejectReason: "arena_busy",
    });
  });

  it("aborts before teleport when a participant died, refunding both", () => {
    harness.duels.issueChallenge(alice, bob, TEST_ARENA, WAGER, false);
    const accepted = harness.duels.acceptChallenge(bob);
    bob.alive = false;

    harness.clock.advanceTo(5000);

    expect(accepted.accepted && accepted.context.state).toBe(DuelState.Completed);
    expect(harness.world.teleportToArena).not.toHaveBeenCalled();
    expect(harness.ledger.getBalance(alice)).toBe(1000);
    expect(harness.ledger.getBalance(bob)).toBe(1000);
    expect(harness.duels.findContext(alice)).toBeUndefined();
  });

  it("ends an in-progress duel as a draw when a participant disconnects", () => {
    const context = startDuel();

    harness.duels.handleDisconnect(alice);

    expect(context.state).toBe(DuelState.Ending);
    expect(context.participants[0].eliminated).toBe(true);
    expect(harness.ledger.getBalance(alice)).toBe(900);
    expect(harness.ledger.getBalance(bob)).toBe(900);

    harness.clock.advanceTo(20_000);
    expect(harness.duels.getResults()[0]).toMatchObject({
      winnerIds: [],
      loserIds: ["alice", "bob"],
    });
  });

  it("aborts a waiting duel when a participant disconnects", () => {
    harness.duels.issueChallenge(alice, bob, TEST_ARENA, WAGER, false);
    harness.duels.acceptChallenge(bob);

    harness.duels.handleDisconnect(alice);

    expect(harness.ledger.getBalance(alice)).toBe(900);
    expect(harness.ledger.getBalance(bob)).toBe(1000);
    expect(harness.duels.isArenaBusy(TEST_ARENA)).toBe(false);
    expect(harness.duels.findContext(bob)).toBeUndefined();
    expect(harness.recorded.at(-1)).toMatchObject({
      eventType: DuelEventType.DuelAborted,
      reason: "insufficient_participants",
    });
  });

  it("cancels a pending challenge when either side disconnects", () => {
    harness.duels.issueChallenge(alice, bob, TEST_ARENA, WAGER, false);

    harness.duels.handleDisconnect(bob);

    expect(harness.ledger.getBalance(alice)).toBe(1000);
    expect(harness.duels.getPendingChallenge(bob)).toBeUndefined();
    expect(harness.duels.issueChallenge(alice, bob, TEST_ARENA, WAGER, false).accepted).toBe(true);
  });

  it("holds loot duels open for the loot phase", () => {
    const context = startDuel(true);

    harness.duels.handleDeath(bob, alice);
    expect(context.state).toBe(DuelState.LootPhase);
    expect(harness.ledger.getBalance(alice)).toBe(900);

    harness.clock.advanceTo(15_000 + 119_999);
    expect(context.state).toBe(DuelState.LootPhase);
    harness.clock.advanceTo(15_000 + 120_000);
    expect(context.state).toBe(DuelState.Completed);
  });

  it("ends the match as a draw at the time limit", () => {
    const context = startDuel();

    harness.clock.advanceTo(15_000 + 30 * 60 * 1000);

    expect(context.state).toBe(DuelState.Ending);
    expect(harness.recorded.find((e) => e.eventType === DuelEventType.DuelEnded)).toMatchObject({
      draw: true,
      winnerIds: [],
      payoutPerWinner: 0,
    });
  });

  it("ignores deaths outside a duel", () => {
    expect(harness.duels.handleDeath(createActor("stranger"))).toBe(false);
    expect(harness.duels.handleDeath(undefined)).toBe(false);
    expect(() => harness.duels.handleDisconnect(undefined)).not.toThrow();
  });
});

describe("team duels", () => {
  it("splits the payout across the surviving team", () => {
    const harness = createHarness();
    const [p1, p2, p3, p4] = ["p1", "p2", "p3", "p4"].map((id) => createActor(id, { isPlayer: true }));
    const context = harness.duels.createDuel(TEST_ARENA, DuelType.Money2v2, 500);
    if (!context) {
      throw new Error("arena should be free");
    }

    for (const actor of [p1, p2, p3, p4]) {
      harness.ledger.fund(actor, 1000);
      expect(harness.duels.joinDuel(context, actor).accepted).toBe(true);
    }
    expect(context.participants.map((p) => p.teamId)).toEqual([0, 1, 0, 1]);
    expect(harness.duels.joinDuel(context, createActor("p5")).accepted).toBe(false);

    harness.clock.advanceTo(15_000);
    harness.duels.handleDeath(p2, p1);
    expect(context.state).toBe(DuelState.InProgress);

    harness.duels.handleDeath(p4, p3);
    expect(context.state).toBe(DuelState.Ending);
    expect(harness.ledger.getBalance(p1)).toBe(1400);
    expect(harness.ledger.getBalance(p3)).toBe(1400);
    expect(harness.ledger.getBalance(p2)).toBe(500);
    expect(harness.ledger.getBalance(p4)).toBe(500);
  });
});

describe("IndependentTimerDuelRuleset", () => {
  it("engages pulse timers for the fight and releases them afterwards", () => {
    const harness = createHarness({ independentTimerDuels: true });
    const alice = createActor("alice", { isPlayer: true });
    const bob = createActor("bob", { isPlayer: true });
    harness.duels.issueChallenge(alice, bob, TEST_ARENA, 0, false);
    harness.duels.acceptChallenge(bob);

    harness.clock.advanceTo(15_000);
    expect(harness.pulse.isRegistered(alice)).toBe(true);
    expect(harness.pulse.isRegistered(bob)).toBe(true);
    expect(harness.recorded.find((e) => e.eventType === DuelEventType.MechanicsEngaged)).toMatchObject({
      rulesetId: "independent_timers",
      participantIds: ["alice", "bob"],
    });

    harness.duels.handleDeath(bob, alice);
    harness.clock.advanceTo(20_000);
    expect(harness.pulse.isRegistered(alice)).toBe(false);
    expect(harness.store.get(alice)).toBeUndefined();
  });

  it("keeps participants swinging when they only engage after the idle timeout", () => {
    const alice = createActor("alice", { isPlayer: true });
    const bob = createActor("bob", { isPlayer: true });
    let engaged = false;
    const resolveHit = vi.fn();
    const harness = createHarness({
      independentTimerDuels: true,
      resolver: {
        getCombatTarget: (attacker) => {
          if (!engaged) {
            return undefined;
          }
          return attacker.id === alice.id ? bob : alice;
        },
        resolveHit,
      },
    });
    harness.pulse.start();
    harness.duels.issueChallenge(alice, bob, TEST_ARENA, 0, false);
    harness.duels.acceptChallenge(bob);

    // The bell rings at 15s; both fighters chase for six seconds.
    for (let now = 50; now <= 21_000; now += 50) {
      harness.runtime.step(now);
    }
    expect(harness.pulse.isRegistered(alice)).toBe(true);
    expect(harness.pulse.isRegistered(bob)).toBe(true);

    engaged = true;
    for (let now = 21_050; now <= 22_000; now += 50) {
      harness.runtime.step(now);
    }

    expect(resolveHit).toHaveBeenCalledTimes(2);
    expect(resolveHit).toHaveBeenCalledWith(alice, bob, undefined);
    expect(resolveHit).toHaveBeenCalledWith(bob, alice, undefined);
  });
});
