import { describe, expect, it } from "vitest";
import { DuelType } from "@arena/shared-sim";
import { DuelContext } from "../src/duel/duel-context";
import { evaluateDuelOutcome } from "../src/duel/duel-outcome";
import { StandardDuelRuleset } from "../src/duel/rulesets";
import { TEST_ARENA, createActor, createWorld } from "./helpers";

const createContext = (type: DuelType, ids: string[]): DuelContext => {
  const context = new DuelContext("duel-test", TEST_ARENA, type, 0, new StandardDuelRuleset(createWorld()));
  for (const id of ids) {
    context.addParticipant(createActor(id));
  }
  return context;
};

describe("evaluateDuelOutcome", () => {
  it("is undecided while both duelists stand", () => {
    const context = createContext(DuelType.Money1v1, ["a", "b"]);

    expect(evaluateDuelOutcome(context)).toEqual({ decided: false });
  });

  it("names the last duelist standing in a 1v1", () => {
    const context = createContext(DuelType.Money1v1, ["a", "b"]);
    const [first, second] = context.participants;
    second.eliminate();

    expect(evaluateDuelOutcome(context)).toEqual({ decided: true, winner: first });
  });

  it("draws a 1v1 when nobody is left", () => {
    const context = createContext(DuelType.Money1v1, ["a", "b"]);
    for (const participant of context.participants) {
      participant.eliminate();
    }

    expect(evaluateDuelOutcome(context)).toEqual({ decided: true, winner: null });
  });

  it("waits in a 2v2 until a whole team is down", () => {
    const context = createContext(DuelType.Money2v2, ["a", "b", "c", "d"]);
    context.participants[1].eliminate();

    expect(evaluateDuelOutcome(context)).toEqual({ decided: false });
  });

  it("represents a 2v2 win by the first surviving member", () => {
    const context = createContext(DuelType.Loot2v2, ["a", "b", "c", "d"]);
    const [a, b, c, d] = context.participants;
    b.eliminate();
    d.eliminate();
    a.eliminate();

    expect(evaluateDuelOutcome(context)).toEqual({ decided: true, winner: c });
  });

  it("draws a 2v2 when both teams are down", () => {
    const context = createContext(DuelType.Money2v2, ["a", "b", "c", "d"]);
    for (const participant of context.participants) {
      participant.eliminate();
    }

    expect(evaluateDuelOutcome(context)).toEqual({ decided: true, winner: null });
  });

  it("counts deleted actors as down", () => {
    const context = new DuelContext(
      "duel-test",
      TEST_ARENA,
      DuelType.Money1v1,
      0,
      new StandardDuelRuleset(createWorld()),
    );
    const survivor = context.addParticipant(createActor("a"));
    context.addParticipant(createActor("b", { deleted: true }));

    expect(evaluateDuelOutcome(context)).toEqual({ decided: true, winner: survivor });
  });
});
