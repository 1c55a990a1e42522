import { fileURLToPath } from "node:url";
import { z } from "zod";
import { logger } from "@arena/shared-servers";
import { parseWithSchema, readJsonFile } from "../config/json-file";

export const DEFAULT_SPELL_TIMING_PATH = fileURLToPath(
  new URL("../../data/spell-timing.json", import.meta.url),
);

const spellTimingEntrySchema = z.object({
  name: z.string().min(1),
  baseDelayMs: z.number().int().nonnegative(),
  perTileDelayMs: z.number().int().nonnegative().default(0),
  perTargetDelayMs: z.number().int().nonnegative().default(0),
  /** 0 means uncapped. */
  maxDelayMs: z.number().int().nonnegative().default(0),
});

const spellTimingFileSchema = z.object({
  spells: z.array(spellTimingEntrySchema),
});

export type SpellTimingEntry = Readonly<z.output<typeof spellTimingEntrySchema>>;

export interface CastDelayInput {
  /** Area size for field and area spells. */
  tiles?: number;
  /** Number of targets hit; only targets beyond the first add delay. */
  targets?: number;
  fromScroll?: boolean;
  skill?: number;
}

const MAX_SKILL_REDUCTION = 0.5;

/** Cast delay overrides for area and multi-target spells. */
export class SpellTimingTable {
  private readonly entries = new Map<string, SpellTimingEntry>();

  constructor(entries: readonly SpellTimingEntry[]) {
    for (const entry of entries) {
      this.entries.set(entry.name.toLowerCase(), entry);
    }
  }

  get size(): number {
    return this.entries.size;
  }

  get(spellName: string): SpellTimingEntry | undefined {
    return this.entries.get(spellName.toLowerCase());
  }

  /** Undefined when the spell has no entry, so callers fall back to the spell's own delay. */
  getCastDelay(spellName: string, input: CastDelayInput = {}): number | undefined {
    const entry = this.get(spellName);
    if (!entry) {
      return undefined;
    }

    const tiles = input.tiles ?? 0;
    const targets = input.targets ?? 1;
    const skill = input.skill ?? 0;

    let delay = entry.baseDelayMs;
    if (tiles > 0) {
      delay += entry.perTileDelayMs * tiles;
    }
    if (targets > 1) {
      delay += entry.perTargetDelayMs * (targets - 1);
    }
    if (!input.fromScroll && skill > 0) {
      delay = Math.trunc(delay * (1 - Math.min(skill / 10, MAX_SKILL_REDUCTION)));
    }
    if (entry.maxDelayMs > 0) {
      delay = Math.min(delay, entry.maxDelayMs);
    }
    return Math.max(0, delay);
  }
}

export const parseSpellTimingTable = (
  value: unknown,
  source = "spell timing table",
): SpellTimingTable => new SpellTimingTable(parseWithSchema(value, spellTimingFileSchema, source).spells);

export const loadSpellTimingTable = async (
  filePath: string = DEFAULT_SPELL_TIMING_PATH,
): Promise<SpellTimingTable> => {
  const data = await readJsonFile(filePath, spellTimingFileSchema, "spell timing table");
  const table = new SpellTimingTable(data.spells);
  logger.info({ filePath, spells: table.size }, "Loaded spell timing entries");
  return table;
};
