import { fileURLToPath } from "node:url";
import { z } from "zod";
import type { WeaponClass } from "@arena/shared-sim";
import { logger } from "@arena/shared-servers";
import { parseWithSchema, readJsonFile } from "../../config/json-file";
import type { Implement } from "../types";

export const DEFAULT_WEAPON_TIMING_PATH = fileURLToPath(
  new URL("../../../data/weapon-timing.json", import.meta.url),
);

const weaponEntrySchema = z.object({
  name: z.string().min(1),
  /** Higher is slower. */
  weaponSpeedValue: z.number().positive(),
  weaponBaseMs: z.number().int().positive(),
  animationHitOffsetMs: z.number().int().nonnegative(),
  animationDurationMs: z.number().int().positive(),
});

const weaponTimingFileSchema = z.object({
  defaultEntry: weaponEntrySchema,
  classDefaults: z.object({
    dagger: weaponEntrySchema,
    one_handed: weaponEntrySchema,
    two_handed: weaponEntrySchema,
    bow: weaponEntrySchema,
    crossbow: weaponEntrySchema,
  }),
  weapons: z.array(weaponEntrySchema.extend({ itemId: z.number().int().nonnegative() })),
});

export type WeaponEntry = Readonly<z.output<typeof weaponEntrySchema>>;
export type WeaponTimingFile = z.output<typeof weaponTimingFileSchema>;

/** Per-weapon timing data, keyed by item id with class and global fallbacks. */
export class WeaponTimingTable {
  private readonly byItemId = new Map<number, WeaponEntry>();
  readonly defaultEntry: WeaponEntry;
  private readonly classDefaults: Readonly<Record<WeaponClass, WeaponEntry>>;

  constructor(data: WeaponTimingFile) {
    this.defaultEntry = data.defaultEntry;
    this.classDefaults = data.classDefaults;
    for (const weapon of data.weapons) {
      this.byItemId.set(weapon.itemId, weapon);
    }
  }

  get size(): number {
    return this.byItemId.size;
  }

  /** Exact item entry, then weapon class default, then the global default. */
  lookup(implement: Implement | undefined): WeaponEntry {
    if (!implement) {
      return this.defaultEntry;
    }
    return this.byItemId.get(implement.itemId) ?? this.classDefault(implement.weaponClass);
  }

  classDefault(weaponClass: WeaponClass | undefined): WeaponEntry {
    return weaponClass ? this.classDefaults[weaponClass] : this.defaultEntry;
  }
}

export const parseWeaponTimingTable = (
  value: unknown,
  source = "weapon timing table",
): WeaponTimingTable => new WeaponTimingTable(parseWithSchema(value, weaponTimingFileSchema, source));

export const loadWeaponTimingTable = async (
  filePath: string = DEFAULT_WEAPON_TIMING_PATH,
): Promise<WeaponTimingTable> => {
  const data = await readJsonFile(filePath, weaponTimingFileSchema, "weapon timing table");
  const table = new WeaponTimingTable(data);
  logger.info({ filePath, weapons: table.size }, "Loaded weapon timing entries");
  return table;
};
