import { readFile } from "node:fs/promises";
import type { z } from "zod";
import { ConfigurationError, describeError } from "../errors";

/** Read a JSON file and validate it; every failure becomes a ConfigurationError. */
export const readJsonFile = async <T>(
  filePath: string,
  schema: z.ZodType<T, z.ZodTypeDef, unknown>,
  source: string,
): Promise<T> => {
  let raw: string;
  try {
    raw = await readFile(filePath, "utf8");
  } catch (error) {
    throw new ConfigurationError(`Unable to read ${source} from ${filePath}`, [
      describeError(error),
    ]);
  }

  let json: unknown;
  try {
    json = JSON.parse(raw);
  } catch (error) {
    throw new ConfigurationError(`${source} at ${filePath} is not valid JSON`, [
      describeError(error),
    ]);
  }

  return parseWithSchema(json, schema, source);
};

export const parseWithSchema = <T>(
  value: unknown,
  schema: z.ZodType<T, z.ZodTypeDef, unknown>,
  source: string,
): T => {
  const parsed = schema.safeParse(value);
  if (!parsed.success) {
    throw ConfigurationError.fromZod(source, parsed.error);
  }
  return parsed.data;
};
