import { readFileSync } from "node:fs";
import type { z } from "zod";

/** Directory holding the static JSON tables shipped with the package. */
const DATA_DIRECTORY = new URL("../data/", import.meta.url);

/**
 * Reads and validates one of the bundled JSON tables. Tables are small and
 * read once per process, so a synchronous read at first use is enough.
 */
export function loadDataFile<T extends z.ZodTypeAny>(fileName: string, schema: T): z.output<T> {
  const raw = readFileSync(new URL(fileName, DATA_DIRECTORY), "utf8");
  return schema.parse(JSON.parse(raw));
}
