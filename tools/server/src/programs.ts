/**
 * Program catalogue: the programs a controller may start by name, read from
 * RELAY_PROGRAMS_FILE on each request so edits apply without a restart.
 */
import * as fs from "node:fs";
import { z } from "zod/v4";
import { InternalError, NotFoundError } from "lanrelay-shared/errors";
import type { ProgramEntry } from "lanrelay-shared/types";

export const programCatalogueSchema = z.object({
  programs: z.array(
    z.object({
      name: z.string().min(1),
      path: z.string().min(1),
      args: z.array(z.string()).default([]),
      description: z.string().default(""),
    }),
  ),
});

/** A missing file is an empty catalogue; an unreadable or invalid one is an error. */
export function loadPrograms(file: string): ProgramEntry[] {
  if (!fs.existsSync(file)) return [];

  let raw: unknown;
  try {
    raw = JSON.parse(fs.readFileSync(file, "utf-8"));
  } catch (err: unknown) {
    throw new InternalError("Program catalogue is unreadable", { cause: err });
  }

  const parsed = programCatalogueSchema.safeParse(raw);
  if (!parsed.success) {
    throw new InternalError("Program catalogue is invalid", { cause: parsed.error });
  }
  return parsed.data.programs;
}

export function findProgram(file: string, name: string): ProgramEntry {
  const entry = loadPrograms(file).find((program) => program.name === name);
  if (!entry) throw new NotFoundError(`Program '${name}'`);
  return entry;
}
