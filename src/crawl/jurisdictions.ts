import { z } from "zod";
import stateRows from "./states.json";

const StateTableSchema = z
  .array(
    z.object({
      id: z.number().int().positive(),
      code: z.string().regex(/^[A-Z]{2}$/)
    })
  )
  .length(57);

export type StateRow = z.infer<typeof StateTableSchema>[number];

/**
 * The 57 US state and territory codes with their stable ids. The `states`
 * table is seeded from this list, so ids never diverge between the crawl
 * ledger and its consumers.
 */
export const STATES: readonly StateRow[] = Object.freeze(StateTableSchema.parse(stateRows));

const STATE_ID_BY_CODE: ReadonlyMap<string, number> = new Map(
  STATES.map((row): [string, number] => [row.code, row.id])
);

/** Case-insensitive; surrounding whitespace is ignored. */
export function stateIdForCode(code: string): number | null {
  return STATE_ID_BY_CODE.get(code.trim().toUpperCase()) ?? null;
}

export interface ResolvedJurisdictions {
  stateIds: number[];
  unknownCodes: string[];
}

/** Maps annotations to state ids, dropping duplicates and collecting unknown codes. */
export function resolveJurisdictions(codes: readonly string[]): ResolvedJurisdictions {
  const stateIds: number[] = [];
  const unknownCodes: string[] = [];
  for (const code of codes) {
    const id = stateIdForCode(code);
    if (id === null) {
      unknownCodes.push(code);
    } else if (!stateIds.includes(id)) {
      stateIds.push(id);
    }
  }
  return { stateIds, unknownCodes };
}
