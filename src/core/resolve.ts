import { AmbiguousIdentifierError, PlurbNotFoundError } from '../lib/errors.js';
import type { Plurb } from '../types/plurb.js';

/**
 * Map a human-entered identifier to plurbs. An exact id wins alone; otherwise
 * every plurb of the named task matches, case-sensitive first.
 */
export function resolvePlurbs(identifier: string, plurbs: Plurb[]): Plurb[] {
  const byId = plurbs.find((p) => p.id === identifier);
  if (byId) return [byId];

  const exact = plurbs.filter((p) => p.taskName === identifier);
  if (exact.length > 0) return exact;

  const needle = identifier.toLowerCase();
  return plurbs.filter((p) => p.taskName.toLowerCase() === needle);
}

export interface SelectPlurbOptions {
  /** Interactive chooser. Without one, several matches are an error. */
  choose?: (candidates: Plurb[]) => Promise<Plurb>;
}

export async function selectPlurb(
  identifier: string,
  plurbs: Plurb[],
  options?: SelectPlurbOptions,
): Promise<Plurb> {
  const candidates = resolvePlurbs(identifier, plurbs);

  if (candidates.length === 0) throw new PlurbNotFoundError(identifier);
  if (candidates.length === 1) return candidates[0];

  if (!options?.choose) {
    throw new AmbiguousIdentifierError(identifier, candidates.map((p) => p.id));
  }
  return options.choose(candidates);
}
