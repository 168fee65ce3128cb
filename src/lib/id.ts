import { customAlphabet } from 'nanoid';

const alphabet = 'abcdefghijklmnopqrstuvwxyz0123456789';

export const SUFFIX_LENGTH = 5;

const suffix = customAlphabet(alphabet, SUFFIX_LENGTH);

/** Random suffix that disambiguates plurbs working on the same task. */
export function plurbSuffix(): string {
  return suffix();
}

export function plurbId(slug: string, unique: string = plurbSuffix()): string {
  return `${slug}-${unique}`;
}

const SUFFIX_PATTERN = new RegExp(`-[a-z0-9]{${SUFFIX_LENGTH}}$`);

/** Strip the random suffix from a plurb id, leaving the task slug. */
export function slugFromPlurbId(id: string): string {
  return id.replace(SUFFIX_PATTERN, '');
}

/** Code-unit order, shared by the registry and the watcher. */
export function compareIds(a: string, b: string): number {
  if (a < b) return -1;
  return a > b ? 1 : 0;
}
