import { InvalidArgsError } from './errors.js';

/**
 * Parse CLI --agent-arg KEY=value arguments into a record.
 * Throws INVALID_ARGS if any entry is missing '=' or has an empty key.
 */
export function parseAgentArgs(args: string[]): Record<string, string> {
  const result: Record<string, string> = {};
  for (const arg of args) {
    const eqIdx = arg.indexOf('=');
    if (eqIdx < 1) {
      throw new InvalidArgsError(`Invalid agent argument format: "${arg}" (expected key=value)`);
    }
    result[arg.slice(0, eqIdx)] = arg.slice(eqIdx + 1);
  }
  return result;
}
