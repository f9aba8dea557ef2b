import type { CommandRule } from '../extract/types.js';
import type { RuleDefinition } from './schema.js';

/** Compiles configured rule tables. Stateful flags are dropped so `test()` can be reused across commands. */
export function compileRules(definitions: readonly RuleDefinition[]): CommandRule[] {
  return definitions.map(def => ({
    id: def.id,
    matcher: new RegExp(def.pattern, (def.flags ?? '').replace(/[gy]/g, '')),
    message: def.message,
  }));
}
