/**
 * Object classification
 *
 * Upstream object types come from a language model and are not guaranteed to
 * be enumeration values ("exterior_wall_1", "Main Door"). The substring
 * heuristic lives here and nowhere else.
 */

import type { PrimitiveKind } from '../types/spec.js';

export interface ClassifiableObject {
  type: string;
  id?: string;
}

/** Checked in order; first match wins */
const CLASSIFICATION_RULES: ReadonlyArray<{ kind: PrimitiveKind; tokens: readonly string[] }> = [
  { kind: 'door', tokens: ['door'] },
  { kind: 'window', tokens: ['window'] },
  { kind: 'roof', tokens: ['roof'] },
  { kind: 'foundation', tokens: ['foundation'] },
  { kind: 'floor_slab', tokens: ['slab', 'floor'] },
  { kind: 'wall', tokens: ['wall'] },
];

export function classificationKey(obj: ClassifiableObject): string {
  return `${obj.type} ${obj.id ?? ''}`.trim().toLowerCase();
}

export function classifyObject(obj: ClassifiableObject): PrimitiveKind {
  const key = classificationKey(obj);
  for (const rule of CLASSIFICATION_RULES) {
    if (rule.tokens.some((token) => key.includes(token))) {
      return rule.kind;
    }
  }
  return 'generic_box';
}

/** Case-insensitive "does the text contain any of these tokens" */
export function containsAnyToken(text: string, tokens: readonly string[]): boolean {
  const lower = text.toLowerCase();
  return tokens.some((token) => token.length > 0 && lower.includes(token.toLowerCase()));
}
