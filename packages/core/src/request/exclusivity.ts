import type { JsonValue } from './request-utils.ts';

/**
 * Rules that collapse mutually exclusive filters, applied in table order so
 * that an earlier rule wins over a later one.
 */
export type ExclusionRule =
  /** When `field` is present (and equals `when`, if given), `drops` are removed */
  | { kind: 'supersedes'; field: string; when?: string; drops: readonly string[] }
  /** `field` survives only when `companion` holds one of `values` */
  | { kind: 'requires'; field: string; companion: string; values: readonly string[] };

export interface DroppedField {
  field: string;
  /** The field whose presence (or absence) caused the drop */
  by: string;
}

/**
 * Removes the losing side of every exclusive group from `params`.
 *
 * @returns The fields that were removed, in removal order
 */
export function applyExclusions(
  params: Map<string, JsonValue>,
  rules: readonly ExclusionRule[],
): DroppedField[] {
  const dropped: DroppedField[] = [];

  for (const rule of rules) {
    if (!params.has(rule.field)) continue;

    switch (rule.kind) {
      case 'supersedes': {
        if (rule.when !== undefined && params.get(rule.field) !== rule.when) break;
        for (const field of rule.drops) {
          if (params.delete(field)) dropped.push({ field, by: rule.field });
        }
        break;
      }
      case 'requires': {
        const companion = params.get(rule.companion);
        if (typeof companion === 'string' && rule.values.includes(companion)) break;
        params.delete(rule.field);
        dropped.push({ field: rule.field, by: rule.companion });
        break;
      }
    }
  }

  return dropped;
}
