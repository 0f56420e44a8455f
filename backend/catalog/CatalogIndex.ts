import type { Category } from "../domain/Category";
import { CatalogConflictError, type LabelConflict } from "../errors/AllergyErrors";
import type { ConflictPolicy } from "../config/env";
import type { AllergenChoice, AllergenGroup } from "./CatalogDefinitions";

// Derived, read-only lookups over the static catalog.
// Built once at startup; request handlers only read them.

export type CategoryIndex = ReadonlyMap<Category, readonly AllergenChoice[]>;
export type FlatLabelIndex = ReadonlyMap<string, string>;

// Category -> concatenation of every group's choices for that category, in input order.
// Categories appear in order of first occurrence. Duplicate keys are kept.
export function buildCategoryIndex(groups: Iterable<AllergenGroup>): CategoryIndex {
  const acc = new Map<Category, AllergenChoice[]>();

  for (const group of groups) {
    const list = acc.get(group.category) ?? [];
    list.push(...group.allergens);
    acc.set(group.category, list);
  }

  return acc;
}

// Key -> label across all categories. On a key collision the category iterated last wins.
export function buildFlatLabelIndex(categoryIndex: CategoryIndex): FlatLabelIndex {
  const flat = new Map<string, string>();

  for (const choices of categoryIndex.values()) {
    for (const { key, label } of choices) flat.set(key, label);
  }

  return flat;
}

// Keys that resolve to more than one distinct label. Same key + same label is not a conflict.
export function findLabelConflicts(categoryIndex: CategoryIndex): LabelConflict[] {
  const seen = new Map<string, { category: string; label: string }[]>();

  for (const [category, choices] of categoryIndex) {
    for (const { key, label } of choices) {
      const entries = seen.get(key) ?? [];
      entries.push({ category, label });
      seen.set(key, entries);
    }
  }

  const conflicts: LabelConflict[] = [];
  for (const [key, entries] of seen) {
    const labels = new Set(entries.map((e) => e.label));
    if (labels.size > 1) conflicts.push({ key, entries });
  }
  return conflicts;
}

export interface CatalogIndex {
  readonly groups: readonly AllergenGroup[];
  readonly byCategory: CategoryIndex;
  readonly labels: FlatLabelIndex;

  allergensFor(category: Category): readonly AllergenChoice[];
  labelFor(allergenKey: string): string | undefined;
}

export interface CatalogIndexOptions {
  readonly conflictPolicy?: ConflictPolicy;
}

export function createCatalogIndex(
  groups: readonly AllergenGroup[],
  options: CatalogIndexOptions = {},
): CatalogIndex {
  const byCategory = buildCategoryIndex(groups);

  const conflicts = findLabelConflicts(byCategory);
  if (conflicts.length > 0) {
    if ((options.conflictPolicy ?? "reject") === "reject") {
      throw new CatalogConflictError(conflicts);
    }
    for (const c of conflicts) {
      const detail = c.entries.map((e) => `${e.category}="${e.label}"`).join(", ");
      console.warn(`[Catalog] Label conflict for key "${c.key}" (${detail}); last definition wins.`);
    }
  }

  const labels = buildFlatLabelIndex(byCategory);

  return Object.freeze({
    groups,
    byCategory,
    labels,
    allergensFor: (category: Category) => byCategory.get(category) ?? [],
    labelFor: (allergenKey: string) => labels.get(allergenKey),
  });
}
