import { z } from "zod";
import { Category } from "../domain/Category";
import rawCatalog from "./allergen-catalog.json";

// Static catalog definitions.
// allergen-catalog.json holds the ordered groups; group order is significant
// (it drives per-category list order and flat-index collision resolution).

export interface AllergenChoice {
  readonly key: string;
  readonly label: string;
}

export interface AllergenGroup {
  readonly category: Category;
  readonly label: string;
  readonly allergens: readonly AllergenChoice[];
}

const AllergenChoiceSchema = z.object({
  key: z.string().min(1).max(50),
  label: z.string().min(1),
});

const AllergenGroupSchema = z.object({
  category: z.nativeEnum(Category),
  label: z.string().min(1),
  allergens: z.array(AllergenChoiceSchema),
});

export const CatalogFileSchema = z.object({
  groups: z.array(AllergenGroupSchema).min(1),
});

export function parseCatalogGroups(input: unknown): readonly AllergenGroup[] {
  const parsed = CatalogFileSchema.safeParse(input);
  if (!parsed.success) {
    const detail = parsed.error.issues
      .map((i) => `${i.path.join(".")}: ${i.message}`)
      .join("; ");
    throw new Error(`Invalid allergen catalog: ${detail}`);
  }

  return Object.freeze(
    parsed.data.groups.map((g) =>
      Object.freeze({
        category: g.category,
        label: g.label,
        allergens: Object.freeze(g.allergens.map((a) => Object.freeze({ key: a.key, label: a.label }))),
      }),
    ),
  );
}

export const CATALOG_GROUPS: readonly AllergenGroup[] = parseCatalogGroups(rawCatalog);
