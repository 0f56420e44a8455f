import { config } from "../config/env";
import { CATALOG_GROUPS } from "./CatalogDefinitions";
import { createCatalogIndex, type CatalogIndex, type CategoryIndex, type FlatLabelIndex } from "./CatalogIndex";

// Process-wide catalog handle, built once when this module is first loaded.
// Components receive it by injection; tests build their own with createCatalogIndex.

export const CATALOG_INDEX: CatalogIndex = createCatalogIndex(CATALOG_GROUPS, {
  conflictPolicy: config.catalogConflictPolicy,
});

export const CATEGORY_TO_ALLERGENS_MAP: CategoryIndex = CATALOG_INDEX.byCategory;

export const FLAT_ALLERGEN_LABEL_MAP: FlatLabelIndex = CATALOG_INDEX.labels;
