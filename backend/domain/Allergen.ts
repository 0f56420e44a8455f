import { categoryLabel, type Category } from "./Category";
import type { ISODateTimeString } from "./Clock";
import type { CatalogIndex } from "../catalog/CatalogIndex";

// Catalog entry as stored.
// allergenKey references a catalog key but is not enforced against the catalog:
// unknown keys render as the raw key.

export type AllergenId = string;

export interface AllergenRecord {
  readonly id: AllergenId;
  readonly category: Category;
  readonly allergenKey: string;
  readonly isActive: boolean;
  readonly createdAt: ISODateTimeString;
  readonly updatedAt: ISODateTimeString;
}

export const NO_ALLERGEN_SELECTED = "[No Allergen Selected]";

export class Allergen {
  constructor(
    readonly record: AllergenRecord,
    private readonly catalog: CatalogIndex,
  ) {}

  get id(): AllergenId {
    return this.record.id;
  }

  get category(): Category {
    return this.record.category;
  }

  get allergenKey(): string {
    return this.record.allergenKey;
  }

  get isActive(): boolean {
    return this.record.isActive;
  }

  label(): string {
    const key = this.record.allergenKey;
    if (!key) return NO_ALLERGEN_SELECTED;
    return this.catalog.labelFor(key) ?? key;
  }

  displayName(): string {
    return `${categoryLabel(this.record.category)}: ${this.label()}`;
  }

  toJSON(): AllergenRecord & { readonly label: string; readonly displayName: string } {
    return { ...this.record, label: this.label(), displayName: this.displayName() };
  }
}

// Default catalog ordering: category, then key.
export function compareAllergens(a: AllergenRecord, b: AllergenRecord): number {
  if (a.category !== b.category) return a.category < b.category ? -1 : 1;
  if (a.allergenKey !== b.allergenKey) return a.allergenKey < b.allergenKey ? -1 : 1;
  return 0;
}
