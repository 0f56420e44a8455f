// Allergen categories are a closed set.
// Every catalog entry and every Allergen row belongs to exactly one.

export enum Category {
  Food = "food",
  Contact = "contact",
  Inhalant = "inhalant",
  Other = "other",
}

export const CATEGORIES: readonly Category[] = [
  Category.Food,
  Category.Contact,
  Category.Inhalant,
  Category.Other,
];

export function categoryLabel(category: Category): string {
  switch (category) {
    case Category.Food:
      return "Food Allergens";
    case Category.Contact:
      return "Contact/Topical Allergens";
    case Category.Inhalant:
      return "Inhalant Allergens";
    case Category.Other:
      return "Other Allergens";
    default:
      return assertNever(category);
  }
}

export function isCategory(value: unknown): value is Category {
  return typeof value === "string" && (CATEGORIES as readonly string[]).includes(value);
}

export function assertNever(value: never): never {
  throw new Error(`Unhandled variant: ${String(value)}`);
}
