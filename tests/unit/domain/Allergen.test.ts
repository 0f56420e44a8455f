import { describe, it, expect } from "vitest";
import { Allergen, NO_ALLERGEN_SELECTED, compareAllergens, type AllergenRecord } from "../../../backend/domain/Allergen";
import { Category, categoryLabel, isCategory } from "../../../backend/domain/Category";
import { SeverityLevel, severityLabel } from "../../../backend/domain/SeverityLevel";
import { SourceInfo, sourceInfoLabel } from "../../../backend/domain/SourceInfo";
import { userAllergyDisplayName } from "../../../backend/domain/UserAllergy";
import { createCatalogIndex } from "../../../backend/catalog/CatalogIndex";
import { TEST_GROUPS, NOW } from "../../helpers/fixtures";

const catalog = createCatalogIndex(TEST_GROUPS);

function record(overrides: Partial<AllergenRecord> = {}): AllergenRecord {
  return {
    id: "a-1",
    category: Category.Food,
    allergenKey: "peanut",
    isActive: true,
    createdAt: NOW,
    updatedAt: NOW,
    ...overrides,
  };
}

describe("Allergen", () => {
  it("resolves the label from the catalog", () => {
    const allergen = new Allergen(record(), catalog);
    expect(allergen.label()).toBe("Peanut");
    expect(allergen.displayName()).toBe("Food Allergens: Peanut");
  });

  it("falls back to the raw key when the catalog does not know it", () => {
    const allergen = new Allergen(record({ category: Category.Other, allergenKey: "mystery_oil" }), catalog);
    expect(allergen.label()).toBe("mystery_oil");
    expect(allergen.displayName()).toBe("Other Allergens: mystery_oil");
  });

  it("uses the placeholder when no key is set", () => {
    const allergen = new Allergen(record({ category: Category.Contact, allergenKey: "" }), catalog);
    expect(allergen.label()).toBe(NO_ALLERGEN_SELECTED);
    expect(allergen.displayName()).toBe("Contact/Topical Allergens: [No Allergen Selected]");
  });

  it("serializes the record with its label and display name", () => {
    const json = JSON.parse(JSON.stringify(new Allergen(record(), catalog)));
    expect(json).toEqual({
      id: "a-1",
      category: "food",
      allergenKey: "peanut",
      isActive: true,
      createdAt: NOW,
      updatedAt: NOW,
      label: "Peanut",
      displayName: "Food Allergens: Peanut",
    });
  });

  it("orders by category, then key", () => {
    const rows = [
      record({ id: "3", category: Category.Other, allergenKey: "a" }),
      record({ id: "2", category: Category.Food, allergenKey: "soy" }),
      record({ id: "1", category: Category.Food, allergenKey: "peanut" }),
      record({ id: "4", category: Category.Contact, allergenKey: "nickel" }),
    ];
    expect(rows.sort(compareAllergens).map((r) => r.id)).toEqual(["4", "1", "2", "3"]);
  });

  it("builds the user allergy display name from the allergen", () => {
    const allergen = new Allergen(record(), catalog);
    expect(userAllergyDisplayName({ userId: "user-1234" }, allergen)).toBe("user-1234 - Food Allergens: Peanut");
  });
});

describe("enumeration labels", () => {
  it("labels every category", () => {
    expect(categoryLabel(Category.Food)).toBe("Food Allergens");
    expect(categoryLabel(Category.Contact)).toBe("Contact/Topical Allergens");
    expect(categoryLabel(Category.Inhalant)).toBe("Inhalant Allergens");
    expect(categoryLabel(Category.Other)).toBe("Other Allergens");
  });

  it("labels severity and source values", () => {
    expect(severityLabel(SeverityLevel.LifeThreatening)).toBe("Life-Threatening");
    expect(severityLabel(SeverityLevel.Mild)).toBe("Mild");
    expect(sourceInfoLabel(SourceInfo.DoctorDiagnosed)).toBe("Doctor Diagnosed");
    expect(sourceInfoLabel(SourceInfo.SelfReported)).toBe("Self-Reported");
  });

  it("recognizes category values", () => {
    expect(isCategory("inhalant")).toBe(true);
    expect(isCategory("Food")).toBe(false);
    expect(isCategory(undefined)).toBe(false);
  });
});
