import { createCatalogIndex, type CatalogIndex } from "../../backend/catalog/CatalogIndex";
import type { AllergenGroup } from "../../backend/catalog/CatalogDefinitions";
import { Category } from "../../backend/domain/Category";
import { fixedClock, type Clock } from "../../backend/domain/Clock";
import { InMemoryAllergyRepository } from "../../backend/repository/InMemoryAllergyRepository";
import { AllergenService } from "../../backend/services/AllergenService";
import { UserAllergyService } from "../../backend/services/UserAllergyService";

export const NOW = "2026-10-18T12:00:00.000Z";
export const TODAY = "2026-10-18";
export const TOMORROW = "2026-10-19";
export const YESTERDAY = "2026-10-17";

export const USER_A = "user-aaaa-0001";
export const USER_B = "user-bbbb-0002";

export const TEST_GROUPS: readonly AllergenGroup[] = [
  {
    category: Category.Contact,
    label: "Fragrances",
    allergens: [
      { key: "linalool", label: "Linalool" },
      { key: "limonene", label: "Limonene" },
    ],
  },
  {
    category: Category.Food,
    label: "Major Food Allergens",
    allergens: [
      { key: "peanut", label: "Peanut" },
      { key: "soy", label: "Soy" },
    ],
  },
  {
    category: Category.Contact,
    label: "Metals",
    allergens: [{ key: "nickel", label: "Nickel" }],
  },
];

export interface TestContext {
  readonly clock: Clock;
  readonly catalog: CatalogIndex;
  readonly repo: InMemoryAllergyRepository;
  readonly allergens: AllergenService;
  readonly userAllergies: UserAllergyService;
}

export function createTestContext(): TestContext {
  const clock = fixedClock(NOW);
  const catalog = createCatalogIndex(TEST_GROUPS);
  const repo = new InMemoryAllergyRepository(clock);
  const allergens = new AllergenService(repo, catalog);
  const userAllergies = new UserAllergyService(repo, allergens, clock);
  return { clock, catalog, repo, allergens, userAllergies };
}
