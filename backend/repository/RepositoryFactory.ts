import { config } from "../config/env";
import type { AllergyRepository } from "./AllergyRepository";
import { InMemoryAllergyRepository } from "./InMemoryAllergyRepository";
import { PostgresAllergyRepository } from "./PostgresAllergyRepository";

// Repository Factory
// - The ONLY place where the storage implementation is selected.
// - Selects PostgreSQL when DATABASE_URL is set, otherwise falls back to in-memory.

let singleton: AllergyRepository | undefined;

export function getAllergyRepository(): AllergyRepository {
  if (!singleton) {
    if (config.database.url) {
      console.log("[Allergies] Using PostgreSQL repository");
      singleton = new PostgresAllergyRepository();
    } else {
      console.log("[Allergies] Using in-memory repository (no DATABASE_URL set)");
      singleton = new InMemoryAllergyRepository();
    }
  }
  return singleton;
}
