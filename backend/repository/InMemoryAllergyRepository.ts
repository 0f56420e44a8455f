import { randomUUID } from "crypto";
import { compareAllergens, type AllergenId, type AllergenRecord } from "../domain/Allergen";
import { systemClock, type Clock } from "../domain/Clock";
import type { UserAllergyId, UserAllergyRecord, UserId } from "../domain/UserAllergy";
import {
  NotFoundError,
  ReferentialStateViolation,
  ShapeViolation,
  UniquenessViolation,
} from "../errors/AllergyErrors";
import type { ValidatedAllergen, ValidatedUserAllergy } from "../validation/validators";
import type { AllergenFilter, AllergyRepository, UserAllergyFilter } from "./AllergyRepository";

// In-memory repository (reference implementation)
// - For local development and tests. NOT production storage.
//
// Enforcement mirrors the Postgres schema:
// - uniq_category_allergen and uniq_user_allergen.
// - Allergen must exist and be active when a user allergy is written.
// - Deleting an allergen cascades to its user allergies.
// - Stores and returns clones so callers cannot mutate stored rows.
//
// Every check-then-write runs without an await in between, so concurrent calls
// cannot interleave inside it.

function cloneSnapshot<T>(value: T): T {
  return structuredClone(value);
}

function includesFolded(haystack: string, needle: string): boolean {
  return haystack.toLowerCase().includes(needle.toLowerCase());
}

export class InMemoryAllergyRepository implements AllergyRepository {
  private readonly allergens = new Map<AllergenId, AllergenRecord>();
  private readonly userAllergies = new Map<UserAllergyId, UserAllergyRecord>();

  constructor(private readonly clock: Clock = systemClock) {}

  async getAllergen(id: AllergenId): Promise<AllergenRecord | undefined> {
    const row = this.allergens.get(id);
    return row ? cloneSnapshot(row) : undefined;
  }

  async listAllergens(filter: AllergenFilter = {}): Promise<readonly AllergenRecord[]> {
    const rows = [...this.allergens.values()].filter((a) => {
      if (filter.category !== undefined && a.category !== filter.category) return false;
      if (filter.isActive !== undefined && a.isActive !== filter.isActive) return false;
      if (filter.search !== undefined && !includesFolded(a.allergenKey, filter.search)) return false;
      return true;
    });

    return cloneSnapshot(rows.sort(compareAllergens));
  }

  async saveAllergen(allergen: ValidatedAllergen): Promise<AllergenRecord> {
    const input = allergen.value;
    const existing = input.id !== undefined ? this.allergens.get(input.id) : undefined;
    if (input.id !== undefined && !existing) throw new NotFoundError("allergen", input.id);

    for (const other of this.allergens.values()) {
      if (
        other.id !== input.id &&
        other.category === input.category &&
        other.allergenKey === input.allergenKey
      ) {
        throw new UniquenessViolation("uniq_category_allergen");
      }
    }

    const now = this.clock.now().toISOString();
    const row: AllergenRecord = {
      id: existing?.id ?? randomUUID(),
      category: input.category,
      allergenKey: input.allergenKey,
      isActive: input.isActive,
      createdAt: existing?.createdAt ?? now,
      updatedAt: now,
    };

    this.allergens.set(row.id, row);
    return cloneSnapshot(row);
  }

  async deleteAllergen(id: AllergenId): Promise<boolean> {
    if (!this.allergens.delete(id)) return false;

    for (const [uaId, ua] of this.userAllergies) {
      if (ua.allergenId === id) this.userAllergies.delete(uaId);
    }
    return true;
  }

  async getUserAllergy(id: UserAllergyId): Promise<UserAllergyRecord | undefined> {
    const row = this.userAllergies.get(id);
    return row ? cloneSnapshot(row) : undefined;
  }

  async listUserAllergies(filter: UserAllergyFilter = {}): Promise<readonly UserAllergyRecord[]> {
    const rows: { ua: UserAllergyRecord; allergen: AllergenRecord }[] = [];

    for (const ua of this.userAllergies.values()) {
      const allergen = this.allergens.get(ua.allergenId);
      if (!allergen) continue;

      if (filter.userId !== undefined && ua.userId !== filter.userId) continue;
      if (filter.allergenId !== undefined && ua.allergenId !== filter.allergenId) continue;
      if (filter.severityLevel !== undefined && ua.severityLevel !== filter.severityLevel) continue;
      if (filter.sourceInfo !== undefined && ua.sourceInfo !== filter.sourceInfo) continue;
      if (filter.isConfirmed !== undefined && ua.isConfirmed !== filter.isConfirmed) continue;
      if (filter.isActive !== undefined && ua.isActive !== filter.isActive) continue;
      if (
        filter.search !== undefined &&
        !includesFolded(ua.userId, filter.search) &&
        !includesFolded(allergen.allergenKey, filter.search)
      ) {
        continue;
      }

      rows.push({ ua, allergen });
    }

    rows.sort((a, b) => {
      if (a.ua.userId !== b.ua.userId) return a.ua.userId < b.ua.userId ? -1 : 1;
      return compareAllergens(a.allergen, b.allergen);
    });

    return cloneSnapshot(rows.map((r) => r.ua));
  }

  async saveUserAllergy(userAllergy: ValidatedUserAllergy): Promise<UserAllergyRecord> {
    const draft = userAllergy.value;
    const existing = draft.id !== undefined ? this.userAllergies.get(draft.id) : undefined;
    if (draft.id !== undefined && !existing) throw new NotFoundError("userAllergy", draft.id);

    const allergen = this.allergens.get(draft.allergenId);
    if (!allergen) throw new ShapeViolation({ allergenId: [`Allergen not found: ${draft.allergenId}`] });
    if (!allergen.isActive) throw new ReferentialStateViolation();

    for (const other of this.userAllergies.values()) {
      if (other.id !== draft.id && other.userId === draft.userId && other.allergenId === draft.allergenId) {
        throw new UniquenessViolation("uniq_user_allergen");
      }
    }

    const now = this.clock.now().toISOString();
    const row: UserAllergyRecord = {
      ...cloneSnapshot(draft),
      id: existing?.id ?? randomUUID(),
      createdAt: existing?.createdAt ?? now,
      updatedAt: now,
    };

    this.userAllergies.set(row.id, row);
    return cloneSnapshot(row);
  }

  async deleteUserAllergiesForUser(userId: UserId): Promise<number> {
    let removed = 0;
    for (const [id, ua] of this.userAllergies) {
      if (ua.userId === userId) {
        this.userAllergies.delete(id);
        removed++;
      }
    }
    return removed;
  }
}
