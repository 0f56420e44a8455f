import type { AllergenId, AllergenRecord } from "../domain/Allergen";
import type { Category } from "../domain/Category";
import type { SeverityLevel } from "../domain/SeverityLevel";
import type { SourceInfo } from "../domain/SourceInfo";
import type { UserAllergyId, UserAllergyRecord, UserId } from "../domain/UserAllergy";
import type { ValidatedAllergen, ValidatedUserAllergy } from "../validation/validators";

// Repository Boundary
// - The ONLY layer that reads/writes allergens and user allergies.
// - Writes accept Validated values only; there is no raw "write the row" path.
// - Uniqueness is enforced here as the last-resort backstop:
//   (category, allergenKey) and (userId, allergenId) -> UniquenessViolation.
// - A user allergy write re-reads its allergen inside the write and rejects an
//   inactive one, so a concurrent deactivation cannot slip through.
// - Deleting an allergen removes its user allergies.

export interface AllergenFilter {
  readonly category?: Category;
  readonly isActive?: boolean;
  // Substring match on allergenKey.
  readonly search?: string;
}

export interface UserAllergyFilter {
  readonly userId?: UserId;
  readonly allergenId?: AllergenId;
  readonly severityLevel?: SeverityLevel;
  readonly sourceInfo?: SourceInfo;
  readonly isConfirmed?: boolean;
  readonly isActive?: boolean;
  // Substring match on userId or the allergen's key.
  readonly search?: string;
}

export interface AllergyRepository {
  getAllergen(id: AllergenId): Promise<AllergenRecord | undefined>;

  // Ordered by category, then allergenKey.
  listAllergens(filter?: AllergenFilter): Promise<readonly AllergenRecord[]>;

  // Inserts when value.id is absent, otherwise updates that row.
  saveAllergen(allergen: ValidatedAllergen): Promise<AllergenRecord>;

  deleteAllergen(id: AllergenId): Promise<boolean>;

  getUserAllergy(id: UserAllergyId): Promise<UserAllergyRecord | undefined>;

  // Ordered by userId, allergen category, allergen key.
  listUserAllergies(filter?: UserAllergyFilter): Promise<readonly UserAllergyRecord[]>;

  // Inserts when value.id is absent, otherwise updates that row.
  saveUserAllergy(userAllergy: ValidatedUserAllergy): Promise<UserAllergyRecord>;

  // Cascade hook for when the owning user is deleted. Returns rows removed.
  deleteUserAllergiesForUser(userId: UserId): Promise<number>;
}
