import type { Allergen, AllergenId } from "./Allergen";
import type { ISODateString, ISODateTimeString } from "./Clock";
import type { SeverityLevel } from "./SeverityLevel";
import type { SourceInfo } from "./SourceInfo";

// A user's claim against one catalog entry.
// - At most one row per (userId, allergenId).
// - Never silently deleted: deactivated via isActive, or removed when the
//   owning user or the referenced allergen is deleted.

export type UserId = string;
export type UserAllergyId = string;

export type ReactionDetails = Readonly<Record<string, string | readonly string[] | null>>;
export type AdminNotes = Readonly<Record<string, string | number | null>>;

// Fields a caller supplies. Everything the store assigns is absent.
export interface UserAllergyDraft {
  readonly id?: UserAllergyId;
  readonly userId: UserId;
  readonly allergenId: AllergenId;
  readonly severityLevel?: SeverityLevel;
  readonly isConfirmed: boolean;
  readonly symptomOnsetDate?: ISODateString;
  readonly sourceInfo?: SourceInfo;
  readonly userReactionDetails: ReactionDetails;
  readonly adminNotes: AdminNotes;
  readonly isActive: boolean;
}

export interface UserAllergyRecord extends UserAllergyDraft {
  readonly id: UserAllergyId;
  readonly createdAt: ISODateTimeString;
  readonly updatedAt: ISODateTimeString;
}

export function userAllergyDisplayName(record: Pick<UserAllergyRecord, "userId">, allergen: Allergen): string {
  return `${record.userId} - ${allergen.displayName()}`;
}

export function toDraft(record: UserAllergyRecord): UserAllergyDraft {
  const { createdAt: _createdAt, updatedAt: _updatedAt, ...draft } = record;
  return draft;
}
