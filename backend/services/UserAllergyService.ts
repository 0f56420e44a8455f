import type { Clock } from "../domain/Clock";
import type { Allergen, AllergenRecord } from "../domain/Allergen";
import {
  toDraft,
  userAllergyDisplayName,
  type UserAllergyDraft,
  type UserAllergyId,
  type UserAllergyRecord,
  type UserId,
} from "../domain/UserAllergy";
import { NotFoundError, ShapeViolation } from "../errors/AllergyErrors";
import type { AllergyRepository, UserAllergyFilter } from "../repository/AllergyRepository";
import {
  UserAllergyAdminPatchSchema,
  UserAllergyCreateSchema,
  UserAllergyUserPatchSchema,
  zodFieldErrors,
  type UserAllergyAdminPatch,
} from "../validation/schemas";
import { validateUserAllergy } from "../validation/validators";
import type { AllergenService } from "./AllergenService";

// User allergy write path.
// save() is the only way a user allergy reaches storage: it validates the full
// row against the current allergen state and the clock, then persists the
// Validated value. Every create and update goes through it.

export interface UserAllergyView extends UserAllergyRecord {
  readonly allergen: ReturnType<Allergen["toJSON"]>;
  readonly displayName: string;
}

function applyPatch(current: UserAllergyDraft, patch: UserAllergyAdminPatch): UserAllergyDraft {
  const pick = <T>(next: T | null | undefined, prev: T | undefined): T | undefined =>
    next === undefined ? prev : next ?? undefined;

  return {
    ...current,
    allergenId: patch.allergenId ?? current.allergenId,
    severityLevel: pick(patch.severityLevel, current.severityLevel),
    symptomOnsetDate: pick(patch.symptomOnsetDate, current.symptomOnsetDate),
    sourceInfo: pick(patch.sourceInfo, current.sourceInfo),
    userReactionDetails: patch.userReactionDetails ?? current.userReactionDetails,
    adminNotes: patch.adminNotes ?? current.adminNotes,
    isConfirmed: patch.isConfirmed ?? current.isConfirmed,
    isActive: patch.isActive ?? current.isActive,
  };
}

export class UserAllergyService {
  constructor(
    private readonly repo: AllergyRepository,
    private readonly allergens: AllergenService,
    private readonly clock: Clock,
  ) {}

  async save(draft: UserAllergyDraft): Promise<UserAllergyRecord> {
    const allergen = await this.repo.getAllergen(draft.allergenId);
    const validated = validateUserAllergy(draft, { allergen, clock: this.clock });
    return this.repo.saveUserAllergy(validated);
  }

  async create(userId: UserId, input: unknown): Promise<UserAllergyRecord> {
    const parsed = UserAllergyCreateSchema.safeParse(input);
    if (!parsed.success) throw new ShapeViolation(zodFieldErrors(parsed.error));

    return this.save({
      userId,
      ...parsed.data,
      isConfirmed: false,
      adminNotes: {},
      isActive: true,
    });
  }

  async get(id: UserAllergyId): Promise<UserAllergyRecord> {
    const row = await this.repo.getUserAllergy(id);
    if (!row) throw new NotFoundError("userAllergy", id);
    return row;
  }

  // Owner edits: severity, onset, source, reaction details, active flag, allergen.
  async updateAsUser(userId: UserId, id: UserAllergyId, patch: unknown): Promise<UserAllergyRecord> {
    const parsed = UserAllergyUserPatchSchema.safeParse(patch);
    if (!parsed.success) throw new ShapeViolation(zodFieldErrors(parsed.error));

    const current = await this.repo.getUserAllergy(id);
    if (!current || current.userId !== userId) throw new NotFoundError("userAllergy", id);

    return this.save(applyPatch(toDraft(current), parsed.data));
  }

  // Admin edits additionally cover confirmation and admin notes.
  async updateAsAdmin(id: UserAllergyId, patch: unknown): Promise<UserAllergyRecord> {
    const parsed = UserAllergyAdminPatchSchema.safeParse(patch);
    if (!parsed.success) throw new ShapeViolation(zodFieldErrors(parsed.error));

    const current = await this.repo.getUserAllergy(id);
    if (!current) throw new NotFoundError("userAllergy", id);

    return this.save(applyPatch(toDraft(current), parsed.data));
  }

  async list(filter: UserAllergyFilter = {}): Promise<readonly UserAllergyRecord[]> {
    return this.repo.listUserAllergies(filter);
  }

  async listForUser(userId: UserId): Promise<readonly UserAllergyRecord[]> {
    return this.repo.listUserAllergies({ userId });
  }

  async toViews(records: readonly UserAllergyRecord[]): Promise<UserAllergyView[]> {
    const cache = new Map<string, AllergenRecord>();
    const views: UserAllergyView[] = [];

    for (const record of records) {
      let allergenRow = cache.get(record.allergenId);
      if (!allergenRow) {
        allergenRow = (await this.allergens.get(record.allergenId)).record;
        cache.set(record.allergenId, allergenRow);
      }
      const allergen = this.allergens.wrap(allergenRow);
      views.push({
        ...record,
        allergen: allergen.toJSON(),
        displayName: userAllergyDisplayName(record, allergen),
      });
    }

    return views;
  }

  // Called when the owning user is deleted by the identity provider.
  async purgeUser(userId: UserId): Promise<number> {
    const removed = await this.repo.deleteUserAllergiesForUser(userId);
    console.log(`[Allergies] Removed ${removed} user allergy record(s) for deleted user ${userId.slice(0, 8)}...`);
    return removed;
  }
}
