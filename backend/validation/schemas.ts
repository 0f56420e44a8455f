import { z } from "zod";
import { Category } from "../domain/Category";
import { SeverityLevel } from "../domain/SeverityLevel";
import { SourceInfo } from "../domain/SourceInfo";

// Input Validation Schemas (Zod)
//
// Field-shape rules for allergens and user allergies: types, lengths and
// enumeration membership. Cross-field and cross-entity rules (onset date,
// allergen activity) live in validators.ts.

// --- Shared ---

const ISO_DATE = /^\d{4}-\d{2}-\d{2}$/;

export function isCalendarDate(val: string): boolean {
  if (!ISO_DATE.test(val)) return false;
  const ms = Date.parse(`${val}T00:00:00Z`);
  return Number.isFinite(ms) && new Date(ms).toISOString().slice(0, 10) === val;
}

const ISODateSchema = z.string().refine(isCalendarDate, {
  message: "Must be a calendar date (YYYY-MM-DD)",
});

const IdSchema = z.string().trim().min(1).max(64);

// Opaque reference issued by the identity provider; stored as TEXT.
const UserIdSchema = z.string().trim().min(1);

// Blank ("") and null mean "not set".
function blankable<T extends z.ZodTypeAny>(schema: T) {
  return z
    .union([schema, z.literal(""), z.null()])
    .optional()
    .transform((v): z.output<T> | undefined => (v === "" || v === null ? undefined : v));
}

// In a patch: undefined leaves the field alone, null clears it.
function clearable<T extends z.ZodTypeAny>(schema: T) {
  return z
    .union([schema, z.literal(""), z.null()])
    .optional()
    .transform((v): z.output<T> | null | undefined => (v === "" ? null : v));
}

export const ReactionDetailsSchema = z.record(
  z.union([z.string().max(2000), z.array(z.string().max(2000)), z.null()]),
);

export const AdminNotesSchema = z.record(
  z.union([z.string().max(2000), z.number(), z.null()]),
);

const SeverityLevelSchema = z.nativeEnum(SeverityLevel);
const SourceInfoSchema = z.nativeEnum(SourceInfo);

// --- Allergen ---

export const AllergenSchema = z.object({
  id: IdSchema.optional(),
  category: z.nativeEnum(Category),
  allergenKey: z.string().trim().min(1, "Allergen key is required").max(50),
  isActive: z.boolean().default(true),
});

export type AllergenInput = z.output<typeof AllergenSchema>;

export const AllergenPatchSchema = z
  .object({
    category: z.nativeEnum(Category),
    allergenKey: z.string().trim().min(1, "Allergen key is required").max(50),
    isActive: z.boolean(),
  })
  .partial()
  .strict();

export type AllergenPatch = z.output<typeof AllergenPatchSchema>;

export const AllergenListQuerySchema = z.object({
  category: z.nativeEnum(Category).optional(),
  isActive: z.enum(["true", "false"]).transform((v) => v === "true").optional(),
  search: z.string().trim().min(1).max(100).optional(),
});

// --- UserAllergy ---

export const UserAllergySchema = z.object({
  id: IdSchema.optional(),
  userId: UserIdSchema,
  allergenId: IdSchema,
  severityLevel: blankable(SeverityLevelSchema),
  isConfirmed: z.boolean().default(false),
  symptomOnsetDate: blankable(ISODateSchema),
  sourceInfo: blankable(SourceInfoSchema),
  userReactionDetails: ReactionDetailsSchema.default({}),
  adminNotes: AdminNotesSchema.default({}),
  isActive: z.boolean().default(true),
});

// What a user submits when recording an allergy; userId comes from the route.
export const UserAllergyCreateSchema = z
  .object({
    allergenId: IdSchema,
    severityLevel: blankable(SeverityLevelSchema),
    symptomOnsetDate: blankable(ISODateSchema),
    sourceInfo: blankable(SourceInfoSchema),
    userReactionDetails: ReactionDetailsSchema.default({}),
  })
  .strict();

export type UserAllergyCreate = z.output<typeof UserAllergyCreateSchema>;

// Fields the owning user may change. Confirmation and admin notes are admin-only.
const userEditableFields = {
  allergenId: IdSchema.optional(),
  severityLevel: clearable(SeverityLevelSchema),
  symptomOnsetDate: clearable(ISODateSchema),
  sourceInfo: clearable(SourceInfoSchema),
  userReactionDetails: ReactionDetailsSchema.optional(),
  isActive: z.boolean().optional(),
};

export const UserAllergyUserPatchSchema = z.object(userEditableFields).strict();

export const UserAllergyAdminPatchSchema = z
  .object({
    ...userEditableFields,
    isConfirmed: z.boolean().optional(),
    adminNotes: AdminNotesSchema.optional(),
  })
  .strict();

export type UserAllergyUserPatch = z.output<typeof UserAllergyUserPatchSchema>;
export type UserAllergyAdminPatch = z.output<typeof UserAllergyAdminPatchSchema>;

export const UserAllergyListQuerySchema = z.object({
  userId: UserIdSchema.optional(),
  severityLevel: SeverityLevelSchema.optional(),
  sourceInfo: SourceInfoSchema.optional(),
  isConfirmed: z.enum(["true", "false"]).transform((v) => v === "true").optional(),
  isActive: z.enum(["true", "false"]).transform((v) => v === "true").optional(),
  search: z.string().trim().min(1).max(100).optional(),
});

// --- Helpers ---

export function zodFieldErrors(error: z.ZodError): Record<string, string[]> {
  const out: Record<string, string[]> = {};
  for (const issue of error.issues) {
    const field = issue.path.length ? issue.path.join(".") : "_root";
    (out[field] ??= []).push(issue.message);
  }
  return out;
}
