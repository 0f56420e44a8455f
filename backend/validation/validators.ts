import type { AllergenRecord } from "../domain/Allergen";
import { toISODate, type Clock, type ISODateString } from "../domain/Clock";
import type { UserAllergyDraft } from "../domain/UserAllergy";
import {
  ReferentialStateViolation,
  ShapeViolation,
  TemporalViolation,
} from "../errors/AllergyErrors";
import { AllergenSchema, UserAllergySchema, zodFieldErrors, type AllergenInput } from "./schemas";

// Write-path validation.
//
// Unvalidated -> Validated -> Persisted. Repository writes only accept
// Validated<T>, and Validated is exported as a type: the functions in this
// module are the only way to obtain one.

class Validated<T> {
  // Private member makes the type nominal.
  private readonly sealed = true;

  constructor(readonly value: T) {}
}

export type { Validated };

export type ValidatedAllergen = Validated<AllergenInput>;
export type ValidatedUserAllergy = Validated<UserAllergyDraft>;

export function validateAllergen(input: unknown): ValidatedAllergen {
  const parsed = AllergenSchema.safeParse(input);
  if (!parsed.success) throw new ShapeViolation(zodFieldErrors(parsed.error));
  return new Validated(parsed.data);
}

export function isOnsetNotFuture(onset: ISODateString, now: Date): boolean {
  // Today is allowed; anything after today is not.
  return onset <= toISODate(now);
}

export interface UserAllergyValidationContext {
  // The allergen row referenced by the draft, as currently stored. Undefined when it does not exist.
  readonly allergen: AllergenRecord | undefined;
  readonly clock: Clock;
}

// Runs on create and on every update:
// 1. field shape, 2. onset date not after today, 3. referenced allergen active.
export function validateUserAllergy(
  input: UserAllergyDraft,
  ctx: UserAllergyValidationContext,
): ValidatedUserAllergy {
  const parsed = UserAllergySchema.safeParse(input);
  const fieldErrors: Record<string, string[]> = parsed.success ? {} : zodFieldErrors(parsed.error);

  if (parsed.success && (!ctx.allergen || ctx.allergen.id !== parsed.data.allergenId)) {
    fieldErrors.allergenId = [`Allergen not found: ${parsed.data.allergenId}`];
  }

  if (!parsed.success || Object.keys(fieldErrors).length > 0) {
    throw new ShapeViolation(fieldErrors);
  }

  const draft = parsed.data;

  if (draft.symptomOnsetDate && !isOnsetNotFuture(draft.symptomOnsetDate, ctx.clock.now())) {
    throw new TemporalViolation();
  }

  if (ctx.allergen && !ctx.allergen.isActive) {
    throw new ReferentialStateViolation();
  }

  return new Validated(draft);
}
