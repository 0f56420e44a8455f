// Error kinds raised by the catalog and the user allergy write path.
//
// Validation errors (shape, temporal, referential) are raised before any
// storage attempt. UniquenessViolation only comes from the storage boundary.

export type FieldErrors = Readonly<Record<string, readonly string[]>>;

export type AllergyErrorCode =
  | "SHAPE_VIOLATION"
  | "TEMPORAL_VIOLATION"
  | "REFERENTIAL_STATE_VIOLATION"
  | "UNIQUENESS_VIOLATION"
  | "NOT_FOUND"
  | "CATALOG_CONFLICT";

export abstract class AllergyError extends Error {
  abstract readonly code: AllergyErrorCode;
  readonly fieldErrors: FieldErrors;

  constructor(message: string, fieldErrors: FieldErrors = {}) {
    super(message);
    this.fieldErrors = fieldErrors;
  }
}

export abstract class AllergyValidationError extends AllergyError {}

export class ShapeViolation extends AllergyValidationError {
  readonly code = "SHAPE_VIOLATION" as const;

  constructor(fieldErrors: FieldErrors) {
    const fields = Object.keys(fieldErrors);
    super(`Invalid value for ${fields.length ? fields.join(", ") : "input"}.`, fieldErrors);
    this.name = "ShapeViolation";
  }
}

export class TemporalViolation extends AllergyValidationError {
  readonly code = "TEMPORAL_VIOLATION" as const;

  constructor(message = "Symptom onset date cannot be in the future.") {
    super(message, { symptomOnsetDate: [message] });
    this.name = "TemporalViolation";
  }
}

export class ReferentialStateViolation extends AllergyValidationError {
  readonly code = "REFERENTIAL_STATE_VIOLATION" as const;

  constructor(message = "Cannot link to an inactive allergen.") {
    super(message, { allergenId: [message] });
    this.name = "ReferentialStateViolation";
  }
}

export type UniqueConstraint = "uniq_category_allergen" | "uniq_user_allergen";

export class UniquenessViolation extends AllergyError {
  readonly code = "UNIQUENESS_VIOLATION" as const;

  constructor(readonly constraint: UniqueConstraint) {
    const fields = constraint === "uniq_category_allergen"
      ? ["category", "allergenKey"]
      : ["userId", "allergenId"];
    const message = constraint === "uniq_category_allergen"
      ? "An allergen with this category and key already exists."
      : "This user already has a record for this allergen.";
    super(message, Object.fromEntries(fields.map((f) => [f, [message]])));
    this.name = "UniquenessViolation";
  }
}

export class NotFoundError extends AllergyError {
  readonly code = "NOT_FOUND" as const;

  constructor(readonly resource: "allergen" | "userAllergy", readonly id: string) {
    super(`${resource === "allergen" ? "Allergen" : "User allergy"} not found: ${id}`);
    this.name = "NotFoundError";
  }
}

export interface LabelConflict {
  readonly key: string;
  readonly entries: readonly { readonly category: string; readonly label: string }[];
}

export class CatalogConflictError extends AllergyError {
  readonly code = "CATALOG_CONFLICT" as const;

  constructor(readonly conflicts: readonly LabelConflict[]) {
    super(
      `Catalog defines conflicting labels for: ${conflicts.map((c) => c.key).join(", ")}`,
    );
    this.name = "CatalogConflictError";
  }
}
