import { DatabaseError, type QueryResult } from "pg";
import type { AllergenId, AllergenRecord } from "../domain/Allergen";
import { isCategory } from "../domain/Category";
import { SeverityLevel } from "../domain/SeverityLevel";
import { SourceInfo } from "../domain/SourceInfo";
import type { AdminNotes, ReactionDetails, UserAllergyId, UserAllergyRecord, UserId } from "../domain/UserAllergy";
import {
  NotFoundError,
  ReferentialStateViolation,
  ShapeViolation,
  TemporalViolation,
  UniquenessViolation,
} from "../errors/AllergyErrors";
import { AdminNotesSchema, ReactionDetailsSchema } from "../validation/schemas";
import type { ValidatedAllergen, ValidatedUserAllergy } from "../validation/validators";
import { query, withTransaction } from "../database/connection";
import type { AllergenFilter, AllergyRepository, UserAllergyFilter } from "./AllergyRepository";

// =========================================================================
// PostgreSQL Allergy Repository
//
// Production storage backend (schema: backend/database/schema.sql).
// Same contract as InMemoryAllergyRepository; the schema's constraints are the
// backstop and their violations are mapped to the domain error types:
// - 23505 unique_violation  -> UniquenessViolation
// - 23514 check_violation   -> TemporalViolation (check_onset_not_future)
// - 23503 foreign_key       -> ShapeViolation (allergenId)
// =========================================================================

const UUID_RE = /^[0-9a-f]{8}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{12}$/i;

function isUuid(id: string): boolean {
  return UUID_RE.test(id);
}

// --- Row ↔ Domain mapping ---

interface AllergenRow {
  [key: string]: unknown;
  id: string;
  category: string;
  allergen_key: string;
  is_active: boolean;
  created_at: Date;
  updated_at: Date;
}

interface UserAllergyRow {
  [key: string]: unknown;
  id: string;
  user_id: string;
  allergen_id: string;
  severity_level: string | null;
  is_confirmed: boolean;
  symptom_onset_date: string | null;
  source_info: string | null;
  user_reaction_details: unknown;
  admin_notes: unknown;
  is_active: boolean;
  created_at: Date;
  updated_at: Date;
}

function parseSeverity(value: string | null): SeverityLevel | undefined {
  if (value === null) return undefined;
  const match = Object.values(SeverityLevel).find((s) => s === value);
  if (!match) throw new Error(`Unknown severity_level in database: ${value}`);
  return match;
}

function parseSource(value: string | null): SourceInfo | undefined {
  if (value === null) return undefined;
  const match = Object.values(SourceInfo).find((s) => s === value);
  if (!match) throw new Error(`Unknown source_info in database: ${value}`);
  return match;
}

function rowToAllergen(row: AllergenRow): AllergenRecord {
  if (!isCategory(row.category)) {
    throw new Error(`Unknown category in database: ${row.category}`);
  }
  return {
    id: row.id,
    category: row.category,
    allergenKey: row.allergen_key,
    isActive: row.is_active,
    createdAt: row.created_at.toISOString(),
    updatedAt: row.updated_at.toISOString(),
  };
}

function rowToUserAllergy(row: UserAllergyRow): UserAllergyRecord {
  const reactions: ReactionDetails = ReactionDetailsSchema.parse(row.user_reaction_details ?? {});
  const notes: AdminNotes = AdminNotesSchema.parse(row.admin_notes ?? {});

  return {
    id: row.id,
    userId: row.user_id,
    allergenId: row.allergen_id,
    ...(row.severity_level !== null ? { severityLevel: parseSeverity(row.severity_level) } : {}),
    isConfirmed: row.is_confirmed,
    ...(row.symptom_onset_date !== null ? { symptomOnsetDate: row.symptom_onset_date } : {}),
    ...(row.source_info !== null ? { sourceInfo: parseSource(row.source_info) } : {}),
    userReactionDetails: reactions,
    adminNotes: notes,
    isActive: row.is_active,
    createdAt: row.created_at.toISOString(),
    updatedAt: row.updated_at.toISOString(),
  };
}

function mapConstraintError(err: unknown): unknown {
  if (!(err instanceof DatabaseError)) return err;

  switch (err.code) {
    case "23505":
      if (err.constraint === "uniq_category_allergen" || err.constraint === "uniq_user_allergen") {
        return new UniquenessViolation(err.constraint);
      }
      return err;
    case "23514":
      if (err.constraint === "check_onset_not_future") return new TemporalViolation();
      return new ShapeViolation({ [err.constraint ?? "_root"]: [err.message] });
    case "23503":
      return new ShapeViolation({ allergenId: ["Referenced allergen does not exist."] });
    default:
      return err;
  }
}

const USER_ALLERGY_COLUMNS = `
  ua.id, ua.user_id, ua.allergen_id, ua.severity_level, ua.is_confirmed,
  ua.symptom_onset_date::text AS symptom_onset_date, ua.source_info,
  ua.user_reaction_details, ua.admin_notes, ua.is_active, ua.created_at, ua.updated_at`;

type RunQuery = (text: string, params: unknown[]) => Promise<QueryResult<UserAllergyRow>>;

async function selectUserAllergy(run: RunQuery, id: string): Promise<UserAllergyRecord | undefined> {
  const result = await run(
    `SELECT ${USER_ALLERGY_COLUMNS} FROM user_allergies ua WHERE ua.id = $1`,
    [id],
  );
  const row = result.rows[0];
  return row ? rowToUserAllergy(row) : undefined;
}

export class PostgresAllergyRepository implements AllergyRepository {

  async getAllergen(id: AllergenId): Promise<AllergenRecord | undefined> {
    if (!isUuid(id)) return undefined;
    const result = await query<AllergenRow>(`SELECT * FROM allergens WHERE id = $1`, [id]);
    const row = result.rows[0];
    return row ? rowToAllergen(row) : undefined;
  }

  async listAllergens(filter: AllergenFilter = {}): Promise<readonly AllergenRecord[]> {
    const where: string[] = [];
    const params: unknown[] = [];

    if (filter.category !== undefined) {
      params.push(filter.category);
      where.push(`category = $${params.length}`);
    }
    if (filter.isActive !== undefined) {
      params.push(filter.isActive);
      where.push(`is_active = $${params.length}`);
    }
    if (filter.search !== undefined) {
      params.push(`%${filter.search}%`);
      where.push(`allergen_key ILIKE $${params.length}`);
    }

    const result = await query<AllergenRow>(
      `SELECT * FROM allergens
       ${where.length ? `WHERE ${where.join(" AND ")}` : ""}
       ORDER BY category ASC, allergen_key ASC`,
      params,
    );

    return result.rows.map(rowToAllergen);
  }

  async saveAllergen(allergen: ValidatedAllergen): Promise<AllergenRecord> {
    const input = allergen.value;

    try {
      if (input.id === undefined) {
        const result = await query<AllergenRow>(
          `INSERT INTO allergens (category, allergen_key, is_active)
           VALUES ($1, $2, $3)
           RETURNING *`,
          [input.category, input.allergenKey, input.isActive],
        );
        return rowToAllergen(result.rows[0]);
      }

      if (!isUuid(input.id)) throw new NotFoundError("allergen", input.id);

      const result = await query<AllergenRow>(
        `UPDATE allergens
         SET category = $2, allergen_key = $3, is_active = $4, updated_at = NOW()
         WHERE id = $1
         RETURNING *`,
        [input.id, input.category, input.allergenKey, input.isActive],
      );
      const row = result.rows[0];
      if (!row) throw new NotFoundError("allergen", input.id);
      return rowToAllergen(row);
    } catch (err) {
      throw mapConstraintError(err);
    }
  }

  async deleteAllergen(id: AllergenId): Promise<boolean> {
    if (!isUuid(id)) return false;
    // user_allergies.allergen_id is ON DELETE CASCADE.
    const result = await query(`DELETE FROM allergens WHERE id = $1`, [id]);
    return (result.rowCount ?? 0) > 0;
  }

  async getUserAllergy(id: UserAllergyId): Promise<UserAllergyRecord | undefined> {
    if (!isUuid(id)) return undefined;
    return selectUserAllergy((text, params) => query<UserAllergyRow>(text, params), id);
  }

  async listUserAllergies(filter: UserAllergyFilter = {}): Promise<readonly UserAllergyRecord[]> {
    const where: string[] = [];
    const params: unknown[] = [];
    const add = (clause: (placeholder: string) => string, value: unknown) => {
      params.push(value);
      where.push(clause(`$${params.length}`));
    };

    if (filter.userId !== undefined) add((p) => `ua.user_id = ${p}`, filter.userId);
    if (filter.allergenId !== undefined) {
      if (!isUuid(filter.allergenId)) return [];
      add((p) => `ua.allergen_id = ${p}`, filter.allergenId);
    }
    if (filter.severityLevel !== undefined) add((p) => `ua.severity_level = ${p}`, filter.severityLevel);
    if (filter.sourceInfo !== undefined) add((p) => `ua.source_info = ${p}`, filter.sourceInfo);
    if (filter.isConfirmed !== undefined) add((p) => `ua.is_confirmed = ${p}`, filter.isConfirmed);
    if (filter.isActive !== undefined) add((p) => `ua.is_active = ${p}`, filter.isActive);
    if (filter.search !== undefined) {
      add((p) => `(ua.user_id ILIKE ${p} OR a.allergen_key ILIKE ${p})`, `%${filter.search}%`);
    }

    const result = await query<UserAllergyRow>(
      `SELECT ${USER_ALLERGY_COLUMNS}
       FROM user_allergies ua
       JOIN allergens a ON a.id = ua.allergen_id
       ${where.length ? `WHERE ${where.join(" AND ")}` : ""}
       ORDER BY ua.user_id ASC, a.category ASC, a.allergen_key ASC`,
      params,
    );

    return result.rows.map(rowToUserAllergy);
  }

  async saveUserAllergy(userAllergy: ValidatedUserAllergy): Promise<UserAllergyRecord> {
    const draft = userAllergy.value;

    if (!isUuid(draft.allergenId)) {
      throw new ShapeViolation({ allergenId: [`Allergen not found: ${draft.allergenId}`] });
    }
    if (draft.id !== undefined && !isUuid(draft.id)) {
      throw new NotFoundError("userAllergy", draft.id);
    }

    try {
      return await withTransaction(async (client) => {
        // Lock the allergen row against a concurrent deactivation until commit.
        const allergen = await client.query<{ is_active: boolean }>(
          `SELECT is_active FROM allergens WHERE id = $1 FOR SHARE`,
          [draft.allergenId],
        );
        const allergenRow = allergen.rows[0];
        if (!allergenRow) {
          throw new ShapeViolation({ allergenId: [`Allergen not found: ${draft.allergenId}`] });
        }
        if (!allergenRow.is_active) throw new ReferentialStateViolation();

        const values = [
          draft.userId,
          draft.allergenId,
          draft.severityLevel ?? null,
          draft.isConfirmed,
          draft.symptomOnsetDate ?? null,
          draft.sourceInfo ?? null,
          JSON.stringify(draft.userReactionDetails),
          JSON.stringify(draft.adminNotes),
          draft.isActive,
        ];

        let id: string;
        if (draft.id === undefined) {
          // Mirror the external identity so the ON DELETE CASCADE from app_users applies.
          await client.query(
            `INSERT INTO app_users (id) VALUES ($1) ON CONFLICT (id) DO NOTHING`,
            [draft.userId],
          );
          const inserted = await client.query<{ id: string }>(
            `INSERT INTO user_allergies
              (user_id, allergen_id, severity_level, is_confirmed, symptom_onset_date,
               source_info, user_reaction_details, admin_notes, is_active)
             VALUES ($1, $2, $3, $4, $5, $6, $7, $8, $9)
             RETURNING id`,
            values,
          );
          id = inserted.rows[0].id;
        } else {
          const updated = await client.query<{ id: string }>(
            `UPDATE user_allergies
             SET user_id = $1, allergen_id = $2, severity_level = $3, is_confirmed = $4,
                 symptom_onset_date = $5, source_info = $6, user_reaction_details = $7,
                 admin_notes = $8, is_active = $9, updated_at = NOW()
             WHERE id = $10
             RETURNING id`,
            [...values, draft.id],
          );
          const row = updated.rows[0];
          if (!row) throw new NotFoundError("userAllergy", draft.id);
          id = row.id;
        }

        const saved = await selectUserAllergy((text, params) => client.query<UserAllergyRow>(text, params), id);
        if (!saved) throw new NotFoundError("userAllergy", id);
        return saved;
      });
    } catch (err) {
      throw mapConstraintError(err);
    }
  }

  async deleteUserAllergiesForUser(userId: UserId): Promise<number> {
    return withTransaction(async (client) => {
      const removed = await client.query(`DELETE FROM user_allergies WHERE user_id = $1`, [userId]);
      await client.query(`DELETE FROM app_users WHERE id = $1`, [userId]);
      return removed.rowCount ?? 0;
    });
  }
}
