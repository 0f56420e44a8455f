import type { CatalogIndex } from "../catalog/CatalogIndex";
import { Allergen, type AllergenId, type AllergenRecord } from "../domain/Allergen";
import { NotFoundError, ShapeViolation } from "../errors/AllergyErrors";
import type { AllergenFilter, AllergyRepository } from "../repository/AllergyRepository";
import { AllergenPatchSchema, zodFieldErrors } from "../validation/schemas";
import { validateAllergen } from "../validation/validators";

// Catalog administration: create, edit, (de)activate and delete Allergen rows.
// End users never reach the write methods; the routes gate them on the admin role.

export class AllergenService {
  constructor(
    private readonly repo: AllergyRepository,
    private readonly catalog: CatalogIndex,
  ) {}

  wrap(record: AllergenRecord): Allergen {
    return new Allergen(record, this.catalog);
  }

  async list(filter: AllergenFilter = {}): Promise<Allergen[]> {
    const rows = await this.repo.listAllergens(filter);
    return rows.map((r) => this.wrap(r));
  }

  async get(id: AllergenId): Promise<Allergen> {
    const row = await this.repo.getAllergen(id);
    if (!row) throw new NotFoundError("allergen", id);
    return this.wrap(row);
  }

  async create(input: unknown): Promise<Allergen> {
    const validated = validateAllergen(input);
    return this.wrap(await this.repo.saveAllergen(validated));
  }

  async update(id: AllergenId, patch: unknown): Promise<Allergen> {
    const parsed = AllergenPatchSchema.safeParse(patch);
    if (!parsed.success) throw new ShapeViolation(zodFieldErrors(parsed.error));

    const current = await this.repo.getAllergen(id);
    if (!current) throw new NotFoundError("allergen", id);

    const validated = validateAllergen({
      id,
      category: parsed.data.category ?? current.category,
      allergenKey: parsed.data.allergenKey ?? current.allergenKey,
      isActive: parsed.data.isActive ?? current.isActive,
    });
    const saved = await this.repo.saveAllergen(validated);

    if (current.isActive && !saved.isActive) {
      console.log(`[Allergies] Allergen ${saved.category}/${saved.allergenKey} deactivated`);
    }
    return this.wrap(saved);
  }

  async setActive(id: AllergenId, isActive: boolean): Promise<Allergen> {
    return this.update(id, { isActive });
  }

  // Hard delete. Dependent user allergies are removed with it.
  async delete(id: AllergenId): Promise<void> {
    const deleted = await this.repo.deleteAllergen(id);
    if (!deleted) throw new NotFoundError("allergen", id);
    console.log(`[Allergies] Allergen ${id} deleted with its user allergies`);
  }
}
