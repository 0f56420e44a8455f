import { describe, it, expect, beforeEach, vi, afterEach } from "vitest";
import { Category } from "../../../backend/domain/Category";
import { SeverityLevel } from "../../../backend/domain/SeverityLevel";
import { SourceInfo } from "../../../backend/domain/SourceInfo";
import {
  NotFoundError,
  ReferentialStateViolation,
  ShapeViolation,
  TemporalViolation,
  UniquenessViolation,
} from "../../../backend/errors/AllergyErrors";
import { createTestContext, NOW, TODAY, TOMORROW, USER_A, USER_B, type TestContext } from "../../helpers/fixtures";

describe("AllergenService", () => {
  let ctx: TestContext;

  beforeEach(() => {
    ctx = createTestContext();
  });

  it("creates an allergen and resolves its display name", async () => {
    const allergen = await ctx.allergens.create({ category: "food", allergenKey: "peanut", isActive: true });

    expect(allergen.isActive).toBe(true);
    expect(allergen.record.createdAt).toBe(NOW);
    expect(allergen.displayName()).toBe("Food Allergens: Peanut");
  });

  it("rejects a second allergen with the same category and key", async () => {
    await ctx.allergens.create({ category: "food", allergenKey: "peanut" });

    await expect(ctx.allergens.create({ category: "food", allergenKey: "peanut" }))
      .rejects.toBeInstanceOf(UniquenessViolation);
  });

  it("allows the same key under a different category", async () => {
    await ctx.allergens.create({ category: "food", allergenKey: "soy" });
    const other = await ctx.allergens.create({ category: "other", allergenKey: "soy" });
    expect(other.category).toBe(Category.Other);
  });

  it("rejects an edit that collides with another row", async () => {
    await ctx.allergens.create({ category: "food", allergenKey: "peanut" });
    const soy = await ctx.allergens.create({ category: "food", allergenKey: "soy" });

    await expect(ctx.allergens.update(soy.id, { allergenKey: "peanut" }))
      .rejects.toBeInstanceOf(UniquenessViolation);
  });

  it("rejects unknown patch fields", async () => {
    const soy = await ctx.allergens.create({ category: "food", allergenKey: "soy" });
    await expect(ctx.allergens.update(soy.id, { label: "Soya" })).rejects.toBeInstanceOf(ShapeViolation);
  });

  it("lists with filters in category/key order", async () => {
    await ctx.allergens.create({ category: "food", allergenKey: "soy" });
    await ctx.allergens.create({ category: "contact", allergenKey: "nickel" });
    const peanut = await ctx.allergens.create({ category: "food", allergenKey: "peanut" });
    await ctx.allergens.setActive(peanut.id, false);

    const all = await ctx.allergens.list();
    expect(all.map((a) => a.allergenKey)).toEqual(["nickel", "peanut", "soy"]);

    const activeFood = await ctx.allergens.list({ category: Category.Food, isActive: true });
    expect(activeFood.map((a) => a.allergenKey)).toEqual(["soy"]);

    const searched = await ctx.allergens.list({ search: "NICK" });
    expect(searched.map((a) => a.allergenKey)).toEqual(["nickel"]);
  });

  it("raises NotFoundError for unknown ids", async () => {
    await expect(ctx.allergens.get("missing")).rejects.toBeInstanceOf(NotFoundError);
    await expect(ctx.allergens.delete("missing")).rejects.toBeInstanceOf(NotFoundError);
  });
});

describe("UserAllergyService", () => {
  let ctx: TestContext;

  beforeEach(() => {
    vi.spyOn(console, "log").mockImplementation(() => undefined);
    ctx = createTestContext();
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  it("saves a user allergy against an active allergen", async () => {
    const peanut = await ctx.allergens.create({ category: "food", allergenKey: "peanut", isActive: true });

    const saved = await ctx.userAllergies.create(USER_A, {
      allergenId: peanut.id,
      severityLevel: "severe",
      sourceInfo: "allergy_test",
      userReactionDetails: { symptom: "hives", triggers: ["snack bar"] },
    });

    expect(saved).toMatchObject({
      userId: USER_A,
      allergenId: peanut.id,
      severityLevel: SeverityLevel.Severe,
      sourceInfo: SourceInfo.AllergyTest,
      isConfirmed: false,
      isActive: true,
      adminNotes: {},
      createdAt: NOW,
    });
    expect(peanut.displayName()).toBe("Food Allergens: Peanut");
  });

  it("rejects linking to an inactive allergen", async () => {
    const peanut = await ctx.allergens.create({ category: "food", allergenKey: "peanut", isActive: false });

    await expect(ctx.userAllergies.create(USER_A, { allergenId: peanut.id }))
      .rejects.toBeInstanceOf(ReferentialStateViolation);
    expect(await ctx.userAllergies.listForUser(USER_A)).toEqual([]);
  });

  it("accepts long identity-provider user ids", async () => {
    const peanut = await ctx.allergens.create({ category: "food", allergenKey: "peanut" });
    const longUserId = `auth0|${"a".repeat(120)}`;

    const saved = await ctx.userAllergies.create(longUserId, { allergenId: peanut.id });

    expect(saved.userId).toBe(longUserId);
    expect(await ctx.userAllergies.listForUser(longUserId)).toHaveLength(1);
  });

  it("rejects a future onset date and accepts today", async () => {
    const peanut = await ctx.allergens.create({ category: "food", allergenKey: "peanut" });

    await expect(ctx.userAllergies.create(USER_A, { allergenId: peanut.id, symptomOnsetDate: TOMORROW }))
      .rejects.toBeInstanceOf(TemporalViolation);

    const saved = await ctx.userAllergies.create(USER_A, { allergenId: peanut.id, symptomOnsetDate: TODAY });
    expect(saved.symptomOnsetDate).toBe(TODAY);
  });

  it("rejects a second record for the same user and allergen", async () => {
    const peanut = await ctx.allergens.create({ category: "food", allergenKey: "peanut" });
    await ctx.userAllergies.create(USER_A, { allergenId: peanut.id });

    await expect(ctx.userAllergies.create(USER_A, { allergenId: peanut.id }))
      .rejects.toBeInstanceOf(UniquenessViolation);

    const other = await ctx.userAllergies.create(USER_B, { allergenId: peanut.id });
    expect(other.userId).toBe(USER_B);
  });

  it("fails every re-save once the allergen is deactivated", async () => {
    const peanut = await ctx.allergens.create({ category: "food", allergenKey: "peanut" });
    const saved = await ctx.userAllergies.create(USER_A, { allergenId: peanut.id, severityLevel: "severe" });

    await ctx.allergens.setActive(peanut.id, false);

    await expect(ctx.userAllergies.updateAsAdmin(saved.id, { adminNotes: { verified_by: "dr-test" } }))
      .rejects.toBeInstanceOf(ReferentialStateViolation);
    await expect(ctx.userAllergies.updateAsUser(USER_A, saved.id, { severityLevel: "mild" }))
      .rejects.toBeInstanceOf(ReferentialStateViolation);

    const stored = await ctx.userAllergies.get(saved.id);
    expect(stored.adminNotes).toEqual({});
    expect(stored.severityLevel).toBe(SeverityLevel.Severe);
  });

  it("accepts the save again after reactivation", async () => {
    const peanut = await ctx.allergens.create({ category: "food", allergenKey: "peanut" });
    const saved = await ctx.userAllergies.create(USER_A, { allergenId: peanut.id });
    await ctx.allergens.setActive(peanut.id, false);
    await ctx.allergens.setActive(peanut.id, true);

    const updated = await ctx.userAllergies.updateAsAdmin(saved.id, {
      isConfirmed: true,
      adminNotes: { verified_by: "dr-test", visits: 2 },
    });

    expect(updated.isConfirmed).toBe(true);
    expect(updated.adminNotes).toEqual({ verified_by: "dr-test", visits: 2 });
  });

  it("lets the user switch to a different active allergen", async () => {
    const peanut = await ctx.allergens.create({ category: "food", allergenKey: "peanut" });
    const soy = await ctx.allergens.create({ category: "food", allergenKey: "soy" });
    const saved = await ctx.userAllergies.create(USER_A, { allergenId: peanut.id });
    await ctx.allergens.setActive(peanut.id, false);

    const switched = await ctx.userAllergies.updateAsUser(USER_A, saved.id, { allergenId: soy.id });
    expect(switched.allergenId).toBe(soy.id);
  });

  it("clears optional fields with null and keeps them when omitted", async () => {
    const peanut = await ctx.allergens.create({ category: "food", allergenKey: "peanut" });
    const saved = await ctx.userAllergies.create(USER_A, {
      allergenId: peanut.id,
      severityLevel: "moderate",
      sourceInfo: "self_reported",
    });

    const updated = await ctx.userAllergies.updateAsUser(USER_A, saved.id, { severityLevel: null });

    expect(updated.severityLevel).toBeUndefined();
    expect(updated.sourceInfo).toBe(SourceInfo.SelfReported);
  });

  it("does not let users confirm their own allergies", async () => {
    const peanut = await ctx.allergens.create({ category: "food", allergenKey: "peanut" });
    const saved = await ctx.userAllergies.create(USER_A, { allergenId: peanut.id });

    await expect(ctx.userAllergies.updateAsUser(USER_A, saved.id, { isConfirmed: true }))
      .rejects.toBeInstanceOf(ShapeViolation);
  });

  it("hides another user's record from updateAsUser", async () => {
    const peanut = await ctx.allergens.create({ category: "food", allergenKey: "peanut" });
    const saved = await ctx.userAllergies.create(USER_A, { allergenId: peanut.id });

    await expect(ctx.userAllergies.updateAsUser(USER_B, saved.id, { severityLevel: "mild" }))
      .rejects.toBeInstanceOf(NotFoundError);
  });

  it("reports an unknown allergen id as a shape violation", async () => {
    await expect(ctx.userAllergies.create(USER_A, { allergenId: "missing" }))
      .rejects.toBeInstanceOf(ShapeViolation);
  });

  it("removes user allergies when their allergen is deleted", async () => {
    const peanut = await ctx.allergens.create({ category: "food", allergenKey: "peanut" });
    const soy = await ctx.allergens.create({ category: "food", allergenKey: "soy" });
    await ctx.userAllergies.create(USER_A, { allergenId: peanut.id });
    await ctx.userAllergies.create(USER_A, { allergenId: soy.id });

    await ctx.allergens.delete(peanut.id);

    const remaining = await ctx.userAllergies.listForUser(USER_A);
    expect(remaining.map((r) => r.allergenId)).toEqual([soy.id]);
  });

  it("purges every record of a deleted user", async () => {
    const peanut = await ctx.allergens.create({ category: "food", allergenKey: "peanut" });
    const soy = await ctx.allergens.create({ category: "food", allergenKey: "soy" });
    await ctx.userAllergies.create(USER_A, { allergenId: peanut.id });
    await ctx.userAllergies.create(USER_A, { allergenId: soy.id });
    await ctx.userAllergies.create(USER_B, { allergenId: soy.id });

    expect(await ctx.userAllergies.purgeUser(USER_A)).toBe(2);
    expect(await ctx.userAllergies.listForUser(USER_A)).toEqual([]);
    expect(await ctx.userAllergies.listForUser(USER_B)).toHaveLength(1);
  });

  it("lists by user, then allergen category and key, with admin filters", async () => {
    const soy = await ctx.allergens.create({ category: "food", allergenKey: "soy" });
    const nickel = await ctx.allergens.create({ category: "contact", allergenKey: "nickel" });
    const peanut = await ctx.allergens.create({ category: "food", allergenKey: "peanut" });

    await ctx.userAllergies.create(USER_B, { allergenId: peanut.id, severityLevel: "mild" });
    await ctx.userAllergies.create(USER_A, { allergenId: soy.id, severityLevel: "severe" });
    await ctx.userAllergies.create(USER_A, { allergenId: peanut.id, severityLevel: "severe" });
    await ctx.userAllergies.create(USER_A, { allergenId: nickel.id });

    const all = await ctx.userAllergies.list();
    expect(all.map((r) => [r.userId, r.allergenId])).toEqual([
      [USER_A, nickel.id],
      [USER_A, peanut.id],
      [USER_A, soy.id],
      [USER_B, peanut.id],
    ]);

    const severe = await ctx.userAllergies.list({ severityLevel: SeverityLevel.Severe });
    expect(severe.map((r) => r.allergenId)).toEqual([peanut.id, soy.id]);

    const searched = await ctx.userAllergies.list({ search: "peanut" });
    expect(searched.map((r) => r.userId)).toEqual([USER_A, USER_B]);
  });

  it("builds views with the allergen display name", async () => {
    const peanut = await ctx.allergens.create({ category: "food", allergenKey: "peanut" });
    const saved = await ctx.userAllergies.create(USER_A, { allergenId: peanut.id });

    const [view] = await ctx.userAllergies.toViews([saved]);

    expect(view.displayName).toBe(`${USER_A} - Food Allergens: Peanut`);
    expect(view.allergen.label).toBe("Peanut");
  });
});
