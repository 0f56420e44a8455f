import express, { type Express, type Request, type Response, type NextFunction } from "express";
import cors from "cors";
import { z } from "zod";
import type { CatalogIndex } from "./catalog/CatalogIndex";
import { categoryLabel, isCategory, CATEGORIES } from "./domain/Category";
import type { Clock } from "./domain/Clock";
import { NotFoundError, ShapeViolation } from "./errors/AllergyErrors";
import { createAuthMiddleware, requireAdmin, requireAuth, requireSelfOrAdmin } from "./middleware/auth";
import { createErrorHandler } from "./middleware/errorHandler";
import { createRateLimiters } from "./middleware/rateLimiter";
import type { AllergyRepository } from "./repository/AllergyRepository";
import { AllergenService } from "./services/AllergenService";
import { UserAllergyService } from "./services/UserAllergyService";
import { AllergenListQuerySchema, UserAllergyListQuerySchema, zodFieldErrors } from "./validation/schemas";

// HTTP surface over the catalog and user allergy core.
// All writes go through AllergenService / UserAllergyService.

export interface AppDeps {
  readonly repo: AllergyRepository;
  readonly catalog: CatalogIndex;
  readonly clock: Clock;
  readonly jwtSecret: string;
  readonly disableAuth: boolean;
  readonly corsOrigins: readonly string[];
  readonly verboseErrors: boolean;
}

// ---- Async error wrapper ----
function asyncHandler(fn: (req: Request, res: Response) => Promise<void>) {
  return (req: Request, res: Response, next: NextFunction) => {
    fn(req, res).catch(next);
  };
}

function parseQuery<T extends z.ZodTypeAny>(schema: T, input: unknown): z.output<T> {
  const parsed = schema.safeParse(input);
  if (!parsed.success) throw new ShapeViolation(zodFieldErrors(parsed.error));
  return parsed.data;
}

export function createApp(deps: AppDeps): Express {
  const app = express();
  const allergens = new AllergenService(deps.repo, deps.catalog);
  const userAllergies = new UserAllergyService(deps.repo, allergens, deps.clock);
  const limiters = createRateLimiters();

  app.use(cors({
    origin(requestOrigin: string | undefined, callback: (err: Error | null, allow?: boolean | string) => void) {
      // Allow server-to-server / curl / health-pings (no Origin header)
      if (!requestOrigin) return callback(null, true);
      if (deps.corsOrigins.includes(requestOrigin)) {
        return callback(null, requestOrigin);
      }
      console.warn(`[CORS] Blocked request from origin: ${requestOrigin}`);
      callback(new Error(`Origin ${requestOrigin} not allowed by CORS`));
    },
    methods: ["GET", "POST", "PATCH", "DELETE", "OPTIONS"],
    allowedHeaders: ["Content-Type", "Authorization"],
    credentials: true,
  }));

  app.use(express.json({ limit: "100kb" }));

  // ---- Privacy headers (allergy data is health data) ----
  app.use((_req, res, next) => {
    res.setHeader("Cache-Control", "no-store, no-cache, must-revalidate, private");
    next();
  });

  app.use(createAuthMiddleware({ jwtSecret: deps.jwtSecret, disableAuth: deps.disableAuth }));
  app.use(limiters.general);
  app.use(limiters.writes);

  // ===============================
  // GET /api/health
  // ===============================
  app.get("/api/health", (_req, res) => {
    res.json({
      status: "ok",
      timestamp: deps.clock.now().toISOString(),
      catalog: { groups: deps.catalog.groups.length, allergens: deps.catalog.labels.size },
    });
  });

  // ===============================
  // Catalog (public, read-only)
  // ===============================
  app.get("/api/catalog/groups", (_req, res) => {
    res.json({
      groups: deps.catalog.groups.map((g) => ({
        category: g.category,
        categoryLabel: categoryLabel(g.category),
        label: g.label,
        allergens: g.allergens,
      })),
    });
  });

  app.get("/api/catalog/categories", (_req, res) => {
    res.json({
      categories: CATEGORIES.map((c) => ({
        category: c,
        label: categoryLabel(c),
        allergens: deps.catalog.allergensFor(c),
      })),
    });
  });

  app.get("/api/catalog/categories/:category", (req, res) => {
    const { category } = req.params;
    if (!isCategory(category)) {
      res.status(404).json({ error: `Unknown category: ${category}`, code: "NOT_FOUND" });
      return;
    }
    res.json({ category, label: categoryLabel(category), allergens: deps.catalog.allergensFor(category) });
  });

  app.get("/api/catalog/labels", (_req, res) => {
    res.json({ labels: Object.fromEntries(deps.catalog.labels) });
  });

  // ===============================
  // Allergens (catalog rows)
  // ===============================
  app.get("/api/allergens", requireAuth, asyncHandler(async (req, res) => {
    const filter = parseQuery(AllergenListQuerySchema, req.query);
    // Users only ever see active allergens.
    const effective = req.auth?.role === "admin" ? filter : { ...filter, isActive: true };
    const rows = await allergens.list(effective);
    res.json({ allergens: rows, count: rows.length });
  }));

  app.get("/api/allergens/:id", requireAuth, asyncHandler(async (req, res) => {
    const allergen = await allergens.get(req.params.id);
    if (!allergen.isActive && req.auth?.role !== "admin") {
      throw new NotFoundError("allergen", req.params.id);
    }
    res.json(allergen);
  }));

  app.post("/api/allergens", requireAdmin, asyncHandler(async (req, res) => {
    const created = await allergens.create(req.body);
    res.status(201).json(created);
  }));

  app.patch("/api/allergens/:id", requireAdmin, asyncHandler(async (req, res) => {
    const updated = await allergens.update(req.params.id, req.body);
    res.json(updated);
  }));

  app.delete("/api/allergens/:id", requireAdmin, asyncHandler(async (req, res) => {
    await allergens.delete(req.params.id);
    res.status(204).end();
  }));

  // ===============================
  // User allergies (owner or admin)
  // ===============================
  app.get("/api/users/:userId/allergies", requireSelfOrAdmin, asyncHandler(async (req, res) => {
    const rows = await userAllergies.listForUser(req.params.userId);
    const views = await userAllergies.toViews(rows);
    res.json({ userId: req.params.userId, allergies: views, count: views.length });
  }));

  app.post("/api/users/:userId/allergies", requireSelfOrAdmin, asyncHandler(async (req, res) => {
    const created = await userAllergies.create(req.params.userId, req.body);
    const [view] = await userAllergies.toViews([created]);
    res.status(201).json(view);
  }));

  app.patch("/api/users/:userId/allergies/:id", requireSelfOrAdmin, asyncHandler(async (req, res) => {
    const updated = await userAllergies.updateAsUser(req.params.userId, req.params.id, req.body);
    const [view] = await userAllergies.toViews([updated]);
    res.json(view);
  }));

  // ===============================
  // Admin: user allergy review
  // ===============================
  app.get("/api/admin/user-allergies", requireAdmin, asyncHandler(async (req, res) => {
    const filter = parseQuery(UserAllergyListQuerySchema, req.query);
    const rows = await userAllergies.list(filter);
    const views = await userAllergies.toViews(rows);
    res.json({ allergies: views, count: views.length });
  }));

  app.patch("/api/admin/user-allergies/:id", requireAdmin, asyncHandler(async (req, res) => {
    const updated = await userAllergies.updateAsAdmin(req.params.id, req.body);
    const [view] = await userAllergies.toViews([updated]);
    res.json(view);
  }));

  // Called by the identity provider when a user account is deleted.
  app.delete("/api/admin/users/:userId/allergies", requireAdmin, asyncHandler(async (req, res) => {
    const removed = await userAllergies.purgeUser(req.params.userId);
    res.json({ userId: req.params.userId, removed });
  }));

  app.use((req, res) => {
    res.status(404).json({ error: `No route for ${req.method} ${req.path}`, code: "NOT_FOUND" });
  });

  app.use(createErrorHandler({ verbose: deps.verboseErrors }));

  return app;
}
