import type { FastifyInstance } from "fastify";
import type { Queryable } from "./ledger/ledger.pg";
import type { TemplateLoader } from "./templates/template-store";

export type HealthDependencies = {
  db?: Queryable;
  templates?: TemplateLoader;
};

export async function registerHealthRoutes(app: FastifyInstance, deps: HealthDependencies = {}): Promise<void> {
  app.get("/health", async () => ({ status: "ok" }));

  app.get("/ready", async () => {
    if (deps.db) {
      await deps.db.query("SELECT 1");
    }
    const templates = deps.templates ? deps.templates.load().names() : [];
    return { status: "ready", templates };
  });
}
