import Fastify from "fastify";
import request from "supertest";
import { afterAll, beforeAll, expect, test } from "vitest";
import { registerHealthRoutes } from "../src/health";
import { createTemplateLoader } from "../src/templates/template-store";
import { ScriptedQueryable, TEMPLATES_DIR } from "./fakes";

const app = Fastify();
const db = new ScriptedQueryable();

beforeAll(async () => {
  await registerHealthRoutes(app, { db, templates: createTemplateLoader({ root: TEMPLATES_DIR }) });
  await app.ready();
});

afterAll(async () => {
  await app.close();
});

test("GET /health", async () => {
  const response = await request(app.server).get("/health");
  expect(response.status).toBe(200);
  expect(response.body).toEqual({ status: "ok" });
});

test("GET /ready checks the database and templates", async () => {
  const response = await request(app.server).get("/ready");
  expect(response.status).toBe(200);
  expect(response.body).toEqual({ status: "ready", templates: ["book", "film", "gift"] });
  expect(db.statements.map((statement) => statement.text)).toEqual(["SELECT 1"]);
});
