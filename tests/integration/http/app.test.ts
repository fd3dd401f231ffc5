/**
 * Integration tests for the HTTP application
 *
 * Starts the express app on an ephemeral localhost port with a temp
 * catalog file and a temp state database.
 */

import { describe, it, expect, beforeAll, afterAll, beforeEach, afterEach } from "vitest";
import type { Server } from "http";
import { mkdtempSync, rmSync, writeFileSync } from "fs";
import { join } from "path";
import { tmpdir } from "os";
import { createApp } from "@/server/app";
import { boundPort, close, listen } from "@/server/server";
import * as logger from "@/logger";
import { probeHealth } from "@/healthcheck";
import { createTestDb, type TestDbHarness } from "../../helpers/testDb";
import {
  createRecordingLogger,
  createTestCatalog,
  createTestConfig,
} from "../../helpers/fixtures";

const CATALOG_YAML = `cocktails:
  - name: Mojito
    ingredients:
      - { name: White rum, qty: 50, unit: ml }
`;

describe("HTTP application", () => {
  let server: Server;
  let baseUrl: string;
  let workDir: string;
  let catalogPath: string;
  let harness: TestDbHarness;

  beforeAll(async () => {
    logger.setLevel("error");
    workDir = mkdtempSync(join(tmpdir(), "cocktail-menu-http-"));
    catalogPath = join(workDir, "cocktails.yaml");
    writeFileSync(catalogPath, CATALOG_YAML);

    const config = createTestConfig({ catalogPath, dataDir: workDir });
    const log = createRecordingLogger();
    const app = createApp({ config, catalog: createTestCatalog(), log });
    server = await listen(app, config, log);
    baseUrl = `http://127.0.0.1:${boundPort(server)}`;
  });

  afterAll(async () => {
    await close(server);
    rmSync(workDir, { recursive: true, force: true });
  });

  beforeEach(() => {
    harness = createTestDb();
  });

  afterEach(() => {
    harness.cleanup();
  });

  async function login(): Promise<string> {
    const res = await fetch(`${baseUrl}/login`, {
      method: "POST",
      body: new URLSearchParams({ password: "test-password" }),
      redirect: "manual",
    });
    const setCookie = res.headers.get("set-cookie") ?? "";
    return setCookie.split(";")[0];
  }

  function postJson(path: string, body: string, cookie?: string): Promise<Response> {
    const headers: Record<string, string> = { "Content-Type": "application/json" };
    if (cookie) {
      headers.Cookie = cookie;
    }
    return fetch(`${baseUrl}${path}`, { method: "POST", headers, body });
  }

  describe("health", () => {
    it("reports healthy on /health and /healthz", async () => {
      for (const path of ["/health", "/healthz"]) {
        const res = await fetch(`${baseUrl}${path}`);
        expect(res.status).toBe(200);
        expect(await res.json()).toEqual({ status: "healthy", service: "cocktail-menu" });
      }
    });

    it("reports unhealthy when the catalog file is gone", async () => {
      rmSync(catalogPath);
      try {
        const res = await fetch(`${baseUrl}/health`);
        expect(res.status).toBe(503);
        expect(await res.json()).toEqual({
          status: "unhealthy",
          error: "cocktails.yaml not found",
        });
      } finally {
        writeFileSync(catalogPath, CATALOG_YAML);
      }
    });

    it("passes the container health check", async () => {
      const result = await probeHealth(`${baseUrl}/health`, 3000);
      expect(result.ok).toBe(true);
    });

    it("fails the container health check on 503", async () => {
      rmSync(catalogPath);
      try {
        const result = await probeHealth(`${baseUrl}/health`, 3000);
        expect(result).toMatchObject({ ok: false, error: "HTTP 503" });
      } finally {
        writeFileSync(catalogPath, CATALOG_YAML);
      }
    });
  });

  describe("pages", () => {
    it("renders the public menu", async () => {
      const res = await fetch(`${baseUrl}/`);
      expect(res.status).toBe(200);
      expect(res.headers.get("content-type")).toBe("text/html; charset=utf-8");
      const html = await res.text();
      expect(html).toContain("<h1>Cocktail Menu</h1>");
      expect(html).toContain("<h3>Virgin Fizz</h3>");
    });

    it("serves static assets", async () => {
      const res = await fetch(`${baseUrl}/static/styles.css`);
      expect(res.status).toBe(200);
    });

    it("redirects anonymous admin visits to the login form", async () => {
      const res = await fetch(`${baseUrl}/admin`, { redirect: "manual" });
      expect(res.status).toBe(302);
      expect(res.headers.get("location")).toBe("/login");
    });

    it("rejects a wrong password", async () => {
      const res = await fetch(`${baseUrl}/login`, {
        method: "POST",
        body: new URLSearchParams({ password: "wrong" }),
        redirect: "manual",
      });
      expect(res.status).toBe(401);
      expect(res.headers.get("set-cookie")).toBeNull();
      expect(await res.text()).toContain('<p class="error" role="alert">Incorrect password</p>');
    });

    it("logs in, opens the admin page and logs out", async () => {
      const res = await fetch(`${baseUrl}/login`, {
        method: "POST",
        body: new URLSearchParams({ password: "test-password" }),
        redirect: "manual",
      });
      expect(res.status).toBe(302);
      expect(res.headers.get("location")).toBe("/admin");
      const setCookie = res.headers.get("set-cookie") ?? "";
      expect(setCookie).toMatch(/^cocktail_session=[\w-]+\.[\w-]+; Max-Age=3600; Path=\//);
      expect(setCookie).toContain("HttpOnly");
      expect(setCookie).toContain("SameSite=Lax");

      const admin = await fetch(`${baseUrl}/admin`, {
        headers: { Cookie: setCookie.split(";")[0] },
      });
      expect(admin.status).toBe(200);
      expect(await admin.text()).toContain("<h1>Manage cocktails</h1>");

      const logout = await fetch(`${baseUrl}/logout`, { redirect: "manual" });
      expect(logout.status).toBe(302);
      expect(logout.headers.get("location")).toBe("/");
      expect(logout.headers.get("set-cookie")).toMatch(/^cocktail_session=; Path=\/; Expires=/);
    });

    it("ignores a forged session cookie", async () => {
      const res = await fetch(`${baseUrl}/admin`, {
        headers: { Cookie: "cocktail_session=eyJzdWIiOiJhZG1pbiJ9.forged" },
        redirect: "manual",
      });
      expect(res.status).toBe(302);
    });
  });

  describe("API", () => {
    it("returns the enabled state of every cocktail", async () => {
      const res = await fetch(`${baseUrl}/api/state`);
      expect(res.status).toBe(200);
      expect(await res.json()).toEqual({
        Mojito: true,
        Daiquiri: true,
        "Gin Tonic": true,
        "Virgin Fizz": true,
      });
    });

    it("requires a session for toggles", async () => {
      for (const path of ["/api/toggle-ingredient", "/api/toggle-cocktail"]) {
        const res = await postJson(path, JSON.stringify({ name: "Mint" }));
        expect(res.status).toBe(401);
        expect(await res.json()).toEqual({ error: "Authentication required" });
      }
    });

    it("toggles an ingredient and updates the state", async () => {
      const cookie = await login();

      const res = await postJson("/api/toggle-ingredient", JSON.stringify({ name: "Mint" }), cookie);
      expect(res.status).toBe(200);
      expect(await res.json()).toEqual({ success: true, available: false });

      const state = await (await fetch(`${baseUrl}/api/state`)).json();
      expect(state).toEqual({
        Mojito: false,
        Daiquiri: true,
        "Gin Tonic": true,
        "Virgin Fizz": true,
      });
    });

    it("validates the ingredient name", async () => {
      const cookie = await login();

      for (const body of ["{}", JSON.stringify({ name: "   " }), JSON.stringify({ name: 7 })]) {
        const res = await postJson("/api/toggle-ingredient", body, cookie);
        expect(res.status).toBe(400);
        expect(await res.json()).toEqual({ error: "Ingredient name is required" });
      }
    });

    it("overrides a cocktail", async () => {
      const cookie = await login();

      const res = await postJson("/api/toggle-cocktail", JSON.stringify({ name: "Gin Tonic" }), cookie);
      expect(res.status).toBe(200);
      expect(await res.json()).toEqual({ success: true, enabled: false, is_override: true });
    });

    it("rejects unknown or missing cocktail names", async () => {
      const cookie = await login();

      const missing = await postJson("/api/toggle-cocktail", "{}", cookie);
      expect(missing.status).toBe(400);
      expect(await missing.json()).toEqual({ error: "Cocktail name is required" });

      const unknown = await postJson("/api/toggle-cocktail", JSON.stringify({ name: "Zombie" }), cookie);
      expect(unknown.status).toBe(404);
      expect(await unknown.json()).toEqual({ error: "Cocktail not found" });
    });

    it("rejects malformed JSON", async () => {
      const cookie = await login();

      const res = await postJson("/api/toggle-ingredient", "{not json", cookie);
      expect(res.status).toBe(400);
      expect(await res.json()).toEqual({ error: "Invalid JSON body" });
    });

    it("answers 404 for unknown routes", async () => {
      const res = await fetch(`${baseUrl}/api/nope`);
      expect(res.status).toBe(404);
      expect(await res.json()).toEqual({ error: "Not found" });
    });
  });
});
