// @vitest-environment jsdom
/**
 * Unit tests for the admin page toggle script
 */

import { describe, it, expect, vi, afterEach } from "vitest";
import { readFileSync } from "fs";
import { join } from "path";

const script = readFileSync(join(process.cwd(), "public", "admin.js"), "utf-8");

describe("admin toggle script", () => {
  afterEach(() => {
    vi.unstubAllGlobals();
    document.body.innerHTML = "";
  });

  it("re-enables the button when a toggle is rejected", async () => {
    document.body.innerHTML =
      '<button type="button" data-cocktail="Zombie">Zombie</button>';
    const fetchMock = vi.fn(async () => ({
      ok: false,
      status: 404,
      json: async () => ({ error: "Cocktail not found" }),
    }));
    const alertMock = vi.fn();
    vi.stubGlobal("fetch", fetchMock);
    vi.stubGlobal("alert", alertMock);
    new Function(script)();

    const button = document.querySelector<HTMLButtonElement>("button[data-cocktail]");
    if (!button) {
      throw new Error("button not rendered");
    }
    button.click();
    expect(button.disabled).toBe(true);

    await vi.waitFor(() => {
      expect(alertMock).toHaveBeenCalledWith("Cocktail not found");
    });
    expect(button.disabled).toBe(false);
    expect(fetchMock).toHaveBeenCalledWith("/api/toggle-cocktail", {
      method: "POST",
      headers: { "Content-Type": "application/json" },
      body: JSON.stringify({ name: "Zombie" }),
    });
  });
});
