import { describe, expect, it } from "vitest";

import path from "node:path";
import { fileURLToPath } from "node:url";

import { validateAll } from "../src/commands/validate.js";

const PKG_DIR = path.resolve(path.dirname(fileURLToPath(import.meta.url)), "..");

describe("trainctl validate", () => {
  it("returns ok for the shipped config", async () => {
    const res = await validateAll({ configDir: "config", cwd: PKG_DIR, environ: {} });
    expect(res.ok).toBe(true);
    if (!res.ok) return;
    expect(res.units).toBe(3);
  });

  it("returns ok for every shipped environment", async () => {
    for (const env of ["dev", "prod"]) {
      const res = await validateAll({ configDir: "config", env, cwd: PKG_DIR, environ: {} });
      expect(res.ok).toBe(true);
    }
  });

  it("reports invalid config as a single diagnostic", async () => {
    const res = await validateAll({
      configDir: "config",
      cwd: PKG_DIR,
      environ: { TRAINCTL_REGISTRATION__MIN_SUCCESS_RATIO: "2" },
    });
    expect(res.ok).toBe(false);
    if (res.ok) return;
    expect(res.errors).toHaveLength(1);
    expect(res.errors[0]?.code).toBe("CONFIG_INVALID");
    expect(res.errors[0]?.message).toContain("min_success_ratio");
  });
});
