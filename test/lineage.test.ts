import { afterEach, beforeEach, describe, expect, it } from "vitest";
import fs from "node:fs";
import os from "node:os";
import path from "node:path";
import YAML from "yaml";
import { canonicalJson, lineageHash, LINEAGE_HASH_LENGTH } from "../src/lineage/canonical.js";
import { materializeUnit, materializeUnits, resolveArtifactName, resolveUnitId } from "../src/lineage/materializer.js";
import { loadMasterList, writeUnitFiles } from "../src/lineage/units-file.js";
import { PipelineError } from "../src/core/errors.js";

describe("canonicalJson", () => {
  it("sorts keys at every depth and keeps array order", () => {
    expect(canonicalJson({ b: 1, a: { d: [1, "x"], c: null } })).toBe('{"a":{"c":null,"d":[1,"x"]},"b":1}');
  });

  it("drops undefined members", () => {
    expect(canonicalJson({ a: 1, b: undefined })).toBe('{"a":1}');
  });

  it("rejects values without a stable serialization", () => {
    expect(() => canonicalJson({ a: Number.NaN })).toThrow("Non-finite number at $.a");
    expect(() => canonicalJson({ a: [1, undefined] })).toThrow("Undefined array element at $.a[1]");
    expect(() => canonicalJson({ when: new Date(0) })).toThrow("Unsupported object at $.when");
  });
});

describe("lineageHash", () => {
  it("is the first 12 hex chars of sha256 over canonical JSON", () => {
    expect(LINEAGE_HASH_LENGTH).toBe(12);
    expect(lineageHash({ a: 1 })).toBe("015abd7f5cc5");
    expect(lineageHash({ b: 1, a: { d: [1, "x"], c: null } })).toBe("e65ea8c5afbf");
  });

  it("does not depend on key order", () => {
    const one = { trainer: "gbm", features: { lags: [1, 2], window: 24 }, lr: 0.05 };
    const two = { lr: 0.05, features: { window: 24, lags: [1, 2] }, trainer: "gbm" };
    expect(lineageHash(one)).toBe(lineageHash(two));
  });

  it("ignores top-level metadata but not nested keys of the same name", () => {
    expect(lineageHash({ a: 1, metadata: { generated_at: "2026-01-01" }, generated_at: "x" })).toBe(lineageHash({ a: 1 }));
    expect(lineageHash({ a: { metadata: 1 } })).not.toBe(lineageHash({ a: {} }));
  });

  it("changes when any parameter value changes", () => {
    expect(lineageHash({ a: 1, b: [1, 2] })).not.toBe(lineageHash({ a: 1, b: [2, 1] }));
    expect(lineageHash({ a: 1 })).not.toBe(lineageHash({ a: "1" }));
  });

  it("produces no collisions across 500 distinct configurations", () => {
    const hashes = new Set<string>();
    for (let i = 0; i < 500; i++) {
      hashes.add(lineageHash({ unit_id: `U${i % 50}`, window_hours: 24 + (i % 10), seed: i }));
    }
    expect(hashes.size).toBe(500);
  });
});

describe("materializeUnits", () => {
  it("derives ids and artifact names", () => {
    expect(resolveUnitId({ unit_id: "A1" })).toBe("A1");
    expect(resolveUnitId({ plant_id: "P1", circuit_id: "C2" })).toBe("P1_C2");
    expect(resolveUnitId({ plant_id: "P1" })).toBeNull();
    expect(resolveArtifactName({ artifact_name: "explicit" }, "P1_C2")).toBe("explicit");
    expect(resolveArtifactName({ model_name: "legacy" }, "P1_C2")).toBe("legacy");
    expect(resolveArtifactName({}, "P1_C2")).toBe("p1-c2");
  });

  it("merges defaults under every unit before hashing", () => {
    const base = {
      defaults: { lr: 0.1, features: { window: 24 } },
      units: [{ unit_id: "A" }, { unit_id: "B", lr: 0.2 }],
    };
    const [a, b] = materializeUnits(base);
    expect(a?.parameters).toEqual({ unit_id: "A", lr: 0.1, features: { window: 24 } });
    expect(b?.parameters.lr).toBe(0.2);

    const changed = materializeUnits({ ...base, defaults: { ...base.defaults, lr: 0.3 } });
    expect(changed[0]?.lineage_hash).not.toBe(a?.lineage_hash);
    expect(changed[1]?.lineage_hash).toBe(b?.lineage_hash);
  });

  it("reports every problem at once", () => {
    let caught: unknown;
    try {
      materializeUnits({ units: [{ unit_id: "A" }, { unit_id: "A" }, { plant_id: "P" }, { unit_id: "bad id" }] });
    } catch (e) {
      caught = e;
    }
    expect(caught).toBeInstanceOf(PipelineError);
    expect(caught).toMatchObject({
      code: "UNITS_INVALID",
      detail: {
        problems: [
          "units[1]: duplicate unit id 'A'",
          "units[2]: missing unit_id (or plant_id + circuit_id)",
          "units[3]: invalid unit id 'bad id'",
        ],
      },
    });
  });

  it("rejects names that cannot become file names", () => {
    expect(() => materializeUnits({ units: [{ unit_id: "a..b" }] })).toThrow(
      "Invalid master unit list: units[0]: invalid unit id 'a..b'",
    );
    expect(() => materializeUnits({ units: [{ unit_id: "A", artifact_name: "m..1" }] })).toThrow(
      "Invalid master unit list: units[0]: invalid artifact name 'm..1'",
    );
    expect(materializeUnits({ units: [{ unit_id: "v1.2", artifact_name: "model.v1" }] })[0]?.artifact_name).toBe(
      "model.v1",
    );
  });

  it("requires distinct artifact names", () => {
    expect(() =>
      materializeUnits({
        units: [{ unit_id: "P1_C1" }, { unit_id: "P2", artifact_name: "p2-model" }, { unit_id: "P3", model_name: "shared" }],
      }),
    ).not.toThrow();
    expect(() =>
      materializeUnits({
        units: [{ unit_id: "P1_C1" }, { unit_id: "P1-C1" }],
      }),
    ).toThrow("Invalid master unit list: units[1]: duplicate artifact name 'p1-c1' (also used by 'P1_C1')");
  });
});

describe("unit files", () => {
  let tmpDir: string;

  beforeEach(() => {
    tmpDir = fs.mkdtempSync(path.join(os.tmpdir(), "trainctl-lineage-"));
  });

  afterEach(() => {
    fs.rmSync(tmpDir, { recursive: true, force: true });
  });

  it("writes files whose metadata does not move their hash", () => {
    const units = materializeUnits({ defaults: { lr: 0.1 }, units: [{ plant_id: "P1", circuit_id: "C1" }] });
    const [written] = writeUnitFiles(units, tmpDir, "2026-03-01T00:00:00.000Z");
    expect(written).toBe(path.join(tmpDir, "P1_C1.yaml"));

    const doc: Record<string, unknown> = YAML.parse(fs.readFileSync(path.join(tmpDir, "P1_C1.yaml"), "utf8"));
    expect(doc.metadata).toEqual({ lineage_hash: units[0]?.lineage_hash, generated_at: "2026-03-01T00:00:00.000Z" });
    expect(materializeUnit(doc).lineage_hash).toBe(units[0]?.lineage_hash);
  });

  it("loads and schema-checks the master list", async () => {
    const file = path.join(tmpDir, "units.yaml");
    fs.writeFileSync(file, "defaults:\n  lr: 0.1\nunits:\n  - unit_id: A\n  - plant_id: P\n    circuit_id: C\n");
    const master = await loadMasterList(file);
    expect(materializeUnits(master).map((u) => u.unit_id)).toEqual(["A", "P_C"]);

    fs.writeFileSync(file, "units: []\n");
    await expect(loadMasterList(file)).rejects.toMatchObject({ code: "UNITS_INVALID" });

    await expect(loadMasterList(path.join(tmpDir, "missing.yaml"))).rejects.toThrow("Units file not found");
  });
});
