import fs from "node:fs";
import path from "node:path";
import YAML from "yaml";
import { PipelineError } from "../core/errors.js";
import { createRegistry, type SchemaRegistry } from "../schema/registry.js";
import type { UnitConfig } from "../types/unit.js";
import type { MasterList } from "./materializer.js";

/** Load and schema-check the master unit parameter list. */
export async function loadMasterList(filePath: string, registry?: SchemaRegistry): Promise<MasterList> {
  if (!fs.existsSync(filePath)) {
    throw new PipelineError("UNITS_INVALID", `Units file not found: ${filePath}`);
  }

  let data: unknown;
  try {
    data = YAML.parse(fs.readFileSync(filePath, "utf8"));
  } catch (e) {
    throw new PipelineError("UNITS_INVALID", `Units file is not valid YAML: ${filePath}: ${String(e)}`);
  }

  const schemas = registry ?? (await createRegistry());
  const res = await schemas.check<MasterList>("units", data);
  if (!res.valid) {
    throw new PipelineError("UNITS_INVALID", `Units file failed schema validation: ${res.errors}`);
  }
  return res.value;
}

/**
 * Write one YAML file per unit with a metadata block. The metadata carries
 * the fingerprint but is excluded from it, so re-hashing the file agrees.
 */
export function writeUnitFiles(units: UnitConfig[], outDir: string, generatedAt: string): string[] {
  fs.mkdirSync(outDir, { recursive: true });
  const written: string[] = [];

  for (const unit of units) {
    const doc = {
      ...unit.parameters,
      metadata: {
        lineage_hash: unit.lineage_hash,
        generated_at: generatedAt,
      },
    };
    const filePath = path.join(outDir, `${unit.unit_id}.yaml`);
    fs.writeFileSync(filePath, YAML.stringify(doc), "utf8");
    written.push(filePath);
  }

  return written;
}
