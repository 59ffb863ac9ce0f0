import fs from "node:fs";
import path from "node:path";
import { fileURLToPath } from "node:url";
import { loadAjv, type AjvInstance } from "./ajv.js";

export const DEFAULT_SCHEMA_DIR = path.resolve(path.dirname(fileURLToPath(import.meta.url)), "../../schemas");

const SCHEMA_SUFFIX = ".schema.json";

export type CheckResult<T> = { valid: true; value: T } | { valid: false; errors: string };

/**
 * JSON Schemas for the documents trainctl reads from disk (the master unit
 * list, approval records), keyed by file name: `units.schema.json` → "units".
 */
export class SchemaRegistry {
  private readonly schemas = new Map<string, object>();

  private constructor(private readonly ajv: AjvInstance) {}

  static async load(schemaDir: string): Promise<SchemaRegistry> {
    if (!fs.existsSync(schemaDir)) {
      throw new Error(`Schema directory not found: ${schemaDir}`);
    }
    const registry = new SchemaRegistry(await loadAjv());
    for (const file of fs.readdirSync(schemaDir)) {
      if (!file.endsWith(SCHEMA_SUFFIX)) continue;
      const parsed: unknown = JSON.parse(fs.readFileSync(path.join(schemaDir, file), "utf8"));
      if (parsed === null || typeof parsed !== "object") {
        throw new Error(`Schema is not an object: ${file}`);
      }
      registry.schemas.set(file.slice(0, -SCHEMA_SUFFIX.length), parsed);
    }
    return registry;
  }

  names(): string[] {
    return [...this.schemas.keys()].sort();
  }

  /** Validate `data` against a named schema. Ajv caches the compiled validator per schema object. */
  async check<T>(name: string, data: unknown): Promise<CheckResult<T>> {
    const schema = this.schemas.get(name);
    if (!schema) throw new Error(`Schema not found: ${name}`);
    const validate = this.ajv.compile<T>(schema);
    if (validate(data)) return { valid: true, value: data };
    return { valid: false, errors: this.ajv.errorsText(validate.errors) };
  }
}

let shared: Promise<SchemaRegistry> | null = null;

/** Load a registry; the default directory is loaded once per process. */
export function createRegistry(schemaDir?: string): Promise<SchemaRegistry> {
  if (schemaDir) return SchemaRegistry.load(schemaDir);
  if (!shared) shared = SchemaRegistry.load(DEFAULT_SCHEMA_DIR);
  return shared;
}
