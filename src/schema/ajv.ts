import Ajv2020 from "ajv/dist/2020.js";
import addFormats from "ajv-formats";

export type AjvValidateFn<T = unknown> = ((data: unknown) => data is T) & { errors?: unknown };

export type AjvInstance = {
  compile: <T = unknown>(schema: object) => AjvValidateFn<T>;
  errorsText: (errors: unknown) => string;
};

export type AjvOptions = {
  /** Coerce scalar strings (environment overrides) to the schema's types. */
  coerceTypes?: boolean;
  /** Fill in `default` values declared by the schema. */
  useDefaults?: boolean;
};

export async function loadAjv(opts: AjvOptions = {}): Promise<AjvInstance> {
  const AjvCtor = Ajv2020 as unknown as { new (opts: unknown): AjvInstance };
  const add = addFormats as unknown as (ajv: AjvInstance) => void;

  const ajv = new AjvCtor({
    allErrors: true,
    strict: true,
    allowUnionTypes: true,
    coerceTypes: opts.coerceTypes ?? false,
    useDefaults: opts.useDefaults ?? false,
  });
  add(ajv);

  return ajv;
}
