import Ajv2020 from "ajv/dist/2020.js";
import addFormats from "ajv-formats";

export type AjvValidateFn = ((data: unknown) => boolean) & { errors?: unknown };

export type AjvInstance = {
  compile: (schema: unknown) => AjvValidateFn;
  errorsText: (errors: unknown) => string;
};

/** A compiled schema that narrows on success and explains itself on failure. */
export type SchemaGuard<T> = {
  is: (data: unknown) => data is T;
  errors: () => string;
};

let shared: AjvInstance | null = null;

export function loadAjv(): AjvInstance {
  if (shared) return shared;
  const AjvCtor = Ajv2020 as unknown as { new (opts: unknown): AjvInstance };
  const add = addFormats as unknown as (ajv: AjvInstance) => void;

  const ajv = new AjvCtor({ allErrors: true, strict: true });
  add(ajv);

  shared = ajv;
  return ajv;
}

/**
 * Compile `schema` into a type guard. The caller asserts that the schema
 * describes `T`; nothing checks that correspondence.
 */
export function compileGuard<T>(schema: object): SchemaGuard<T> {
  const ajv = loadAjv();
  const validate = ajv.compile(schema);
  return {
    is: (data: unknown): data is T => validate(data),
    errors: () => ajv.errorsText(validate.errors),
  };
}
