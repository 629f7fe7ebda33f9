import Ajv2020 from "ajv/dist/2020.js";
import addFormats from "ajv-formats";

export type AjvError = {
  keyword: string;
  instancePath: string;
  params: Record<string, unknown>;
  message?: string;
};

export type AjvValidateFn = ((data: unknown) => boolean) & { errors?: AjvError[] | null };

export type AjvInstance = {
  compile: (schema: unknown) => AjvValidateFn;
  errorsText: (errors: AjvError[] | null | undefined) => string;
};

/** Ajv for draft 2020-12. allErrors so every missing field is reported, not just the first. */
export function loadAjv(): AjvInstance {
  const AjvCtor = Ajv2020 as unknown as { new (opts: unknown): AjvInstance };
  const add = addFormats as unknown as (ajv: AjvInstance, formats: string[]) => void;

  const ajv = new AjvCtor({ allErrors: true, strict: true });
  add(ajv, ["uri", "date-time"]);

  return ajv;
}
