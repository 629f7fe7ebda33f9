import fs from "node:fs";
import path from "node:path";
import { fileURLToPath } from "node:url";
import { loadAjv, type AjvError, type AjvInstance, type AjvValidateFn } from "./ajv.js";

export type SchemaEntry = {
  name: string;
  filePath: string;
  schema: unknown;
};

export type SchemaCheck = { valid: true } | { valid: false; errors: AjvError[]; text: string };

export const DEFAULT_SCHEMA_DIR = path.resolve(path.dirname(fileURLToPath(import.meta.url)), "../../schemas");

/**
 * Schema registry: discovers *.schema.json files in a directory and
 * compiles validators on demand.
 */
export class SchemaRegistry {
  private entries = new Map<string, SchemaEntry>();
  private validators = new Map<string, AjvValidateFn>();
  private readonly ajv: AjvInstance = loadAjv();

  constructor(private readonly schemaDir: string = DEFAULT_SCHEMA_DIR) {}

  load(): this {
    if (!fs.existsSync(this.schemaDir)) {
      throw new Error(`Schema directory not found: ${this.schemaDir}`);
    }

    const files = fs
      .readdirSync(this.schemaDir)
      .filter((f) => f.endsWith(".schema.json"))
      .sort();

    for (const file of files) {
      const filePath = path.join(this.schemaDir, file);
      const schema: unknown = JSON.parse(fs.readFileSync(filePath, "utf8"));
      // "cdf-meta.schema.json" → "cdf-meta"
      const name = file.replace(/\.schema\.json$/, "");
      this.entries.set(name, { name, filePath, schema });
    }

    return this;
  }

  names(): string[] {
    return [...this.entries.keys()];
  }

  private validator(name: string): AjvValidateFn {
    const cached = this.validators.get(name);
    if (cached) return cached;

    const entry = this.entries.get(name);
    if (!entry) {
      throw new Error(`Schema not found: ${name}`);
    }

    const validate = this.ajv.compile(entry.schema);
    this.validators.set(name, validate);
    return validate;
  }

  check(name: string, data: unknown): SchemaCheck {
    const validate = this.validator(name);
    if (validate(data)) return { valid: true };
    const errors = validate.errors ?? [];
    return { valid: false, errors: [...errors], text: this.ajv.errorsText(errors) };
  }
}

let shared: SchemaRegistry | null = null;

/** Registry over the shipped schemas directory, loaded once per process. */
export function defaultRegistry(): SchemaRegistry {
  if (!shared) shared = new SchemaRegistry().load();
  return shared;
}
