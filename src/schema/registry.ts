import fs from "node:fs";
import path from "node:path";
import { loadAjv, type AjvOptions, type AjvValidateFn, type AjvInstance } from "./ajv.js";

export type SchemaEntry = {
  name: string;
  filePath: string;
  schema: unknown;
};

export type SchemaValidation<T> = { valid: true; value: T } | { valid: false; errors: string };

/**
 * Schema registry: discovers and loads all JSON Schemas from a directory.
 * Provides compile-on-demand validation functions.
 */
export class SchemaRegistry {
  private entries = new Map<string, SchemaEntry>();
  private ajv: AjvInstance | null = null;

  constructor(
    private readonly schemaDir: string,
    private readonly ajvOptions: AjvOptions = {},
  ) {}

  /** Discover all *.schema.json files in the schema directory. */
  async load(): Promise<void> {
    if (!fs.existsSync(this.schemaDir)) {
      throw new Error(`Schema directory not found: ${this.schemaDir}`);
    }

    const files = fs.readdirSync(this.schemaDir).filter((f) => f.endsWith(".schema.json"));

    for (const file of files) {
      const filePath = path.join(this.schemaDir, file);
      const schema: unknown = JSON.parse(fs.readFileSync(filePath, "utf8"));

      // "config.schema.json" → "config"
      const name = file.replace(/\.schema\.json$/, "");
      this.entries.set(name, { name, filePath, schema });
    }

    this.ajv = await loadAjv(this.ajvOptions);
  }

  /** List all registered schema names. */
  names(): string[] {
    return [...this.entries.keys()].sort();
  }

  /** Compile a validator for the given schema name. Ajv caches compiled schemas itself. */
  async getValidator<T>(name: string): Promise<AjvValidateFn<T>> {
    const entry = this.entries.get(name);
    if (!entry) {
      throw new Error(`Schema not found: ${name}`);
    }

    if (!this.ajv) {
      this.ajv = await loadAjv(this.ajvOptions);
    }

    return this.ajv.compile<T>(entry.schema);
  }

  /** Validate data against a named schema. */
  async validate<T>(name: string, data: unknown): Promise<SchemaValidation<T>> {
    const validate = await this.getValidator<T>(name);
    if (validate(data)) return { valid: true, value: data };

    if (!this.ajv) {
      this.ajv = await loadAjv(this.ajvOptions);
    }
    return { valid: false, errors: this.ajv.errorsText(validate.errors) };
  }
}

export const SCHEMA_DIR = path.resolve(path.dirname(new URL(import.meta.url).pathname), "../../schemas");

/** Create and load a registry from the default schemas directory. */
export async function createRegistry(schemaDir?: string, ajvOptions?: AjvOptions): Promise<SchemaRegistry> {
  const registry = new SchemaRegistry(schemaDir ?? SCHEMA_DIR, ajvOptions);
  await registry.load();
  return registry;
}
