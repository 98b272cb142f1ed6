import { readFile } from "node:fs/promises";
import { DEFAULTS, atomicWriteJson, configPath, type AppConfig } from "@inboxcast/shared";

export interface ValidationResult {
  valid: boolean;
  errors: string[];
}

const NULLABLE_STRING_FIELDS = ["default_route_tag", "tts_model", "tts_voice"] as const;

export const DEFAULT_CONFIG: AppConfig = {
  output_dir: DEFAULTS.outputDir,
  default_route_tag: null,
  tts_model: null,
  tts_voice: null,
};

/**
 * Validate a config.json object. Every field is optional; present fields
 * must have the right type.
 */
export function validateConfig(data: unknown): ValidationResult {
  const errors: string[] = [];

  if (!data || typeof data !== "object" || Array.isArray(data)) {
    return { valid: false, errors: ["Config must be a JSON object"] };
  }

  const fields = new Map<string, unknown>(Object.entries(data));

  const outputDir = fields.get("output_dir");
  if (outputDir !== undefined && (typeof outputDir !== "string" || outputDir === "")) {
    errors.push("output_dir must be a non-empty string");
  }

  for (const key of NULLABLE_STRING_FIELDS) {
    const value = fields.get(key);
    if (value !== undefined && value !== null && typeof value !== "string") {
      errors.push(`${key} must be a string or null`);
    }
  }

  return { valid: errors.length === 0, errors };
}

/**
 * Config from a parsed config.json object, missing fields taken from the
 * defaults. Returns null when the object doesn't validate.
 */
export function parseConfig(data: unknown): AppConfig | null {
  if (!validateConfig(data).valid || !data || typeof data !== "object") return null;

  const fields = new Map<string, unknown>(Object.entries(data));
  return {
    output_dir: stringField(fields, "output_dir") ?? DEFAULT_CONFIG.output_dir,
    default_route_tag: stringField(fields, "default_route_tag"),
    tts_model: stringField(fields, "tts_model"),
    tts_voice: stringField(fields, "tts_voice"),
  };
}

/**
 * Load <base>/config.json, or create a default one when it doesn't exist.
 * An unreadable or invalid file is an error.
 */
export async function loadConfig(base?: string): Promise<AppConfig> {
  const path = configPath(base);

  let raw: string;
  try {
    raw = await readFile(path, "utf-8");
  } catch (err) {
    if (isNotFound(err)) {
      await atomicWriteJson(path, DEFAULT_CONFIG);
      return { ...DEFAULT_CONFIG };
    }
    throw err;
  }

  const data: unknown = JSON.parse(raw);
  const config = parseConfig(data);
  if (!config) {
    throw new Error(`Invalid config ${path}: ${validateConfig(data).errors.join("; ")}`);
  }
  return config;
}

function stringField(fields: Map<string, unknown>, key: string): string | null {
  const value = fields.get(key);
  return typeof value === "string" ? value : null;
}

function isNotFound(err: unknown): boolean {
  return err instanceof Error && "code" in err && err.code === "ENOENT";
}
