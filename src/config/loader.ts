// ─── Decode Options Loader ──────────────────────────────────────────────────
//
// Reads decode options from a JSON file and validates them with Zod.
// ─────────────────────────────────────────────────────────────────────────────

import { existsSync, readFileSync } from "node:fs";
import { basename } from "node:path";
import { DecodeOptionsSchema, type ResolvedDecodeOptions } from "./schema.js";

/**
 * Load and validate options from a JSON file.
 * Missing keys take their defaults.
 */
export function loadDecodeOptions(filePath: string): ResolvedDecodeOptions {
  if (!existsSync(filePath)) {
    throw new Error(`Config not found: ${filePath}`);
  }

  const raw: unknown = JSON.parse(readFileSync(filePath, "utf8"));
  const result = DecodeOptionsSchema.safeParse(raw);

  if (!result.success) {
    const issues = result.error.issues
      .map(i => `  ${i.path.join(".") || "root"}: ${i.message}`)
      .join("\n");
    throw new Error(`Invalid config ${basename(filePath)}:\n${issues}`);
  }

  return result.data;
}
