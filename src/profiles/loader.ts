/**
 * Profile registry loaders.
 *
 * The built-in registry covers PDF/VT-1 and PDF/VT-3. Deployments can add
 * variants through a JSON file (an array of profiles with the same shape
 * as the built-ins), appended after the built-in profiles.
 */

import { readFileSync } from "node:fs";
import { BUILTIN_PROFILES } from "./defaults.js";
import { ProfileRegistry } from "./registry.js";
import { ProfileValidationError } from "./validation.js";

/**
 * Parse raw profile input (JSON text or an already-parsed value).
 *
 * @throws ProfileValidationError on malformed JSON or invalid profiles
 */
export function parseProfiles(input: unknown): unknown[] {
  let data: unknown = input;
  if (typeof input === "string") {
    try {
      data = JSON.parse(input);
    } catch (err) {
      const reason = err instanceof Error ? err.message : String(err);
      throw new ProfileValidationError("Version profiles are not valid JSON", [
        { path: "(root)", message: reason, code: "invalid_json" },
      ]);
    }
  }

  if (!Array.isArray(data)) {
    throw new ProfileValidationError("Version profiles must be an array", [
      { path: "(root)", message: "Expected an array of profiles", code: "invalid_type" },
    ]);
  }
  return data;
}

/**
 * Build a registry from raw profile input only (no built-ins).
 */
export function loadProfiles(input: unknown): ProfileRegistry {
  return ProfileRegistry.create(parseProfiles(input));
}

/**
 * Read extra profiles from a JSON file.
 */
export function loadProfilesFromFile(filePath: string): unknown[] {
  return parseProfiles(readFileSync(filePath, "utf-8"));
}

/**
 * Built-in registry, optionally extended with the profiles in `extraProfilesFile`.
 */
export function createDefaultRegistry(extraProfilesFile?: string): ProfileRegistry {
  const extra = extraProfilesFile ? loadProfilesFromFile(extraProfilesFile) : [];
  return ProfileRegistry.create([...BUILTIN_PROFILES, ...extra]);
}
