/**
 * Profile validation.
 *
 * Schema validation runs per profile; cross-profile constraints (unique
 * ids, unique markers) run over the whole set. Validated profiles are
 * deep-frozen so the registry can hand them out by reference.
 */

import type { ZodIssue } from "zod";
import { VersionProfileSchema, type VersionProfile } from "./schema.js";

/**
 * Individual validation issue.
 */
export interface ProfileIssue {
  /** Dotted path to the invalid field, prefixed with the profile index */
  path: string;
  message: string;
  code: string;
}

export class ProfileValidationError extends Error {
  public readonly issues: ProfileIssue[];

  constructor(message: string, issues: ProfileIssue[]) {
    super(message);
    this.name = "ProfileValidationError";
    this.issues = issues;
  }

  format(): string {
    const lines = ["Version profile validation failed:"];
    for (const issue of this.issues) {
      lines.push(`  - ${issue.path}: ${issue.message}`);
    }
    return lines.join("\n");
  }
}

function formatZodIssues(index: number, zodIssues: ZodIssue[]): ProfileIssue[] {
  return zodIssues.map((issue) => ({
    path: [`[${index}]`, ...issue.path.map(String)].join("."),
    message: issue.message,
    code: issue.code,
  }));
}

function deepFreeze<T extends object>(obj: T): Readonly<T> {
  for (const name of Reflect.ownKeys(obj)) {
    const value: unknown = Reflect.get(obj, name);
    if (value && typeof value === "object" && !Object.isFrozen(value)) {
      deepFreeze(value);
    }
  }
  return Object.freeze(obj);
}

function findDuplicates(
  profiles: VersionProfile[],
  field: "id" | "marker"
): ProfileIssue[] {
  const seen = new Map<string, number>();
  const issues: ProfileIssue[] = [];

  profiles.forEach((profile, index) => {
    const value = profile[field];
    const first = seen.get(value);
    if (first === undefined) {
      seen.set(value, index);
      return;
    }
    issues.push({
      path: `[${index}].${field}`,
      message: `Duplicate ${field} "${value}" (already used by profile [${first}])`,
      code: "duplicate",
    });
  });

  return issues;
}

/**
 * Validate a list of raw profiles.
 *
 * @returns Frozen, validated profiles in input order
 * @throws ProfileValidationError listing every issue found
 */
export function validateProfiles(input: unknown): readonly Readonly<VersionProfile>[] {
  if (!Array.isArray(input)) {
    throw new ProfileValidationError("Version profiles must be an array", [
      { path: "(root)", message: "Expected an array of profiles", code: "invalid_type" },
    ]);
  }

  const profiles: VersionProfile[] = [];
  const issues: ProfileIssue[] = [];

  input.forEach((raw: unknown, index) => {
    const result = VersionProfileSchema.safeParse(raw);
    if (result.success) {
      profiles.push(structuredClone(result.data));
    } else {
      issues.push(...formatZodIssues(index, result.error.issues));
    }
  });

  if (issues.length === 0) {
    issues.push(...findDuplicates(profiles, "id"), ...findDuplicates(profiles, "marker"));
  }

  if (issues.length > 0) {
    throw new ProfileValidationError(
      `Version profile validation failed: ${issues.length} error(s)`,
      issues
    );
  }

  return Object.freeze(profiles.map((profile) => deepFreeze(profile)));
}
