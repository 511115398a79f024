/**
 * Immutable registry of supported PDF/VT variants.
 *
 * Built once at startup and passed by reference to the metadata writer
 * and the compliance checker. Adding a variant means adding a profile;
 * detection and validation only ever go through this registry.
 */

import type { VersionProfile, VariantId } from "./schema.js";
import { validateProfiles } from "./validation.js";

/**
 * @example
 *   const registry = ProfileRegistry.create(BUILTIN_PROFILES);
 *
 *   registry.getByMarker("PDF/VT-3")?.id;   // "VT3"
 *   registry.resolveVariant("vt1")?.marker; // "PDF/VT-1"
 */
export class ProfileRegistry {
  private readonly _profiles: ReadonlyArray<Readonly<VersionProfile>>;
  private readonly _byMarker: ReadonlyMap<string, Readonly<VersionProfile>>;
  private readonly _byId: ReadonlyMap<VariantId, Readonly<VersionProfile>>;
  private readonly _detectionOrder: ReadonlyArray<Readonly<VersionProfile>>;

  private constructor(profiles: ReadonlyArray<Readonly<VersionProfile>>) {
    this._profiles = profiles;
    this._byMarker = new Map(profiles.map((p) => [p.marker, p]));
    this._byId = new Map(profiles.map((p) => [p.id, p]));
    this._detectionOrder = Object.freeze(orderBySpecificity(profiles));
  }

  /**
   * Validate profiles and build a registry.
   *
   * @throws ProfileValidationError on schema errors or duplicate ids/markers
   */
  static create(profiles: unknown): ProfileRegistry {
    return new ProfileRegistry(validateProfiles(profiles));
  }

  get size(): number {
    return this._profiles.length;
  }

  /** All profiles in registration order. */
  all(): ReadonlyArray<Readonly<VersionProfile>> {
    return this._profiles;
  }

  getByMarker(marker: string): Readonly<VersionProfile> | undefined {
    return this._byMarker.get(marker);
  }

  getById(id: VariantId): Readonly<VersionProfile> | undefined {
    return this._byId.get(id);
  }

  /**
   * Profiles in the order packet text must be scanned for markers.
   *
   * A marker that contains another marker is always longer than it, so
   * longest-first puts every extension ahead of the marker it extends.
   * Equal lengths put the later-registered (newer) variant first.
   */
  detectionOrder(): ReadonlyArray<Readonly<VersionProfile>> {
    return this._detectionOrder;
  }

  /**
   * Resolve user input to a profile.
   *
   * Accepts an id in any case ("vt1"), its trailing number ("1"), or the
   * marker itself ("PDF/VT-1").
   */
  resolveVariant(input: string): Readonly<VersionProfile> | undefined {
    const text = input.trim();
    const upper = text.toUpperCase();

    const byMarker = this._byMarker.get(text);
    if (byMarker) {
      return byMarker;
    }

    const byId = this._byId.get(upper);
    if (byId) {
      return byId;
    }

    if (/^\d+$/.test(text)) {
      return this._profiles.find((p) => /(\d+)$/.exec(p.id)?.[1] === text);
    }

    return undefined;
  }

  /** Variant ids, for help text and error messages. */
  ids(): VariantId[] {
    return this._profiles.map((p) => p.id);
  }
}

function orderBySpecificity(
  profiles: ReadonlyArray<Readonly<VersionProfile>>
): Readonly<VersionProfile>[] {
  return profiles
    .map((profile, index) => ({ profile, index }))
    .sort((a, b) => {
      const byLength = b.profile.marker.length - a.profile.marker.length;
      return byLength !== 0 ? byLength : b.index - a.index;
    })
    .map(({ profile }) => profile);
}
