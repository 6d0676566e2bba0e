// Object normalizer.
// Purpose: canonicalize loosely-structured object records into comparable identities and match keys.
// Assumes records come from intake; unknown classes/types are informative, never rejected.

import { MalformedInputError } from "../core/errors.js";

import type { NormalizedObject, ObjectIdentity, ObjectRecord } from "./types.js";
import { DEFAULT_OBJECT_CLASS, KNOWN_OBJECT_CLASSES, KNOWN_OBJECT_TYPES } from "./vocabulary.js";

// Intake may hand over partially filled rows; only the name is required.
export type RawObjectRecord = { [K in keyof ObjectRecord]?: string | null };

// =============================================================================
// PUBLIC API
// =============================================================================

export function normalize(raw: RawObjectRecord): NormalizedObject {
  const name = canonicalToken(raw.name);
  if (!name) {
    throw new MalformedInputError("Object record is missing a name.", "name");
  }

  const objClass = canonicalToken(raw.class) || DEFAULT_OBJECT_CLASS;
  const objType = canonicalToken(raw.type);
  const qualified = resolvePackage(name, canonicalToken(raw.package) || null);

  return {
    class: objClass,
    type: objType,
    name: qualified.name,
    key: buildIdentityKey(objClass, objType, qualified.name),
    package: qualified.package,
    matchKey: buildMatchKey(qualified.package, qualified.name),
    flags: {
      unknownClass: !KNOWN_OBJECT_CLASSES.has(objClass),
      unknownType: !KNOWN_OBJECT_TYPES.has(objType),
    },
  };
}

export function toObjectRecord(obj: NormalizedObject): ObjectRecord {
  const record: ObjectRecord = { class: obj.class, type: obj.type, name: obj.name };
  if (obj.package) {
    record.package = obj.package;
  }
  return record;
}

export function toIdentity(obj: ObjectIdentity): ObjectIdentity {
  return { class: obj.class, type: obj.type, name: obj.name, key: obj.key };
}

export function buildIdentityKey(objClass: string, objType: string, name: string): string {
  return `${objClass}:${objType}:${name}`;
}

export function buildMatchKey(pkg: string | null, name: string): string {
  return `${pkg ?? ""}:${name}`;
}

// =============================================================================
// INTERNALS
// =============================================================================

function canonicalToken(value: string | null | undefined): string {
  return (value ?? "").trim().toUpperCase();
}

// PACKAGE/NAME qualifiers: strip when redundant with the given package, infer when
// no package was given. Names starting with "/" are namespaces, not qualifiers.
function resolvePackage(
  name: string,
  pkg: string | null,
): { name: string; package: string | null } {
  if (pkg) {
    const prefix = `${pkg}/`;
    let stripped = name;
    while (stripped.startsWith(prefix) && stripped.length > prefix.length) {
      stripped = stripped.slice(prefix.length);
    }
    return { name: stripped, package: pkg };
  }

  const slash = name.indexOf("/");
  const isSingleQualifier =
    slash > 0 && slash < name.length - 1 && name.indexOf("/", slash + 1) === -1;
  if (!isSingleQualifier) {
    return { name, package: null };
  }

  return { name: name.slice(slash + 1), package: name.slice(0, slash) };
}
