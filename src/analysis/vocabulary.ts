// Known transport object vocabulary.
// Purpose: recognise common object classes/types; anything else is kept and flagged.

export const DEFAULT_OBJECT_CLASS = "R3TR";

export const KNOWN_OBJECT_CLASSES: ReadonlySet<string> = new Set(["R3TR", "LIMU"]);

export const KNOWN_OBJECT_TYPES: ReadonlySet<string> = new Set([
  // reports/programs
  "PROG",
  "REPS",
  "REPT",
  // enhancements/exits
  "CMOD",
  "SMOD",
  "ENHO",
  "ENHS",
  "SPOT",
  // classes/function modules
  "CLAS",
  "INTF",
  "FUGR",
  "FUNC",
  // data dictionary
  "TABL",
  "VIEW",
  "DTEL",
  "DOMA",
  "TTYP",
  "DDLS",
]);

export const ENHANCEMENT_TYPES: ReadonlySet<string> = new Set(["CMOD", "SMOD", "ENHO", "ENHS", "SPOT"]);

export const DICTIONARY_TYPES: ReadonlySet<string> = new Set(["TABL", "VIEW", "DDLS"]);
