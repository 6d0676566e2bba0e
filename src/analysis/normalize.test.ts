import { describe, expect, it } from "vitest";

import { MalformedInputError } from "../core/errors.js";

import { normalize, toObjectRecord, type RawObjectRecord } from "./normalize.js";

describe("normalize", () => {
  it("trims and uppercases tokens into an identity and match key", () => {
    const obj = normalize({ class: " r3tr ", type: "prog", name: " zreport_a " });

    expect(obj).toEqual({
      class: "R3TR",
      type: "PROG",
      name: "ZREPORT_A",
      key: "R3TR:PROG:ZREPORT_A",
      package: null,
      matchKey: ":ZREPORT_A",
      flags: { unknownClass: false, unknownType: false },
    });
  });

  it("defaults a missing class to R3TR", () => {
    const obj = normalize({ type: "TABL", name: "ZTABLE" });

    expect(obj.class).toBe("R3TR");
    expect(obj.key).toBe("R3TR:TABL:ZTABLE");
  });

  it("keeps unknown classes and types but flags them", () => {
    const obj = normalize({ class: "xyz", type: "abcd", name: "foo" });

    expect(obj.class).toBe("XYZ");
    expect(obj.type).toBe("ABCD");
    expect(obj.flags).toEqual({ unknownClass: true, unknownType: true });
  });

  it("rejects records without a name", () => {
    expect(() => normalize({ class: "R3TR", type: "PROG" })).toThrow(MalformedInputError);
    expect(() => normalize({ class: "R3TR", type: "PROG", name: "   " })).toThrow(
      "Object record is missing a name.",
    );
  });

  it("strips a package qualifier that repeats the given package", () => {
    const obj = normalize({ type: "PROG", name: "zfi/zfi/zrep", package: "zfi" });

    expect(obj.name).toBe("ZREP");
    expect(obj.package).toBe("ZFI");
    expect(obj.matchKey).toBe("ZFI:ZREP");
  });

  it("infers the package from a qualified name when none is given", () => {
    const obj = normalize({ type: "PROG", name: "ZFI/ZREP" });

    expect(obj.package).toBe("ZFI");
    expect(obj.name).toBe("ZREP");
    expect(obj.key).toBe("R3TR:PROG:ZREP");
  });

  it("leaves namespaced names alone", () => {
    const obj = normalize({ type: "CLAS", name: "/abc/cl_foo" });

    expect(obj.package).toBeNull();
    expect(obj.name).toBe("/ABC/CL_FOO");
    expect(obj.matchKey).toBe(":/ABC/CL_FOO");
  });

  it("is idempotent across its own record form", () => {
    const inputs: RawObjectRecord[] = [
      { class: "r3tr", type: "prog", name: "zreport_a" },
      { class: "limu", type: "reps", name: " zfi/zfi/zrep ", package: "zfi" },
      { type: "PROG", name: "ZFI/ZREP" },
      { class: "xyz", type: "", name: "/ns/obj" },
      { class: "R3TR", type: "TABL", name: "ZT", package: "  " },
    ];

    for (const input of inputs) {
      const once = normalize(input);
      const twice = normalize(toObjectRecord(once));
      expect(twice).toEqual(once);
    }
  });

  it("omits the package from the record form when unknown", () => {
    const record = toObjectRecord(normalize({ type: "PROG", name: "ZA" }));

    expect(record).toEqual({ class: "R3TR", type: "PROG", name: "ZA" });
  });
});
