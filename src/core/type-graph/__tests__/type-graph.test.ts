/**
 * Type Graph Tests
 */

import { describe, it, expect } from "vitest";

import { TypeGraph, referencesOf } from "../type-graph.js";
import { ErrorCode } from "../../errors.js";
import { enumVariantName, isTypeName, pascalCase } from "../naming.js";
import {
  describeRef,
  externalRef,
  innermostRef,
  mapOf,
  mapRefTargets,
  optionalOf,
  primitiveRef,
  sequenceOf,
  type CompositeType,
  type TypeRef,
  type UnitEnumType,
} from "../types.js";

function composite(name: string, fields: Array<[string, TypeRef]>): CompositeType {
  return {
    kind: "composite",
    name,
    path: [name],
    level: 0,
    selfReferential: false,
    capabilities: [],
    withheld: [],
    elided: false,
    fields: fields.map(([fieldName, type]) => ({ name: fieldName, type, optional: false, absence: "required" })),
  };
}

function unitEnum(name: string, literals: string[]): UnitEnumType {
  const taken = new Set<string>();
  return {
    kind: "enumerated",
    shape: "unit",
    name,
    path: [name],
    level: 1,
    selfReferential: false,
    capabilities: [],
    withheld: [],
    elided: false,
    variants: literals.map((literal) => ({ name: enumVariantName(literal, taken), literal })),
  };
}

function graph(): TypeGraph {
  return new TypeGraph({ kind: "Widget", version: "v1", mapRepresentation: "ordered", schemaMode: "disabled", docs: false });
}

describe("naming", () => {
  it("PascalCases property names", () => {
    expect(pascalCase("matchLabels")).toBe("MatchLabels");
    expect(pascalCase("tls_config")).toBe("TlsConfig");
    expect(pascalCase("x-kubernetes-list")).toBe("XKubernetesList");
  });

  it("names enum variants uniquely", () => {
    const taken = new Set<string>();
    expect(["", "-", "_", "1Gi", "keep", "Keep"].map((literal) => enumVariantName(literal, taken))).toEqual([
      "Empty",
      "Dash",
      "Underscore",
      "Value1Gi",
      "Keep",
      "KeepX",
    ]);
  });

  it("recognizes type names", () => {
    expect(isTypeName("Quantity")).toBe(true);
    expect(isTypeName("quantity")).toBe(false);
    expect(isTypeName("My.Type")).toBe(false);
  });
});

describe("references", () => {
  it("renders references compactly", () => {
    expect(describeRef(optionalOf(sequenceOf(primitiveRef("integer", "int32"))))).toBe("integer(int32)[]?");
    expect(describeRef(mapOf({ kind: "ref", target: "WidgetNode", indirect: true }))).toBe("map<string, &WidgetNode>");
    expect(describeRef(externalRef("Quantity", "override"))).toBe("!Quantity");
    expect(describeRef(externalRef("Condition", "known-shape"))).toBe("@Condition");
  });

  it("renders and keeps the list type of a sequence", () => {
    const tags = sequenceOf<string>({ kind: "ref", target: "WidgetTag", indirect: false }, "set");
    expect(describeRef(tags)).toBe("WidgetTag[set]");
    expect(describeRef(sequenceOf(primitiveRef("string"), "atomic"))).toBe("string[atomic]");
    expect(mapRefTargets<string, string>(tags, (target) => ({ kind: "ref", target: `${target}V1`, indirect: false }))).toEqual({
      kind: "sequence",
      of: { kind: "ref", target: "WidgetTagV1", indirect: false },
      listType: "set",
    });
  });

  it("does not nest optionals", () => {
    const once = optionalOf(primitiveRef("string"));
    expect(optionalOf(once)).toBe(once);
  });

  it("finds the innermost reference", () => {
    expect(innermostRef(optionalOf(sequenceOf(mapOf(primitiveRef("boolean")))))).toEqual({
      kind: "primitive",
      primitive: "boolean",
    });
  });
});

describe("TypeGraph", () => {
  it("keeps insertion order and resolves references", () => {
    const types = graph();
    types.add(composite("Widget", [["mode", optionalOf({ kind: "ref", target: "WidgetMode", indirect: false })]]));
    types.add(unitEnum("WidgetMode", ["Fast", "Slow"]));

    expect(types.root?.name).toBe("Widget");
    expect(types.types.map((type) => type.name)).toEqual(["Widget", "WidgetMode"]);
    const root = types.get("Widget");
    expect(root && referencesOf(root).map(describeRef)).toEqual(["WidgetMode?"]);
    expect(types.resolve(sequenceOf({ kind: "ref", target: "WidgetMode", indirect: false }))?.kind).toBe("enumerated");
    expect(types.unresolvedReferences()).toEqual([]);
  });

  it("reports dangling references", () => {
    const types = graph();
    types.add(composite("Widget", [["spec", { kind: "ref", target: "WidgetSpec", indirect: false }]]));

    expect(types.unresolvedReferences()).toEqual(["WidgetSpec"]);
  });

  it("rejects duplicate names and unknown replacements", () => {
    const types = graph();
    types.add(composite("Widget", []));

    expect(() => types.add(composite("Widget", []))).toThrow("Type graph already contains a type named Widget");
    expect(() => types.replace(composite("Gadget", []))).toThrow("Type graph has no type named Gadget");
  });

  it("replaces a type in place", () => {
    const types = graph();
    types.add(composite("Widget", []));
    types.add(unitEnum("WidgetMode", ["Fast"]));
    types.replace({ ...composite("Widget", []), capabilities: ["equality"] });

    expect(types.types.map((type) => [type.name, type.capabilities])).toEqual([
      ["Widget", ["equality"]],
      ["WidgetMode", []],
    ]);
  });

  it("freezes deeply", () => {
    const types = graph();
    types.add(composite("Widget", [["size", primitiveRef("integer", "int64")]]));
    types.freeze();

    expect(types.isFrozen).toBe(true);
    expect(() => types.add(composite("Other", []))).toThrow("Type graph is frozen");
    expect(Object.isFrozen(types.get("Widget"))).toBe(true);
    expect(Object.isFrozen(types.metadata)).toBe(true);
  });

  it("serializes to JSON", () => {
    const types = graph();
    types.add(unitEnum("Widget", ["On"]));
    types.addDiagnostic({ code: ErrorCode.UNSUPPORTED_SCHEMA_CONSTRUCT, path: "Widget", message: "x" });

    const json = types.toJSON();
    expect(json.metadata.kind).toBe("Widget");
    expect(json.types).toHaveLength(1);
    expect(json.diagnostics).toHaveLength(1);
  });
});
