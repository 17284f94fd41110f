/**
 * Type Graph Builder Tests
 */

import { describe, it, expect } from "vitest";

import { buildTypeGraph } from "../type-graph-builder.js";
import type { BuildOptions } from "../interfaces.js";
import { parseSchema } from "../../schema/parser.js";
import { scalarNode, type SchemaNode } from "../../schema/model.js";
import type { TypeGraph } from "../../type-graph/type-graph.js";
import type { CompositeType, Field, GeneratedType } from "../../type-graph/types.js";
import { createKnownShapeService } from "../../known-shapes/service.js";
import { PropertyOverrides } from "../../overrides/property-overrides.js";
import {
  CycleDepthExceededError,
  ErrorCode,
  IrreconcilableUnionError,
  NamingCollisionError,
  UnsupportedSchemaConstructError,
} from "../../errors.js";
import { unwrap, unwrapErr } from "../../../types/result.js";

// =============================================================================
// Helpers
// =============================================================================

function schemaOf(raw: unknown): SchemaNode {
  return unwrap(parseSchema(raw)).root;
}

function build(raw: unknown, options: Omit<BuildOptions, "kind"> & { kind?: string } = {}): TypeGraph {
  return unwrap(buildTypeGraph(schemaOf(raw), { ...options, kind: options.kind ?? "Widget" }));
}

function buildError(raw: unknown, options: Omit<BuildOptions, "kind"> = {}) {
  return unwrapErr(buildTypeGraph(schemaOf(raw), { ...options, kind: "Widget" }));
}

function typeOf(graph: TypeGraph, name: string): GeneratedType {
  const type = graph.get(name);
  if (!type) {
    throw new Error(`no type named ${name}`);
  }
  return type;
}

function compositeOf(graph: TypeGraph, name: string): CompositeType {
  const type = typeOf(graph, name);
  if (type.kind !== "composite") {
    throw new Error(`${name} is not a composite`);
  }
  return type;
}

function fieldOf(type: CompositeType, name: string): Field {
  const field = type.fields.find((candidate) => candidate.name === name);
  if (!field) {
    throw new Error(`${type.name} has no field ${name}`);
  }
  return field;
}

function rootField(graph: TypeGraph, name: string): Field {
  return fieldOf(compositeOf(graph, graph.metadata.kind), name);
}

const ref = (target: string, indirect = false) => ({ kind: "ref", target, indirect });
const optional = (of: unknown) => ({ kind: "optional", of });
const string = { kind: "primitive", primitive: "string" };

// =============================================================================
// Fixtures
// =============================================================================

const groupsSchema = {
  type: "object",
  properties: {
    groups: {
      type: "array",
      items: {
        type: "object",
        properties: {
          name: { type: "string" },
          interval: { type: "string" },
        },
        required: ["name"],
      },
    },
  },
  required: ["groups"],
};

function endpoint() {
  return {
    type: "object",
    properties: {
      host: { type: "string" },
      port: { type: "integer", format: "int32" },
    },
    required: ["host"],
  };
}

// =============================================================================
// Tests
// =============================================================================

describe("buildTypeGraph", () => {
  describe("composites", () => {
    it("builds a root composite and one composite per item schema", () => {
      const graph = build(groupsSchema, { naming: "shortest" });

      expect(graph.types.map((type) => type.name)).toEqual(["Widget", "Groups"]);
      expect(rootField(graph, "groups")).toEqual({
        name: "groups",
        type: { kind: "sequence", of: ref("Groups") },
        optional: false,
        absence: "empty",
      });

      const groups = compositeOf(graph, "Groups");
      expect(groups.level).toBe(1);
      expect(groups.path).toEqual(["Widget", "Groups"]);
      expect(groups.fields).toEqual([
        { name: "name", type: string, optional: false, absence: "required" },
        { name: "interval", type: optional(string), optional: true, absence: "omit" },
      ]);
    });

    it("qualifies names with the full path by default", () => {
      const graph = build(groupsSchema);
      expect(graph.types.map((type) => type.name)).toEqual(["Widget", "WidgetGroups"]);
    });

    it("names map value composites after the map property", () => {
      const graph = build(
        {
          type: "object",
          properties: {
            validationsInfo: {
              type: "object",
              additionalProperties: { type: "object", properties: { name: { type: "string" } } },
            },
          },
        },
        { kind: "Agent" }
      );

      expect(rootField(graph, "validationsInfo").type).toEqual(
        optional({ kind: "map", of: ref("AgentValidationsInfo") })
      );
      expect(compositeOf(graph, "AgentValidationsInfo").level).toBe(1);
    });

    it("adds an Items segment for arrays nested in arrays", () => {
      const graph = build({
        type: "object",
        properties: {
          matrix: {
            type: "array",
            items: { type: "array", items: { type: "object", properties: { x: { type: "integer" } } } },
          },
        },
      });

      expect(rootField(graph, "matrix").type).toEqual(
        optional({ kind: "sequence", of: { kind: "sequence", of: ref("WidgetMatrixItems") } })
      );
    });

    it("turns objects without properties into unknown", () => {
      const graph = build({
        type: "object",
        properties: {
          empty: { type: "object" },
          raw: { type: "object", "x-kubernetes-preserve-unknown-fields": true },
          rawList: { type: "array", items: { type: "object", "x-kubernetes-preserve-unknown-fields": true } },
        },
      });

      expect(graph.size).toBe(1);
      expect(rootField(graph, "empty").type).toEqual(optional({ kind: "unknown" }));
      expect(rootField(graph, "raw").type).toEqual(optional({ kind: "unknown" }));
      expect(rootField(graph, "rawList").type).toEqual(optional({ kind: "sequence", of: { kind: "unknown" } }));
    });

    it("maps scalar formats onto primitives", () => {
      const graph = build({
        type: "object",
        properties: {
          count: { type: "integer" },
          small: { type: "integer", format: "int32" },
          ratio: { type: "number" },
          since: { type: "string", format: "date-time" },
          day: { type: "string", format: "date" },
          flags: { type: "object", additionalProperties: { type: "boolean" } },
          params: { type: "object", additionalProperties: { type: "array", items: { type: "string" } } },
        },
      });

      expect(rootField(graph, "count").type).toEqual(
        optional({ kind: "primitive", primitive: "integer", format: "int64" })
      );
      expect(rootField(graph, "small").type).toEqual(
        optional({ kind: "primitive", primitive: "integer", format: "int32" })
      );
      expect(rootField(graph, "ratio").type).toEqual(
        optional({ kind: "primitive", primitive: "number", format: "double" })
      );
      expect(rootField(graph, "since").type).toEqual(optional({ kind: "primitive", primitive: "date-time" }));
      expect(rootField(graph, "day").type).toEqual(optional({ kind: "primitive", primitive: "date" }));
      expect(rootField(graph, "flags").type).toEqual(
        optional({ kind: "map", of: { kind: "primitive", primitive: "boolean" } })
      );
      expect(rootField(graph, "params").type).toEqual(optional({ kind: "map", of: { kind: "sequence", of: string } }));
    });

    it("keeps schema defaults and, when enabled, descriptions", () => {
      const schema = {
        type: "object",
        description: "A widget.",
        properties: { replicas: { type: "integer", default: 1, description: "Number of copies." } },
      };

      const plain = rootField(build(schema), "replicas");
      expect(plain.defaultValue).toBe(1);
      expect(plain.description).toBeUndefined();

      const documented = build(schema, { enableDocs: true });
      expect(rootField(documented, "replicas").description).toBe("Number of copies.");
      expect(typeOf(documented, "Widget").description).toBe("A widget.");
    });

    it("copies defaults so freezing the graph leaves the schema untouched", () => {
      const fallback = { host: "localhost", port: 8080 };
      const graph = build({
        type: "object",
        properties: { target: { type: "object", properties: { host: { type: "string" } }, default: fallback } },
      }).freeze();

      const field = rootField(graph, "target");
      expect(field.defaultValue).toEqual({ host: "localhost", port: 8080 });
      expect(field.defaultValue).not.toBe(fallback);
      expect(Object.isFrozen(field.defaultValue)).toBe(true);
      expect(Object.isFrozen(fallback)).toBe(false);
    });

    it("keeps the list type of an array", () => {
      const graph = build({
        type: "object",
        properties: {
          tags: { type: "array", items: { type: "string" }, "x-kubernetes-list-type": "set" },
          ports: { type: "array", items: { type: "integer", format: "int32" } },
        },
      });

      expect(rootField(graph, "tags").type).toEqual(optional({ kind: "sequence", of: string, listType: "set" }));
      expect(rootField(graph, "ports").type).toEqual(
        optional({ kind: "sequence", of: { kind: "primitive", primitive: "integer", format: "int32" } })
      );
    });

    it("rejects a root that is not an object", () => {
      const error = unwrapErr(buildTypeGraph(scalarNode("string"), { kind: "Widget" }));
      expect(error).toBeInstanceOf(UnsupportedSchemaConstructError);
      expect(error.path).toEqual(["Widget"]);
    });
  });

  describe("optionality", () => {
    it("makes exactly the required, non-nullable fields non-optional", () => {
      const graph = build({
        type: "object",
        properties: {
          name: { type: "string" },
          phase: { type: "string", enum: ["Running", "Failed", null] },
          note: { type: "string", nullable: true },
          tags: { type: "array", items: { type: "string" } },
          labels: { type: "object", additionalProperties: { type: "string" } },
          extra: { type: "string" },
        },
        required: ["name", "phase", "note", "tags", "labels"],
      });

      const fields = compositeOf(graph, "Widget").fields;
      expect(fields.filter((field) => !field.optional).map((field) => field.name)).toEqual([
        "name",
        "tags",
        "labels",
      ]);
      expect(fields.map((field) => field.absence)).toEqual(["required", "omit", "omit", "empty", "empty", "omit"]);
    });
  });

  describe("known shapes and overrides", () => {
    it("references int-or-string instead of synthesizing a type", () => {
      const graph = build({
        type: "object",
        properties: {
          port: { "x-kubernetes-int-or-string": true, anyOf: [{ type: "integer" }, { type: "string" }] },
        },
      });

      expect(graph.size).toBe(1);
      expect(rootField(graph, "port").type).toEqual(
        optional({ kind: "external", name: "IntOrString", origin: "known-shape" })
      );
    });

    it("references Condition for status conditions", () => {
      const graph = build({
        type: "object",
        properties: {
          status: {
            type: "object",
            properties: {
              conditions: {
                type: "array",
                items: {
                  type: "object",
                  properties: {
                    lastTransitionTime: { type: "string", format: "date-time" },
                    message: { type: "string" },
                    reason: { type: "string" },
                    status: { type: "string" },
                    type: { type: "string" },
                  },
                  required: ["type", "status"],
                },
              },
            },
          },
        },
      });

      expect(graph.types.map((type) => type.name)).toEqual(["Widget", "WidgetStatus"]);
      expect(fieldOf(compositeOf(graph, "WidgetStatus"), "conditions").type).toEqual(
        optional({ kind: "sequence", of: { kind: "external", name: "Condition", origin: "known-shape" } })
      );
    });

    it("synthesizes a suppressed known shape", () => {
      const graph = build(
        {
          type: "object",
          properties: {
            conditions: {
              type: "array",
              items: {
                type: "object",
                properties: {
                  lastTransitionTime: { type: "string" },
                  message: { type: "string" },
                  reason: { type: "string" },
                  status: { type: "string" },
                  type: { type: "string" },
                },
              },
            },
          },
        },
        { knownShapes: createKnownShapeService({ suppress: ["condition"] }) }
      );

      expect(rootField(graph, "conditions").type).toEqual(
        optional({ kind: "sequence", of: ref("WidgetConditions") })
      );
    });

    it("synthesizes condition-shaped arrays under another name", () => {
      const graph = build({
        type: "object",
        properties: {
          history: {
            type: "array",
            items: {
              type: "object",
              properties: {
                lastTransitionTime: { type: "string" },
                message: { type: "string" },
                reason: { type: "string" },
                status: { type: "string" },
                type: { type: "string" },
              },
            },
          },
        },
      });

      expect(graph.types.map((type) => type.name)).toEqual(["Widget", "WidgetHistory"]);
      expect(rootField(graph, "history").type).toEqual(optional({ kind: "sequence", of: ref("WidgetHistory") }));
    });

    it("references ObjectMeta only for the root metadata", () => {
      const graph = build({
        type: "object",
        properties: {
          metadata: { type: "object" },
          template: {
            type: "object",
            properties: {
              metadata: { type: "object", properties: { labels: { type: "object", additionalProperties: { type: "string" } } } },
            },
          },
        },
      });

      expect(rootField(graph, "metadata").type).toEqual(
        optional({ kind: "external", name: "ObjectMeta", origin: "known-shape" })
      );
      expect(fieldOf(compositeOf(graph, "WidgetTemplate"), "metadata").type).toEqual(
        optional(ref("WidgetTemplateMetadata"))
      );
    });

    it("applies property overrides", () => {
      const overrides = unwrap(
        PropertyOverrides.compile([
          { matchName: [{ exact: "podTemplate" }], matchSuccess: { replace: "PodTemplateSpec" } },
          { matchName: [{ regex: "^internal" }], matchSuccess: "omit" },
        ])
      );
      const graph = build(
        {
          type: "object",
          properties: {
            podTemplate: { type: "object", properties: { image: { type: "string" } } },
            internalState: { type: "string" },
            replicas: { type: "integer" },
          },
          required: ["podTemplate"],
        },
        { overrides }
      );

      expect(graph.types.map((type) => type.name)).toEqual(["Widget"]);
      expect(compositeOf(graph, "Widget").fields.map((field) => field.name)).toEqual(["podTemplate", "replicas"]);
      expect(rootField(graph, "podTemplate")).toEqual({
        name: "podTemplate",
        type: { kind: "external", name: "PodTemplateSpec", origin: "override" },
        optional: false,
        absence: "required",
      });
    });
  });

  describe("enumerations and unions", () => {
    it("collapses a oneOf over literals into a unit enumeration", () => {
      const graph = build({
        type: "object",
        properties: {
          mode: { type: "string", oneOf: [{ const: "A" }, { const: "B" }, { const: "C" }] },
        },
      });

      expect(rootField(graph, "mode").type).toEqual(optional(ref("WidgetMode")));
      expect(typeOf(graph, "WidgetMode")).toMatchObject({
        kind: "enumerated",
        shape: "unit",
        variants: [
          { name: "A", literal: "A" },
          { name: "B", literal: "B" },
          { name: "C", literal: "C" },
        ],
      });
    });

    it("names enum variants after their literals", () => {
      const graph = build({
        type: "object",
        properties: { action: { type: "string", enum: ["replace", "keep", "", "-", "hashmod", "Keep"] } },
      });

      expect(typeOf(graph, "WidgetAction")).toMatchObject({
        shape: "unit",
        variants: [
          { name: "Replace", literal: "replace" },
          { name: "Keep", literal: "keep" },
          { name: "Empty", literal: "" },
          { name: "Dash", literal: "-" },
          { name: "Hashmod", literal: "hashmod" },
          { name: "KeepX", literal: "Keep" },
        ],
      });
    });

    it("builds a tagged enumeration for differently shaped objects", () => {
      const graph = build({
        type: "object",
        properties: {
          source: {
            oneOf: [
              { type: "object", properties: { git: { type: "string" } }, required: ["git"] },
              {
                type: "object",
                properties: { bucket: { type: "string" }, region: { type: "string" } },
                required: ["bucket"],
              },
            ],
          },
        },
      });

      expect(graph.types.map((type) => type.name)).toEqual([
        "Widget",
        "WidgetSource",
        "WidgetSourceGit",
        "WidgetSourceBucket",
      ]);
      expect(typeOf(graph, "WidgetSource")).toMatchObject({
        kind: "enumerated",
        shape: "tagged",
        variants: [
          { name: "Git", type: ref("WidgetSourceGit") },
          { name: "Bucket", type: ref("WidgetSourceBucket") },
        ],
      });
      expect(compositeOf(graph, "WidgetSourceGit").level).toBe(2);
    });

    it("builds a tagged enumeration over scalars of different kinds", () => {
      const graph = build({ type: "object", properties: { value: { type: ["boolean", "string"] } } });

      expect(typeOf(graph, "WidgetValue")).toMatchObject({
        shape: "tagged",
        variants: [
          { name: "Boolean", type: { kind: "primitive", primitive: "boolean" } },
          { name: "String", type: string },
        ],
      });
    });

    it("collapses identical variants into a single reference", () => {
      const graph = build({
        type: "object",
        properties: { target: { oneOf: [endpoint(), endpoint()] } },
      });

      expect(graph.types.map((type) => type.name)).toEqual(["Widget", "WidgetTargetHost"]);
      expect(rootField(graph, "target").type).toEqual(optional(ref("WidgetTargetHost")));
    });

    it("rejects literals mixed with objects", () => {
      const schema = {
        type: "object",
        properties: {
          mode: {
            oneOf: [
              { type: "string", enum: ["auto"] },
              { type: "object", properties: { manual: { type: "string" } } },
            ],
          },
        },
      };

      const error = buildError(schema);
      expect(error).toBeInstanceOf(UnsupportedSchemaConstructError);
      expect(error.path).toEqual(["Widget", "Mode"]);

      const relaxed = build(schema, { relaxed: true });
      expect(relaxed.size).toBe(1);
      expect(rootField(relaxed, "mode").type).toEqual(optional({ kind: "unknown" }));
      expect(relaxed.diagnostics).toEqual([
        {
          code: ErrorCode.UNSUPPORTED_SCHEMA_CONSTRUCT,
          path: "Widget.Mode",
          message: "union mixes literal values with structured variants",
        },
      ]);
    });

    it("builds literals beside an open scalar of the same kind as that scalar", () => {
      const graph = build({
        type: "object",
        properties: {
          mode: { oneOf: [{ type: "string", enum: ["auto"] }, { type: "string" }] },
        },
      });

      expect(graph.types.map((type) => type.name)).toEqual(["Widget"]);
      expect(rootField(graph, "mode").type).toEqual(optional(string));
      expect(graph.diagnostics).toEqual([]);
    });

    it("rejects a schema-less variant next to concrete ones", () => {
      const schema = {
        type: "object",
        properties: {
          payload: { oneOf: [{ "x-kubernetes-preserve-unknown-fields": true }, { type: "string" }] },
        },
      };

      const error = buildError(schema);
      expect(error).toBeInstanceOf(IrreconcilableUnionError);
      expect(error.code).toBe(ErrorCode.IRRECONCILABLE_UNION);

      const relaxed = build(schema, { relaxed: true });
      expect(relaxed.diagnostics.map((diagnostic) => diagnostic.code)).toEqual([ErrorCode.IRRECONCILABLE_UNION]);
    });
  });

  describe("cycles and shared subtrees", () => {
    const tree = {
      type: "object",
      properties: { root: { $ref: "#/definitions/node" } },
      definitions: {
        node: {
          type: "object",
          properties: {
            value: { type: "string" },
            children: { type: "array", items: { $ref: "#/definitions/node" } },
            parent: { $ref: "#/definitions/node" },
          },
        },
      },
    };

    it("builds one self-referential composite for a recursive schema", () => {
      const graph = build(tree);

      expect(graph.types.map((type) => type.name)).toEqual(["Widget", "WidgetRoot"]);
      const node = compositeOf(graph, "WidgetRoot");
      expect(node.selfReferential).toBe(true);
      expect(fieldOf(node, "parent").type).toEqual(optional(ref("WidgetRoot", true)));
      expect(fieldOf(node, "children").type).toEqual(optional({ kind: "sequence", of: ref("WidgetRoot") }));
      expect(compositeOf(graph, "Widget").selfReferential).toBe(false);
      expect(graph.unresolvedReferences()).toEqual([]);
    });

    it("reuses the type of a subtree reached twice", () => {
      const shared = endpoint();
      const graph = build({ type: "object", properties: { primary: shared, fallback: shared } });

      expect(graph.types.map((type) => type.name)).toEqual(["Widget", "WidgetPrimary"]);
      expect(rootField(graph, "fallback").type).toEqual(optional(ref("WidgetPrimary")));
    });

    it("resolves a container that holds itself to unknown", () => {
      const graph = build({
        type: "object",
        properties: { labels: { $ref: "#/definitions/json" } },
        definitions: { json: { type: "object", additionalProperties: { $ref: "#/definitions/json" } } },
      });

      expect(graph.types.map((type) => type.name)).toEqual(["Widget"]);
      expect(rootField(graph, "labels").type).toEqual(optional({ kind: "map", of: { kind: "unknown" } }));
      expect(graph.diagnostics).toEqual([
        {
          code: ErrorCode.UNSUPPORTED_SCHEMA_CONSTRUCT,
          path: "Widget.Labels",
          message: "recursive container resolved to unknown",
        },
      ]);
    });

    it("fails beyond the maximum depth", () => {
      const error = buildError(
        {
          type: "object",
          properties: { a: { type: "object", properties: { b: { type: "object", properties: { c: { type: "string" } } } } } },
        },
        { maxDepth: 1 }
      );

      expect(error).toBeInstanceOf(CycleDepthExceededError);
      expect(error.path).toEqual(["Widget", "A", "B"]);
    });
  });

  describe("deduplication and naming", () => {
    it("unifies structurally identical objects at different paths", () => {
      const graph = build(
        { type: "object", properties: { source: endpoint(), target: endpoint() } },
        { naming: "shortest" }
      );

      expect(graph.types.map((type) => type.name)).toEqual(["Widget", "Source"]);
      expect(rootField(graph, "target").type).toEqual(optional(ref("Source")));
    });

    it("widens shortest names when different types collide", () => {
      const graph = build(
        {
          type: "object",
          properties: {
            primary: { type: "object", properties: { tls: { type: "object", properties: { cert: { type: "string" } } } } },
            secondary: { type: "object", properties: { tls: { type: "object", properties: { key: { type: "string" } } } } },
          },
        },
        { naming: "shortest" }
      );

      expect(graph.types.map((type) => type.name)).toEqual(["Widget", "Primary", "Tls", "Secondary", "SecondaryTls"]);
      expect(fieldOf(compositeOf(graph, "Secondary"), "tls").type).toEqual(optional(ref("SecondaryTls")));
    });

    it("never hands the root name to another type", () => {
      const graph = build(
        { type: "object", properties: { widget: { type: "object", properties: { id: { type: "string" } } } } },
        { naming: "shortest" }
      );

      expect(graph.types.map((type) => type.name)).toEqual(["Widget", "WidgetWidget"]);
    });

    it("fails when qualified names of different types coincide", () => {
      const schema = {
        type: "object",
        properties: {
          fooBar: { type: "object", properties: { a: { type: "string" } } },
          foo: { type: "object", properties: { bar: { type: "object", properties: { b: { type: "integer" } } } } },
        },
      };

      const error = buildError(schema);
      expect(error).toBeInstanceOf(NamingCollisionError);
      expect(error.path).toEqual(["Widget", "Foo", "Bar"]);
      expect(error.context).toMatchObject({ candidate: "WidgetFooBar" });

      const shortest = build(schema, { naming: "shortest" });
      expect(shortest.types.map((type) => type.name)).toEqual(["Widget", "FooBar", "Foo", "Bar"]);
    });

    it("produces identical graphs for identical input", () => {
      const schema = {
        type: "object",
        properties: {
          spec: groupsSchema,
          status: { type: "object", properties: { phase: { type: "string", enum: ["Ready", "Failed"] } } },
        },
      };

      const first = JSON.stringify(build(schema).toJSON());
      const second = JSON.stringify(build(schema).toJSON());
      expect(second).toBe(first);
    });

    it("gives every type a distinct name", () => {
      const graph = build(
        {
          type: "object",
          properties: {
            a: { type: "object", properties: { spec: { type: "object", properties: { x: { type: "string" } } } } },
            b: { type: "object", properties: { spec: { type: "object", properties: { y: { type: "string" } } } } },
            c: { type: "object", properties: { spec: { type: "object", properties: { x: { type: "string" } } } } },
          },
        },
        { naming: "shortest" }
      );

      const names = graph.types.map((type) => type.name);
      expect(new Set(names).size).toBe(names.length);
      expect(graph.unresolvedReferences()).toEqual([]);
    });
  });
});
