/**
 * Known-Shape Detection Tests
 */

import { describe, it, expect } from "vitest";

import { createKnownShapeService } from "../service.js";
import {
  arrayNode,
  objectNode,
  scalarNode,
  unionNode,
  enumerationNode,
  type SchemaNode,
} from "../../schema/model.js";

const str = scalarNode("string");

function conditionItems(required: string[] = []): SchemaNode {
  return objectNode(
    [
      ["type", str],
      ["status", enumerationNode(["True", "False", "Unknown"])],
      ["reason", str],
      ["message", str],
      ["lastTransitionTime", scalarNode("string", { format: "date-time" })],
      ["observedGeneration", scalarNode("integer")],
    ],
    required
  );
}

const objectReference = objectNode(
  ["apiVersion", "fieldPath", "kind", "name", "namespace", "resourceVersion", "uid"].map(
    (name) => [name, str] as const
  )
);

describe("KnownShapeService", () => {
  const service = createKnownShapeService();

  describe("conditions", () => {
    it("matches an array of condition objects", () => {
      const match = service.detect({ node: arrayNode(conditionItems()), propertyName: "conditions", level: 1 });
      expect(match?.shape).toBe("condition");
      expect(match?.ref).toEqual({
        kind: "sequence",
        of: { kind: "external", name: "Condition", origin: "known-shape" },
      });
    });

    it("accepts a required list naming type and status", () => {
      const node = arrayNode(conditionItems(["type", "status", "lastTransitionTime"]));
      expect(service.detect({ node, propertyName: "conditions", level: 1 })?.shape).toBe("condition");
    });

    it("rejects a required list without type and status", () => {
      const node = arrayNode(conditionItems(["message"]));
      expect(service.detect({ node, propertyName: "conditions", level: 1 })).toBeNull();
    });

    it("rejects items missing a condition field", () => {
      const items = objectNode([
        ["type", str],
        ["status", str],
      ]);
      expect(service.detect({ node: arrayNode(items), propertyName: "conditions", level: 1 })).toBeNull();
    });

    it("ignores condition-shaped arrays under another name", () => {
      expect(service.detect({ node: arrayNode(conditionItems()), propertyName: "events", level: 1 })).toBeNull();
      expect(service.detect({ node: arrayNode(conditionItems()), level: 1 })).toBeNull();
    });

    it("keeps the list type of the conditions array", () => {
      const node = arrayNode(conditionItems(["type", "status"]), { listType: "map" });
      expect(service.detect({ node, propertyName: "conditions", level: 1 })?.ref).toEqual({
        kind: "sequence",
        of: { kind: "external", name: "Condition", origin: "known-shape" },
        listType: "map",
      });
    });
  });

  describe("object references", () => {
    it("matches the exact ObjectReference field set", () => {
      expect(service.detect({ node: objectReference, propertyName: "targetRef", level: 2 })?.ref).toEqual({
        kind: "external",
        name: "ObjectReference",
        origin: "known-shape",
      });
    });

    it("rejects a superset of the fields", () => {
      const node = objectNode([...objectReference.properties, ["extra", str]]);
      expect(service.detect({ node, level: 2 })).toBeNull();
    });
  });

  describe("int-or-string", () => {
    it("matches the extension flag", () => {
      const node = scalarNode("string", { intOrString: true });
      expect(service.detect({ node, level: 1 })?.shape).toBe("int-or-string");
    });

    it("matches a union of integer and string", () => {
      const node = unionNode([scalarNode("string"), scalarNode("integer")], "anyOf");
      expect(service.detect({ node, level: 1 })?.shape).toBe("int-or-string");
    });

    it("ignores a union of string and boolean", () => {
      const node = unionNode([scalarNode("string"), scalarNode("boolean")]);
      expect(service.detect({ node, level: 1 })).toBeNull();
    });
  });

  describe("object meta", () => {
    const metadata = objectNode([["name", str]]);

    it("matches metadata on the root", () => {
      expect(service.detect({ node: metadata, propertyName: "metadata", level: 0 })?.shape).toBe("object-meta");
    });

    it("ignores nested metadata", () => {
      expect(service.detect({ node: metadata, propertyName: "metadata", level: 1 })).toBeNull();
    });
  });

  describe("suppression", () => {
    it("skips suppressed shapes", () => {
      const quiet = createKnownShapeService({ suppress: ["condition", "object-reference"] });
      expect(quiet.isSuppressed("condition")).toBe(true);
      expect(quiet.detect({ node: arrayNode(conditionItems()), propertyName: "conditions", level: 1 })).toBeNull();
      expect(quiet.detect({ node: objectReference, level: 1 })).toBeNull();
    });

    it("registers every default detector", () => {
      expect(service.getDetectors().map((detector) => detector.shape)).toEqual([
        "int-or-string",
        "object-meta",
        "condition",
        "object-reference",
      ]);
    });
  });
});
