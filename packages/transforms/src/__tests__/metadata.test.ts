/**
 * Transform metadata tests: definition defaults, structural checks and
 * parameter schemas.
 */

import { ValidationError } from "@docweave/shared";
import { describe, expect, it } from "vitest";
import {
  DEFAULT_TRANSFORM_PRIORITY,
  type TransformDefinition,
  defineTransform,
  readNumber,
  readStringList,
  validateParams,
} from "../metadata";

const base: TransformDefinition = {
  name: "sample",
  description: "Sample transform",
  create: () => ({ transform: (doc) => doc }),
};

describe("defineTransform", () => {
  it("fills defaults", () => {
    const metadata = defineTransform(base);

    expect(metadata).toMatchObject({
      name: "sample",
      priority: DEFAULT_TRANSFORM_PRIORITY,
      version: "1.0.0",
      dependencies: [],
      tags: [],
      parameters: {},
    });
    expect(metadata.priority).toBe(100);
  });

  it("rejects an empty name", () => {
    expect(() => defineTransform({ ...base, name: "  " })).toThrow("Transform name must not be empty");
  });

  it.each([-1, 1.5])("rejects priority %s", (priority) => {
    expect(() => defineTransform({ ...base, priority })).toThrow(
      `Priority of transform 'sample' must be a non-negative integer, got ${priority}`
    );
  });

  it("accepts priority zero", () => {
    expect(defineTransform({ ...base, priority: 0 }).priority).toBe(0);
  });

  it("rejects a dependency on itself", () => {
    expect(() => defineTransform({ ...base, dependencies: ["sample"] })).toThrow(
      "Transform 'sample' depends on itself"
    );
  });

  it("rejects a default that does not match its parameter type", () => {
    expect(() =>
      defineTransform({ ...base, parameters: { count: { type: "integer", default: "three" } } })
    ).toThrow(/^Default of parameter 'count' for transform 'sample' is invalid: /);
  });
});

describe("validateParams", () => {
  const metadata = defineTransform({
    ...base,
    parameters: {
      mode: { type: "string", default: "fast", choices: ["fast", "slow"] },
      ratio: { type: "number" },
      tags: { type: "list", elementType: "string", default: [] },
      even: { type: "integer", validate: (value) => typeof value === "number" && value % 2 === 0 },
      label: {
        type: "string",
        validate: (value) => (typeof value === "string" && value.length <= 3) || "at most 3 characters",
      },
    },
  });

  it("fills defaults and leaves absent optional parameters undefined", () => {
    expect(validateParams(metadata)).toEqual({
      mode: "fast",
      ratio: undefined,
      tags: [],
      even: undefined,
      label: undefined,
    });
  });

  it("keeps supplied values", () => {
    const params = validateParams(metadata, { mode: "slow", ratio: 0.5, tags: ["a", "b"] });

    expect(params.mode).toBe("slow");
    expect(readNumber(params, "ratio")).toBe(0.5);
    expect(readStringList(params, "tags")).toEqual(["a", "b"]);
  });

  it("rejects a value outside the choices", () => {
    expect(() => validateParams(metadata, { mode: "medium" })).toThrow(
      `Invalid parameter 'mode' for transform 'sample': must be one of "fast", "slow"`
    );
  });

  it("names the offending list element", () => {
    try {
      validateParams(metadata, { tags: ["ok", 7] });
      expect.unreachable();
    } catch (error) {
      expect(error).toBeInstanceOf(ValidationError);
      expect(error).toMatchObject({ field: "tags.1" });
    }
  });

  it("reports a validator that returns false", () => {
    expect(() => validateParams(metadata, { even: 3 })).toThrow(
      "Invalid parameter 'even' for transform 'sample': validation failed for 3"
    );
  });

  it("reports a validator message", () => {
    expect(() => validateParams(metadata, { label: "long" })).toThrow(
      "Invalid parameter 'label' for transform 'sample': at most 3 characters"
    );
  });
});

describe("parameter readers", () => {
  it("reject a value of another type", () => {
    expect(() => readNumber({ count: "1" }, "count")).toThrow("Parameter 'count' must be a number");
    expect(() => readStringList({ names: "a" }, "names")).toThrow("Parameter 'names' must be a list of strings");
  });
});
