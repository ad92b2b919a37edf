import { isProviderErrorKind } from "@quillgate/errors";
import { describe, expect, it } from "vitest";
import { z } from "zod";
import { decodePayload, fromJsonSchema, stripCodeFences, withSchemaInstruction } from "../adapters/structured.js";
import { estimateTokens } from "../adapters/tokens.js";
import type { GenerationRequest } from "../types.js";

const base: GenerationRequest = {
  requestId: "req-1",
  userId: "user-1",
  prompt: "Give me a title",
  temperature: 0.7,
  maxTokens: 100,
};

const titleSchema = {
  jsonSchema: { type: "object", properties: { title: { type: "string" } }, required: ["title"] },
  validator: z.object({ title: z.string() }),
};

describe("estimateTokens", () => {
  it("counts 1.3 tokens per word, rounded down", () => {
    expect(estimateTokens("")).toBe(0);
    expect(estimateTokens("one")).toBe(1);
    expect(estimateTokens("one two three four five six seven eight nine ten")).toBe(13);
    expect(estimateTokens("  spaced\n\tout  ")).toBe(2);
  });
});

describe("withSchemaInstruction", () => {
  it("appends the schema as formatted JSON", () => {
    expect(withSchemaInstruction("Hi", { type: "string" })).toBe(
      'Hi\n\nIMPORTANT: You must respond with valid JSON that matches this exact schema:\n{\n  "type": "string"\n}\n\nReturn ONLY the JSON object, no additional text or markdown formatting.',
    );
  });
});

describe("stripCodeFences", () => {
  it("removes a json fence", () => {
    expect(stripCodeFences('```json\n{"a":1}\n```')).toBe('{"a":1}');
    expect(stripCodeFences('```\n{"a":1}\n```\n')).toBe('{"a":1}');
  });

  it("leaves unfenced text alone", () => {
    expect(stripCodeFences('  {"a":1} ')).toBe('{"a":1}');
  });
});

describe("decodePayload", () => {
  it("returns trimmed text without a schema", () => {
    expect(decodePayload("p", base, "  hello \n")).toBe("hello");
  });

  it("parses and validates structured replies", () => {
    expect(decodePayload("p", { ...base, schema: titleSchema }, '```json\n{"title":"T"}\n```')).toEqual({
      title: "T",
    });
  });

  it("raises UnknownError on unparseable JSON", () => {
    const run = () => decodePayload("p", { ...base, schema: titleSchema }, "Sure! Here it is");
    expect(run).toThrow("Failed to parse JSON response: Sure! Here it is");
    try {
      run();
    } catch (error) {
      expect(isProviderErrorKind(error, "UnknownError")).toBe(true);
    }
  });

  it("raises UnknownError on schema mismatch", () => {
    expect(() => decodePayload("p", { ...base, schema: titleSchema }, '{"title":5}')).toThrow(
      "Response does not match schema: title: Expected string, received number",
    );
  });
});

describe("fromJsonSchema", () => {
  const schema = fromJsonSchema({
    type: "object",
    properties: {
      name: { type: "string" },
      count: { type: "integer" },
      tags: { type: "array", items: { type: "string" } },
      level: { enum: ["low", "high"] },
    },
    required: ["name", "count"],
  });

  it("accepts matching values and keeps unknown keys", () => {
    const result = schema.validator.safeParse({ name: "a", count: 2, tags: ["x"], level: "low", extra: true });
    expect(result.success).toBe(true);
  });

  it("rejects missing required fields", () => {
    expect(schema.validator.safeParse({ name: "a" }).success).toBe(false);
  });

  it("rejects wrong nested types and enum values", () => {
    expect(schema.validator.safeParse({ name: "a", count: 1.5 }).success).toBe(false);
    expect(schema.validator.safeParse({ name: "a", count: 1, tags: [1] }).success).toBe(false);
    expect(schema.validator.safeParse({ name: "a", count: 1, level: "mid" }).success).toBe(false);
  });
});
