/**
 * Structured output helpers: prompt instruction, reply cleanup and validation.
 */

import { createProviderError } from "@quillgate/errors";
import { z } from "zod";
import type { GenerationRequest, ResponseSchema } from "../types.js";

/**
 * Append the JSON schema to the prompt as an output instruction.
 */
export function withSchemaInstruction(
  prompt: string,
  jsonSchema: Readonly<Record<string, unknown>>,
): string {
  return `${prompt}

IMPORTANT: You must respond with valid JSON that matches this exact schema:
${JSON.stringify(jsonSchema, null, 2)}

Return ONLY the JSON object, no additional text or markdown formatting.`;
}

/** Prompt as sent upstream, with the schema instruction when one applies */
export function effectivePrompt(request: GenerationRequest): string {
  return request.schema ? withSchemaInstruction(request.prompt, request.schema.jsonSchema) : request.prompt;
}

/**
 * Remove a surrounding Markdown code fence (```json ... ```), if any.
 */
export function stripCodeFences(text: string): string {
  const trimmed = text.trim();
  if (!trimmed.startsWith("```")) return trimmed;
  return trimmed.replace(/^```(?:json)?\s*\n/, "").replace(/\n```\s*$/, "").trim();
}

/**
 * Turn reply text into the response payload.
 *
 * Text requests get the trimmed text. Structured requests get the parsed,
 * validated value; anything else is an UnknownError for the provider.
 */
export function decodePayload(providerId: string, request: GenerationRequest, text: string): unknown {
  if (!request.schema) return text.trim();

  const cleaned = stripCodeFences(text);
  let parsed: unknown;
  try {
    parsed = JSON.parse(cleaned);
  } catch (error) {
    throw createProviderError(
      "UnknownError",
      providerId,
      `Failed to parse JSON response: ${cleaned.slice(0, 200)}`,
      error instanceof Error ? { cause: error } : undefined,
    );
  }

  const result = request.schema.validator.safeParse(parsed);
  if (!result.success) {
    const detail = result.error.issues
      .map((i) => `${i.path.join(".") || "(root)"}: ${i.message}`)
      .join("; ");
    throw createProviderError("UnknownError", providerId, `Response does not match schema: ${detail}`);
  }
  return result.data;
}

// ---------------------------------------------------------------------------
// JSON schema → zod
// ---------------------------------------------------------------------------

function isRecord(value: unknown): value is Readonly<Record<string, unknown>> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function toZod(node: unknown): z.ZodTypeAny {
  if (!isRecord(node)) return z.unknown();

  const { enum: values } = node;
  if (Array.isArray(values) && values.length > 0) {
    return z.unknown().refine((v) => values.includes(v), {
      message: `Expected one of ${JSON.stringify(values)}`,
    });
  }

  switch (node.type) {
    case "string":
      return z.string();
    case "number":
      return z.number();
    case "integer":
      return z.number().int();
    case "boolean":
      return z.boolean();
    case "null":
      return z.null();
    case "array":
      return z.array(toZod(node.items));
    case "object": {
      const properties = isRecord(node.properties) ? node.properties : {};
      const required = new Set(
        Array.isArray(node.required) ? node.required.filter((r): r is string => typeof r === "string") : [],
      );
      const shape: Record<string, z.ZodTypeAny> = {};
      for (const [key, child] of Object.entries(properties)) {
        shape[key] = required.has(key) ? toZod(child) : toZod(child).optional();
      }
      return z.object(shape).passthrough();
    }
    default:
      return z.unknown();
  }
}

/**
 * Build a ResponseSchema from a plain JSON schema.
 *
 * Covers `type`, `properties`, `required`, `items` and `enum`; other
 * keywords are not enforced.
 */
export function fromJsonSchema(jsonSchema: Readonly<Record<string, unknown>>): ResponseSchema<unknown> {
  return { jsonSchema, validator: toZod(jsonSchema) };
}
