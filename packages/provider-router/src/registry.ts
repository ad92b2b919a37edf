import { ValidationError, type ValidationIssue } from "@quillgate/errors";
import type {
  ProviderDefinition,
  ProviderDescriptor,
  ProviderRegistry,
  RegistryOptions,
} from "./types.js";

/** Built-in backends, in their default auto-detection order */
export const BUILTIN_PROVIDERS: readonly ProviderDefinition[] = [
  {
    name: "gemini",
    requiredCredentials: ["GEMINI_API_KEY"],
    capabilities: ["text", "structured"],
    defaultModel: "gemini-2.0-flash-001",
    priorityRank: 1,
    pricing: { inRate: 0.0000001, outRate: 0.0000004 },
  },
  {
    name: "openrouter",
    requiredCredentials: ["OPENROUTER_API_KEY"],
    capabilities: ["text", "structured"],
    defaultModel: "openai/gpt-4-turbo",
    priorityRank: 2,
    pricing: { inRate: 0.00001, outRate: 0.00003 },
  },
  {
    name: "huggingface",
    requiredCredentials: ["HF_TOKEN"],
    capabilities: ["text", "structured"],
    defaultModel: "openai/gpt-oss-120b:groq",
    priorityRank: 3,
    pricing: { inRate: 0.00000015, outRate: 0.00000075 },
  },
];

function issue(field: string, message: string, code: string, value?: unknown): ValidationIssue {
  return value === undefined ? { field, message, code } : { field, message, code, value };
}

function validateDefinitions(
  definitions: readonly ProviderDefinition[],
  options: RegistryOptions,
): readonly ValidationIssue[] {
  const issues: ValidationIssue[] = [];
  const names = new Set<string>();
  const ranks = new Set<number>();

  if (definitions.length === 0) {
    issues.push(issue("providers", "At least one provider is required", "empty"));
  }

  definitions.forEach((def, i) => {
    const at = `providers[${i}]`;
    if (def.name.trim() === "") {
      issues.push(issue(`${at}.name`, "Provider name must not be empty", "empty"));
    }
    if (names.has(def.name)) {
      issues.push(issue(`${at}.name`, `Duplicate provider name "${def.name}"`, "duplicate", def.name));
    }
    names.add(def.name);

    if (!Number.isInteger(def.priorityRank)) {
      issues.push(issue(`${at}.priorityRank`, "Priority rank must be an integer", "type", def.priorityRank));
    }
    if (ranks.has(def.priorityRank)) {
      issues.push(
        issue(`${at}.priorityRank`, `Duplicate priority rank ${def.priorityRank}`, "duplicate", def.priorityRank),
      );
    }
    ranks.add(def.priorityRank);

    if (def.capabilities.length === 0) {
      issues.push(issue(`${at}.capabilities`, "At least one capability is required", "empty"));
    }
    if (def.requiredCredentials.length === 0) {
      issues.push(issue(`${at}.requiredCredentials`, "At least one credential is required", "empty"));
    }
    if (def.defaultModel.trim() === "") {
      issues.push(issue(`${at}.defaultModel`, "Default model must not be empty", "empty"));
    }
    if (!(def.pricing.inRate >= 0) || !(def.pricing.outRate >= 0)) {
      issues.push(issue(`${at}.pricing`, "Rates must be non-negative numbers", "too_small"));
    }
  });

  const seen = new Set<string>();
  for (const name of options.priorityOrder ?? []) {
    if (!names.has(name)) {
      issues.push(issue("priorityOrder", `Unknown provider "${name}"`, "unknown_provider", name));
    }
    if (seen.has(name)) {
      issues.push(issue("priorityOrder", `Provider "${name}" listed twice`, "duplicate", name));
    }
    seen.add(name);
  }

  for (const [name, model] of Object.entries(options.modelOverrides ?? {})) {
    if (!names.has(name)) {
      issues.push(issue("modelOverrides", `Unknown provider "${name}"`, "unknown_provider", name));
    }
    if (model.trim() === "") {
      issues.push(issue(`modelOverrides.${name}`, "Model override must not be empty", "empty"));
    }
  }

  return issues;
}

/** Reassign ranks so listed providers come first, in list order */
function applyPriorityOrder(
  definitions: readonly ProviderDefinition[],
  priorityOrder: readonly string[],
): ReadonlyMap<string, number> {
  const byRank = [...definitions].sort((a, b) => a.priorityRank - b.priorityRank);
  const listed = priorityOrder.filter((name) => byRank.some((d) => d.name === name));
  const rest = byRank.map((d) => d.name).filter((name) => !listed.includes(name));
  return new Map([...listed, ...rest].map((name, i): [string, number] => [name, i + 1]));
}

function freezeDescriptor(def: ProviderDefinition, rank: number, model: string): ProviderDescriptor {
  return Object.freeze({
    name: def.name,
    requiredCredentials: new Set(def.requiredCredentials),
    capabilities: new Set(def.capabilities),
    defaultModel: model,
    priorityRank: rank,
    pricing: Object.freeze({ ...def.pricing }),
  });
}

/**
 * Validate a provider table and build the immutable registry.
 *
 * @throws ValidationError (GENERATION_INVALID_CONFIG) listing every problem found
 */
export function createProviderRegistry(
  definitions: readonly ProviderDefinition[] = BUILTIN_PROVIDERS,
  options: RegistryOptions = {},
): ProviderRegistry {
  const issues = validateDefinitions(definitions, options);
  if (issues.length > 0) {
    throw new ValidationError({
      code: "GENERATION_INVALID_CONFIG",
      message: `Invalid provider registry: ${issues.map((i) => `${i.field}: ${i.message}`).join("; ")}`,
      issues,
    });
  }

  const ranks =
    options.priorityOrder !== undefined && options.priorityOrder.length > 0
      ? applyPriorityOrder(definitions, options.priorityOrder)
      : undefined;

  const descriptors = definitions
    .map((def) =>
      freezeDescriptor(
        def,
        ranks?.get(def.name) ?? def.priorityRank,
        options.modelOverrides?.[def.name] ?? def.defaultModel,
      ),
    )
    .sort((a, b) => a.priorityRank - b.priorityRank);

  const ordered: readonly ProviderDescriptor[] = Object.freeze(descriptors);
  const byName: ReadonlyMap<string, ProviderDescriptor> = new Map(ordered.map((d): [string, ProviderDescriptor] => [d.name, d]));
  const names: readonly string[] = Object.freeze(ordered.map((d) => d.name));

  return Object.freeze({
    get: (name: string) => byName.get(name),
    has: (name: string) => byName.has(name),
    list: () => ordered,
    names: () => names,
  });
}
