import type { ParamSpec, ToolDescriptor } from "./descriptors.js";

export type CoerceResult =
  | { readonly ok: true; readonly args: Record<string, unknown> }
  | { readonly ok: false; readonly error: string };

const TRUE_STRINGS = new Set(["true", "1", "yes", "on"]);
const FALSE_STRINGS = new Set(["false", "0", "no", "off"]);

type ValueResult = { ok: true; value: unknown } | { ok: false; error: string };

function coerceNumber(raw: unknown): number | undefined {
  if (typeof raw === "number") return Number.isFinite(raw) ? raw : undefined;
  if (typeof raw === "string" && raw.trim() !== "") {
    const value = Number(raw.trim());
    return Number.isFinite(value) ? value : undefined;
  }
  return undefined;
}

function coerceStringList(raw: unknown): string[] | undefined {
  if (Array.isArray(raw)) {
    const items: string[] = [];
    for (const item of raw) {
      if (typeof item === "string") items.push(item);
      else if (typeof item === "number" || typeof item === "boolean") items.push(String(item));
      else return undefined;
    }
    return items;
  }
  if (typeof raw !== "string") return undefined;

  const trimmed = raw.trim();
  if (trimmed.startsWith("[")) {
    try {
      return coerceStringList(JSON.parse(trimmed));
    } catch {
      return undefined;
    }
  }
  return trimmed
    .split(",")
    .map((part) => part.trim())
    .filter((part) => part.length > 0);
}

function coerceValue(name: string, spec: ParamSpec, raw: unknown): ValueResult {
  switch (spec.type) {
    case "string":
      if (typeof raw === "string") return { ok: true, value: raw };
      if (typeof raw === "number" || typeof raw === "boolean") return { ok: true, value: String(raw) };
      return { ok: false, error: `${name} must be a string` };

    case "number":
    case "integer": {
      const value = coerceNumber(raw);
      if (value === undefined) return { ok: false, error: `${name} must be a number` };
      if (spec.type === "integer" && !Number.isInteger(value)) {
        return { ok: false, error: `${name} must be an integer` };
      }
      if (spec.min !== undefined && value < spec.min) {
        return { ok: false, error: `${name} must be at least ${spec.min}` };
      }
      if (spec.max !== undefined && value > spec.max) {
        return { ok: false, error: `${name} must be at most ${spec.max}` };
      }
      return { ok: true, value };
    }

    case "boolean": {
      if (typeof raw === "boolean") return { ok: true, value: raw };
      const text = String(raw).trim().toLowerCase();
      if (TRUE_STRINGS.has(text)) return { ok: true, value: true };
      if (FALSE_STRINGS.has(text)) return { ok: true, value: false };
      return { ok: false, error: `${name} must be a boolean` };
    }

    case "string[]": {
      const value = coerceStringList(raw);
      if (value === undefined) return { ok: false, error: `${name} must be a list of strings` };
      return { ok: true, value };
    }
  }
}

/**
 * Converts raw model arguments (tagged calls carry only strings) to the types
 * declared by the descriptor. Aliases are folded into their canonical name;
 * arguments the descriptor does not declare are dropped.
 */
export function coerceArguments(
  descriptor: ToolDescriptor,
  raw: Readonly<Record<string, unknown>>,
): CoerceResult {
  const args: Record<string, unknown> = {};

  for (const [name, spec] of Object.entries(descriptor.params)) {
    const key = [name, ...(spec.aliases ?? [])].find(
      (candidate) => raw[candidate] !== undefined && raw[candidate] !== null,
    );
    if (key === undefined) {
      if (spec.required) return { ok: false, error: `Missing required argument: ${name}` };
      continue;
    }

    const result = coerceValue(name, spec, raw[key]);
    if (!result.ok) return result;

    if (spec.enum && !spec.enum.some((allowed) => allowed === result.value)) {
      return { ok: false, error: `${name} must be one of: ${spec.enum.join(", ")}` };
    }
    args[name] = result.value;
  }

  return { ok: true, args };
}
