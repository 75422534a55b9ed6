import { BlockNotFoundError, TaskValidationError } from "../errors.js";
import type {
  BlockParameterSpec,
  BlockParameterValue,
  BlockParameters,
  BlockRef,
  TaskParameters
} from "../types.js";
import type { BlockRegistry } from "./registry.js";
import type { BlockDefinition } from "./types.js";

export interface RawTaskParameters {
  input?: Record<string, unknown>;
  processing?: Record<string, Record<string, unknown>>;
  action?: Record<string, Record<string, unknown>>;
}

function convertParameterValue(raw: unknown, spec: BlockParameterSpec): BlockParameterValue | undefined {
  switch (spec.type) {
    case "integer":
      if (typeof raw === "number" && Number.isInteger(raw)) {
        return raw;
      }
      if (typeof raw === "string" && /^[+-]?\d+$/.test(raw.trim())) {
        return Number.parseInt(raw.trim(), 10);
      }
      return undefined;
    case "float":
      if (typeof raw === "number" && Number.isFinite(raw)) {
        return raw;
      }
      if (typeof raw === "string" && raw.trim().length > 0 && Number.isFinite(Number(raw))) {
        return Number(raw);
      }
      return undefined;
    case "boolean":
      if (typeof raw === "boolean") {
        return raw;
      }
      if (typeof raw === "string") {
        return raw.trim().toLowerCase() === "true";
      }
      return undefined;
    case "string":
      if (typeof raw === "string") {
        return raw;
      }
      if (typeof raw === "number" || typeof raw === "boolean") {
        return String(raw);
      }
      return undefined;
  }
}

export function validateBlockParameters(
  definition: BlockDefinition,
  raw: Record<string, unknown> | undefined
): BlockParameters {
  const source = raw ?? {};
  const validated: BlockParameters = {};

  for (const [name, spec] of Object.entries(definition.parameters)) {
    const value = source[name];
    if (value !== undefined && value !== null) {
      const converted = convertParameterValue(value, spec);
      if (converted === undefined) {
        throw new TaskValidationError(`Invalid value for parameter ${name}: expected ${spec.type}`);
      }
      validated[name] = converted;
      continue;
    }

    // Defaults on required parameters only prefill forms.
    if (spec.required) {
      throw new TaskValidationError(`Required parameter ${name} is missing`);
    }

    if (spec.default !== undefined) {
      validated[name] = spec.default;
    }
  }

  return validated;
}

/**
 * Resolves every block a task references and validates its parameters.
 * Blocks that share a name in the chain share one parameter record.
 */
export function validateTaskParameters(
  registry: BlockRegistry,
  inputBlock: string,
  blockChain: BlockRef[],
  raw: RawTaskParameters | undefined
): TaskParameters {
  const input = registry.getInput(inputBlock);
  if (!input) {
    throw new BlockNotFoundError("input", inputBlock);
  }

  const parameters: TaskParameters = {
    input: validateBlockParameters(input, raw?.input),
    processing: {},
    action: {}
  };

  for (const ref of blockChain) {
    const definition = registry.get(ref.type, ref.name);
    if (!definition) {
      throw new BlockNotFoundError(ref.type, ref.name);
    }
    parameters[ref.type][ref.name] = validateBlockParameters(definition, raw?.[ref.type]?.[ref.name]);
  }

  return parameters;
}

export function readStringParameter(parameters: BlockParameters, name: string, fallback = ""): string {
  const value = parameters[name];
  if (value === undefined) {
    return fallback;
  }
  return typeof value === "string" ? value : String(value);
}

export function readListParameter(parameters: BlockParameters, name: string): string[] {
  return readStringParameter(parameters, name)
    .split(",")
    .map((entry) => entry.trim())
    .filter((entry) => entry.length > 0);
}
