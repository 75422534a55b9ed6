import type { JsonObject } from "../types.js";

export type MissingValueMode = "marker" | "empty" | "keep";

export interface RenderTemplateOptions {
  missing: MissingValueMode;
  objectFormat?: "compact" | "pretty";
  escape?: (value: string) => string;
}

const placeholderPattern = /\{\{([^{}]+)\}\}/g;

export function isJsonObject(value: unknown): value is JsonObject {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

export function lookupPath(source: unknown, path: string): unknown {
  let current: unknown = source;
  for (const key of path.split(".")) {
    if (isJsonObject(current) && Object.hasOwn(current, key)) {
      current = current[key];
    } else if (Array.isArray(current) && /^\d+$/.test(key) && Number.parseInt(key, 10) < current.length) {
      current = current[Number.parseInt(key, 10)];
    } else {
      return undefined;
    }
  }
  return current;
}

export function stringifyTemplateValue(value: unknown, objectFormat: "compact" | "pretty" = "compact"): string {
  if (value === null || value === undefined) {
    return "";
  }
  if (typeof value === "object") {
    return objectFormat === "pretty" ? JSON.stringify(value, null, 2) : JSON.stringify(value);
  }
  return String(value);
}

export function escapeJsonString(value: string): string {
  return JSON.stringify(value).slice(1, -1);
}

/**
 * Replaces `{{ path }}` placeholders with values looked up in `item`.
 * Paths are trimmed and use dots for nested keys.
 */
export function renderTemplate(template: string, item: JsonObject, options: RenderTemplateOptions): string {
  return template.replace(placeholderPattern, (placeholder: string, rawPath: string) => {
    const path = rawPath.trim();
    const value = path.length > 0 ? lookupPath(item, path) : undefined;

    if (value === undefined) {
      if (options.missing === "keep") {
        return placeholder;
      }
      return options.missing === "marker" ? `{missing:${path}}` : "";
    }

    const rendered = stringifyTemplateValue(value, options.objectFormat);
    return options.escape ? options.escape(rendered) : rendered;
  });
}

export function extractJsonPath(value: unknown, path: string): unknown {
  const normalized = path.trim();
  if (normalized.length === 0) {
    return value;
  }

  const extracted = lookupPath(value, normalized);
  return extracted === undefined ? {} : extracted;
}

export function parseHeaderJson(raw: string, log?: (message: string) => void): Record<string, string> {
  const normalized = raw.trim();
  if (normalized.length === 0) {
    return {};
  }

  try {
    const parsed: unknown = JSON.parse(normalized.replace(/'/g, '"'));
    if (!isJsonObject(parsed)) {
      log?.("Headers must be a JSON object; sending no custom headers.");
      return {};
    }

    const headers: Record<string, string> = {};
    for (const [key, value] of Object.entries(parsed)) {
      headers[key] = stringifyTemplateValue(value);
    }
    return headers;
  } catch {
    log?.(`Invalid headers JSON: ${normalized}`);
    return {};
  }
}

export function hasHeader(headers: Record<string, string>, name: string): boolean {
  const lowered = name.toLowerCase();
  return Object.keys(headers).some((key) => key.toLowerCase() === lowered);
}

/** Coerces a decoded payload into a list of items. */
export function toItemList(value: unknown): JsonObject[] {
  if (isJsonObject(value)) {
    return [value];
  }
  if (Array.isArray(value)) {
    return value.map((entry: unknown) => (isJsonObject(entry) ? entry : { value: entry }));
  }
  return [];
}
