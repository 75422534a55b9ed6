import type { BlockContext } from "./types.js";
import { hasHeader } from "./templates.js";

export interface JsonRequestOptions {
  method: string;
  headers: Record<string, string>;
  body?: unknown;
}

function withJsonHeaders(headers: Record<string, string>): Record<string, string> {
  const merged = { ...headers };
  if (!hasHeader(merged, "Content-Type")) {
    merged["Content-Type"] = "application/json";
  }
  if (!hasHeader(merged, "Accept")) {
    merged.Accept = "application/json";
  }
  return merged;
}

export async function requestJson(context: BlockContext, url: string, options: JsonRequestOptions): Promise<unknown> {
  const method = options.method.trim().toUpperCase() || "GET";
  const response = await context.fetchFn(url, {
    method,
    headers: withJsonHeaders(options.headers),
    body: method === "GET" || options.body === undefined ? undefined : JSON.stringify(options.body),
    signal: context.signal
  });

  if (!response.ok) {
    throw new Error(`Request to ${url} failed with status ${response.status}`);
  }

  const text = await response.text();
  try {
    return JSON.parse(text);
  } catch {
    throw new Error(`Response from ${url} is not valid JSON`);
  }
}
