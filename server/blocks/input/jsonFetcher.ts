import { readStringParameter } from "../parameters.js";
import { requestJson } from "../http.js";
import { extractJsonPath, parseHeaderJson, toItemList } from "../templates.js";
import type { InputBlockDefinition } from "../types.js";

function parsePostData(raw: string, log: (message: string) => void): unknown {
  const normalized = raw.trim();
  if (normalized.length === 0) {
    return {};
  }
  try {
    return JSON.parse(normalized);
  } catch {
    log(`Invalid postData JSON, sending an empty object: ${normalized}`);
    return {};
  }
}

export const jsonFetcherBlock: InputBlockDefinition = {
  type: "input",
  name: "json-fetcher",
  label: "JSON Fetcher",
  version: "1.0",
  description: "Fetches JSON from a URL and turns it into items",
  targetUrl: null,
  parameters: {
    method: {
      type: "string",
      required: false,
      description: "HTTP method (GET or POST)",
      default: "GET"
    },
    headers: {
      type: "string",
      required: false,
      description: "Request headers as a JSON object",
      default: "{}"
    },
    postData: {
      type: "string",
      required: false,
      description: "JSON body sent with POST requests",
      default: "{}"
    },
    jsonPath: {
      type: "string",
      required: false,
      description: "Dot-separated path to the items inside the response, e.g. data.items",
      default: ""
    }
  },
  async collect(url, parameters, context) {
    const method = readStringParameter(parameters, "method", "GET").trim().toUpperCase() || "GET";
    const headers = parseHeaderJson(readStringParameter(parameters, "headers", "{}"), context.log);
    const body = method === "POST" ? parsePostData(readStringParameter(parameters, "postData", "{}"), context.log) : undefined;

    const payload = await requestJson(context, url, { method, headers, body });
    const items = toItemList(extractJsonPath(payload, readStringParameter(parameters, "jsonPath")));
    context.log(`Fetched ${items.length} item(s) from ${url}`);
    return items;
  }
};
