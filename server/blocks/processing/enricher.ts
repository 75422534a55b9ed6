import { toErrorMessage } from "../../errors.js";
import type { JsonObject } from "../../types.js";
import { requestJson } from "../http.js";
import { readStringParameter } from "../parameters.js";
import { escapeJsonString, extractJsonPath, isJsonObject, parseHeaderJson, renderTemplate } from "../templates.js";
import type { BlockContext, ProcessingBlockDefinition } from "../types.js";

interface EnrichmentRequest {
  url: string;
  method: string;
  headers: Record<string, string>;
  bodyTemplate: string;
  jsonPath: string;
}

async function fetchEnrichment(item: JsonObject, request: EnrichmentRequest, context: BlockContext): Promise<unknown> {
  const url = renderTemplate(request.url, item, { missing: "empty" });
  const body =
    request.method === "POST"
      ? JSON.parse(renderTemplate(request.bodyTemplate, item, { missing: "empty", escape: escapeJsonString }))
      : undefined;

  const payload = await requestJson(context, url, {
    method: request.method,
    headers: request.headers,
    body
  });
  return extractJsonPath(payload, request.jsonPath);
}

export const enricherBlock: ProcessingBlockDefinition = {
  type: "processing",
  name: "enricher",
  label: "Enricher",
  version: "1.0",
  description: "Calls an API for each item and merges the response into it",
  parameters: {
    urlTemplate: {
      type: "string",
      required: true,
      description: "URL with {{field}} placeholders, e.g. https://api.example.com/users/{{id}}"
    },
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
    bodyTemplate: {
      type: "string",
      required: false,
      description: "JSON body template for POST requests",
      default: "{}"
    },
    jsonPath: {
      type: "string",
      required: false,
      description: "Dot-separated path to the data inside the response",
      default: ""
    },
    mergeStrategy: {
      type: "string",
      required: false,
      description: "merge spreads the response over the item, append stores it under targetField",
      default: "merge"
    },
    targetField: {
      type: "string",
      required: false,
      description: "Field that receives the response when mergeStrategy is append",
      default: "enriched_data"
    }
  },
  async process(items, parameters, context) {
    const request: EnrichmentRequest = {
      url: readStringParameter(parameters, "urlTemplate"),
      method: readStringParameter(parameters, "method", "GET").trim().toUpperCase() || "GET",
      headers: parseHeaderJson(readStringParameter(parameters, "headers", "{}"), context.log),
      bodyTemplate: readStringParameter(parameters, "bodyTemplate", "{}"),
      jsonPath: readStringParameter(parameters, "jsonPath")
    };
    const strategy = readStringParameter(parameters, "mergeStrategy", "merge").trim();
    const targetField = readStringParameter(parameters, "targetField", "enriched_data").trim() || "enriched_data";

    const enriched: JsonObject[] = [];
    for (const item of items) {
      try {
        const data = await fetchEnrichment(item, request, context);
        if (strategy === "append") {
          enriched.push({ ...item, [targetField]: data });
        } else {
          enriched.push(isJsonObject(data) ? { ...item, ...data } : item);
        }
      } catch (error) {
        if (context.signal.aborted) {
          throw error;
        }
        context.log(`Enrichment failed, keeping original item: ${toErrorMessage(error)}`);
        enriched.push(item);
      }
    }

    return enriched;
  }
};
