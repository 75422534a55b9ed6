import { toErrorMessage } from "../../errors.js";
import { readStringParameter } from "../parameters.js";
import { hasHeader, parseHeaderJson } from "../templates.js";
import type { ActionBlockDefinition } from "../types.js";

export const webhookBlock: ActionBlockDefinition = {
  type: "action",
  name: "webhook",
  label: "Webhook",
  version: "1.0",
  description: "POSTs each item as JSON to a URL",
  parameters: {
    webhookUrl: {
      type: "string",
      required: true,
      description: "URL that receives the item"
    },
    headers: {
      type: "string",
      required: false,
      description: "Request headers as a JSON object",
      default: "{}"
    }
  },
  async execute(item, parameters, context) {
    const headers = parseHeaderJson(readStringParameter(parameters, "headers", "{}"), context.log);
    if (!hasHeader(headers, "Content-Type")) {
      headers["Content-Type"] = "application/json";
    }

    try {
      const response = await context.fetchFn(readStringParameter(parameters, "webhookUrl"), {
        method: "POST",
        headers,
        body: JSON.stringify(item),
        signal: context.signal
      });

      return {
        statusCode: response.status,
        success: response.ok,
        response: await response.text(),
        item
      };
    } catch (error) {
      if (context.signal.aborted) {
        throw error;
      }
      return { statusCode: null, success: false, error: toErrorMessage(error), item };
    }
  }
};
