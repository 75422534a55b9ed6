import { readStringParameter } from "../parameters.js";
import { escapeJsonString, isJsonObject, renderTemplate } from "../templates.js";
import type { ProcessingBlockDefinition } from "../types.js";
import type { JsonObject } from "../../types.js";

export const transformerBlock: ProcessingBlockDefinition = {
  type: "processing",
  name: "transformer",
  label: "Transformer",
  version: "1.0",
  description: "Reshapes each item with a JSON template using {{field}} placeholders",
  parameters: {
    template: {
      type: "string",
      required: true,
      description: 'JSON template, e.g. {"title": "{{name}}", "link": "{{links.self}}"}'
    }
  },
  async process(items, parameters, context) {
    const template = readStringParameter(parameters, "template");

    let serialized: string;
    try {
      serialized = JSON.stringify(JSON.parse(template));
    } catch {
      context.log("Transformer template is not valid JSON.");
      return items.map(() => ({ error: "Invalid template" }));
    }

    return items.map((item): JsonObject => {
      const rendered: unknown = JSON.parse(
        renderTemplate(serialized, item, { missing: "marker", escape: escapeJsonString })
      );
      return isJsonObject(rendered) ? rendered : { value: rendered };
    });
  }
};
