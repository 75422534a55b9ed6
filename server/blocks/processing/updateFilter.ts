import { createHash } from "node:crypto";
import type { JsonObject } from "../../types.js";
import { readListParameter } from "../parameters.js";
import { stringifyTemplateValue } from "../templates.js";
import type { ProcessingBlockDefinition } from "../types.js";

export function computeItemHash(item: JsonObject, excludeFields: readonly string[] = []): string {
  const excluded = new Set(excludeFields);
  const keyData: Record<string, string> = {};
  for (const key of Object.keys(item).sort()) {
    if (!excluded.has(key)) {
      keyData[key] = stringifyTemplateValue(item[key]);
    }
  }
  return createHash("sha256").update(JSON.stringify(keyData)).digest("hex");
}

export const updateFilterBlock: ProcessingBlockDefinition = {
  type: "processing",
  name: "update-filter",
  label: "Update Filter",
  version: "1.0",
  description: "Passes on only items this task has not seen before",
  parameters: {
    excludeFields: {
      type: "string",
      required: false,
      description: "Comma-separated fields ignored when deciding whether an item is new",
      default: ""
    }
  },
  async process(items, parameters, context) {
    const excludeFields = readListParameter(parameters, "excludeFields");
    const seenInBatch = new Set<string>();
    const fresh: JsonObject[] = [];

    for (const item of items) {
      const itemHash = computeItemHash(item, excludeFields);
      if (seenInBatch.has(itemHash) || context.itemStates.hasItem(context.taskId, itemHash)) {
        continue;
      }
      seenInBatch.add(itemHash);
      fresh.push(item);
    }

    if (seenInBatch.size > 0) {
      context.itemStates.recordItems(context.taskId, [...seenInBatch]);
    }
    context.log(`${fresh.length} of ${items.length} item(s) are new`);
    return fresh;
  }
};
