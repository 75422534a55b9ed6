import { emailBlock } from "./action/email.js";
import { slackBlock } from "./action/slack.js";
import { webhookBlock } from "./action/webhook.js";
import { jsonFetcherBlock } from "./input/jsonFetcher.js";
import { enricherBlock } from "./processing/enricher.js";
import { transformerBlock } from "./processing/transformer.js";
import { updateFilterBlock } from "./processing/updateFilter.js";
import { BlockRegistry } from "./registry.js";
import type { BlockDefinition } from "./types.js";

export const builtinBlocks: readonly BlockDefinition[] = [
  jsonFetcherBlock,
  transformerBlock,
  enricherBlock,
  updateFilterBlock,
  emailBlock,
  slackBlock,
  webhookBlock
];

export function createDefaultBlockRegistry(): BlockRegistry {
  const registry = new BlockRegistry();
  for (const block of builtinBlocks) {
    registry.register(block);
  }
  return registry;
}

export { BlockRegistry } from "./registry.js";
export { validateBlockParameters, validateTaskParameters, type RawTaskParameters } from "./parameters.js";
export type {
  ActionBlockDefinition,
  BlockContext,
  BlockDefinition,
  BlockDescriptor,
  FetchFn,
  InputBlockDefinition,
  ItemStateStore,
  ProcessingBlockDefinition
} from "./types.js";
