import type {
  BlockParameterSpecMap,
  BlockParameters,
  BlockType,
  JsonObject
} from "../types.js";

export type FetchFn = typeof fetch;

export interface ItemStateStore {
  hasItem: (taskId: string, itemHash: string) => boolean;
  recordItems: (taskId: string, itemHashes: string[]) => void;
}

export interface BlockContext {
  taskId: string;
  signal: AbortSignal;
  log: (message: string) => void;
  itemStates: ItemStateStore;
  fetchFn: FetchFn;
}

interface BlockMetadata {
  name: string;
  label: string;
  version: string;
  description: string;
  parameters: BlockParameterSpecMap;
}

export interface InputBlockDefinition extends BlockMetadata {
  type: "input";
  /** Fixed source URL, or null when the task supplies one. */
  targetUrl: string | null;
  collect: (url: string, parameters: BlockParameters, context: BlockContext) => Promise<JsonObject[]>;
}

export interface ProcessingBlockDefinition extends BlockMetadata {
  type: "processing";
  process: (items: JsonObject[], parameters: BlockParameters, context: BlockContext) => Promise<JsonObject[]>;
}

export interface ActionBlockDefinition extends BlockMetadata {
  type: "action";
  execute: (item: JsonObject, parameters: BlockParameters, context: BlockContext) => Promise<JsonObject>;
}

export type BlockDefinition = InputBlockDefinition | ProcessingBlockDefinition | ActionBlockDefinition;

export interface BlockDescriptor {
  type: BlockType;
  name: string;
  label: string;
  version: string;
  description: string;
  parameters: BlockParameterSpecMap;
  targetUrl?: string | null;
}
