import { BLOCK_TYPES, type BlockType } from "../types.js";
import type {
  ActionBlockDefinition,
  BlockDefinition,
  BlockDescriptor,
  InputBlockDefinition,
  ProcessingBlockDefinition
} from "./types.js";

function toDescriptor(definition: BlockDefinition): BlockDescriptor {
  const descriptor: BlockDescriptor = {
    type: definition.type,
    name: definition.name,
    label: definition.label,
    version: definition.version,
    description: definition.description,
    parameters: structuredClone(definition.parameters)
  };

  if (definition.type === "input") {
    descriptor.targetUrl = definition.targetUrl;
  }

  return descriptor;
}

export class BlockRegistry {
  private readonly blocks: Record<BlockType, Map<string, BlockDefinition>> = {
    input: new Map(),
    processing: new Map(),
    action: new Map()
  };

  register(definition: BlockDefinition): void {
    const entries = this.blocks[definition.type];
    if (entries.has(definition.name)) {
      console.warn(`[blocks] Replacing ${definition.type} block "${definition.name}".`);
    }
    entries.set(definition.name, definition);
  }

  get(type: BlockType, name: string): BlockDefinition | undefined {
    return this.blocks[type].get(name);
  }

  getInput(name: string): InputBlockDefinition | undefined {
    const definition = this.blocks.input.get(name);
    return definition?.type === "input" ? definition : undefined;
  }

  getProcessing(name: string): ProcessingBlockDefinition | undefined {
    const definition = this.blocks.processing.get(name);
    return definition?.type === "processing" ? definition : undefined;
  }

  getAction(name: string): ActionBlockDefinition | undefined {
    const definition = this.blocks.action.get(name);
    return definition?.type === "action" ? definition : undefined;
  }

  list(type: BlockType): BlockDefinition[] {
    return [...this.blocks[type].values()].sort((left, right) => left.name.localeCompare(right.name));
  }

  describe(type?: BlockType): BlockDescriptor[] {
    const types = type ? [type] : BLOCK_TYPES;
    return types.flatMap((entry) => this.list(entry).map((definition) => toDescriptor(definition)));
  }

  counts(): Record<BlockType, number> {
    return {
      input: this.blocks.input.size,
      processing: this.blocks.processing.size,
      action: this.blocks.action.size
    };
  }
}
