import type { Express, Request, Response } from "express";
import type { BlockRegistry } from "../../blocks/registry.js";
import { capitalize } from "../../errors.js";
import { BLOCK_TYPES, type BlockType } from "../../types.js";
import { firstParam } from "./helpers.js";

export interface BlockRouteDependencies {
  registry: BlockRegistry;
}

function parseBlockType(value: string): BlockType | null {
  return BLOCK_TYPES.find((type) => type === value) ?? null;
}

export function registerBlockRoutes(app: Express, deps: BlockRouteDependencies): void {
  app.get("/api/blocks", (_request: Request, response: Response) => {
    response.json({
      input: deps.registry.describe("input"),
      processing: deps.registry.describe("processing"),
      action: deps.registry.describe("action")
    });
  });

  app.get("/api/blocks/:type", (request: Request, response: Response) => {
    const type = parseBlockType(firstParam(request.params.type));
    if (!type) {
      response.status(404).json({ error: "Unknown block type" });
      return;
    }

    response.json({ type, blocks: deps.registry.describe(type) });
  });

  app.get("/api/blocks/:type/:name/parameters", (request: Request, response: Response) => {
    const rawType = firstParam(request.params.type);
    const name = firstParam(request.params.name);
    const type = parseBlockType(rawType);
    const definition = type ? deps.registry.get(type, name) : undefined;
    if (!definition) {
      response.status(404).json({ error: `${capitalize(rawType)} block ${name} not found` });
      return;
    }

    response.json({ type: definition.type, name: definition.name, parameters: definition.parameters });
  });
}
