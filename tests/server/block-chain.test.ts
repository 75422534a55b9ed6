import { describe, expect, it } from "vitest";

import { isAbortError } from "../../server/abort.js";
import { BlockRegistry } from "../../server/blocks/registry.js";
import {
  createPendingStages,
  executeBlockChain,
  type StageFinishEvent,
  type StageStartEvent
} from "../../server/engine/chain.js";
import { BlockNotFoundError } from "../../server/errors.js";
import { createEmptyTaskParameters, type BlockRef, type JsonObject } from "../../server/types.js";
import { createBlockContext } from "../helpers/blockContext.js";

function readNumber(item: JsonObject): number {
  return typeof item.n === "number" ? item.n : 0;
}

function createTestRegistry(): BlockRegistry {
  const registry = new BlockRegistry();
  registry.register({
    type: "input",
    name: "static",
    label: "Static",
    version: "1.0",
    description: "Emits two items",
    targetUrl: null,
    parameters: {},
    collect: async () => [{ n: 1 }, { n: 2 }]
  });
  registry.register({
    type: "processing",
    name: "double",
    label: "Double",
    version: "1.0",
    description: "Doubles n",
    parameters: {},
    process: async (items) => items.map((item) => ({ n: readNumber(item) * 2 }))
  });
  registry.register({
    type: "processing",
    name: "explode",
    label: "Explode",
    version: "1.0",
    description: "Always fails",
    parameters: {},
    process: async () => {
      throw new Error("bad data");
    }
  });
  registry.register({
    type: "action",
    name: "collect",
    label: "Collect",
    version: "1.0",
    description: "Fails for n = 4",
    parameters: {},
    execute: async (item) => {
      if (readNumber(item) === 4) {
        throw new Error("boom");
      }
      return { ok: true, n: readNumber(item) };
    }
  });
  return registry;
}

function createTask(blockChain: BlockRef[]) {
  return {
    inputBlock: "static",
    targetUrl: "https://api.example.test/feed",
    blockChain,
    parameters: createEmptyTaskParameters()
  };
}

describe("block chain execution", () => {
  it("feeds each stage the previous output and records block data", async () => {
    const started: StageStartEvent[] = [];
    const finished: StageFinishEvent[] = [];
    const context = createBlockContext();

    const result = await executeBlockChain({
      task: createTask([
        { type: "processing", name: "double" },
        { type: "action", name: "collect" }
      ]),
      registry: createTestRegistry(),
      context,
      onStageStart: (event) => started.push(event),
      onStageFinish: (event) => finished.push(event)
    });

    expect(result.blockData).toEqual({
      input: [{ n: 1 }, { n: 2 }],
      processing: { double: [{ n: 2 }, { n: 4 }] },
      action: { collect: [{ ok: true, n: 2 }, { error: "boom", item: { n: 4 } }] }
    });
    expect(result.items).toEqual(result.blockData.action.collect);
    expect(started.map((event) => [event.name, event.inputCount])).toEqual([
      ["static", 0],
      ["double", 2],
      ["collect", 2]
    ]);
    expect(finished.map((event) => [event.name, event.status, event.outputCount, event.errorCount])).toEqual([
      ["static", "completed", 2, 0],
      ["double", "completed", 2, 0],
      ["collect", "completed", 2, 1]
    ]);
    expect(context.logs).toEqual(["Action collect failed for an item: boom"]);
  });

  it("wraps stage failures and skips the remaining stages", async () => {
    const finished: StageFinishEvent[] = [];

    await expect(
      executeBlockChain({
        task: createTask([
          { type: "processing", name: "explode" },
          { type: "action", name: "collect" }
        ]),
        registry: createTestRegistry(),
        context: createBlockContext(),
        onStageFinish: (event) => finished.push(event)
      })
    ).rejects.toThrow("Error executing processing block explode: bad data");

    expect(finished.map((event) => [event.name, event.status])).toEqual([
      ["static", "completed"],
      ["explode", "failed"],
      ["collect", "skipped"]
    ]);
    expect(finished[1].error).toBe("Error executing processing block explode: bad data");
  });

  it("reports unknown blocks without wrapping", async () => {
    const failure = await executeBlockChain({
      task: createTask([{ type: "action", name: "ghost" }]),
      registry: createTestRegistry(),
      context: createBlockContext()
    }).catch((error: unknown) => error);

    expect(failure).toBeInstanceOf(BlockNotFoundError);
    expect(failure).toHaveProperty("message", "Action block ghost not found");
  });

  it("stops before the first stage when the signal is already aborted", async () => {
    const controller = new AbortController();
    controller.abort();
    const finished: StageFinishEvent[] = [];

    const failure = await executeBlockChain({
      task: createTask([{ type: "processing", name: "double" }]),
      registry: createTestRegistry(),
      context: createBlockContext({ signal: controller.signal }),
      onStageFinish: (event) => finished.push(event)
    }).catch((error: unknown) => error);

    expect(isAbortError(failure)).toBe(true);
    expect(finished.map((event) => event.status)).toEqual(["skipped", "skipped"]);
  });

  it("creates pending stages for the input and every chain block", () => {
    expect(createPendingStages({ inputBlock: "static", blockChain: [{ type: "action", name: "collect" }] })).toEqual([
      { index: 0, type: "input", name: "static", status: "pending", inputCount: 0, outputCount: 0, errorCount: 0 },
      { index: 1, type: "action", name: "collect", status: "pending", inputCount: 0, outputCount: 0, errorCount: 0 }
    ]);
  });
});
