import { createAbortError, isAbortError, throwIfAborted } from "../abort.js";
import type { BlockRegistry } from "../blocks/registry.js";
import type { BlockContext } from "../blocks/types.js";
import { BlockNotFoundError, toErrorMessage } from "../errors.js";
import {
  createEmptyBlockData,
  type BlockData,
  type BlockType,
  type JsonObject,
  type StageResult,
  type Task
} from "../types.js";

export interface StageRef {
  index: number;
  type: BlockType;
  name: string;
}

export interface StageStartEvent extends StageRef {
  inputCount: number;
}

export interface StageFinishEvent extends StageRef {
  status: "completed" | "failed" | "skipped";
  inputCount: number;
  outputCount: number;
  errorCount: number;
  error?: string;
}

export interface ExecuteBlockChainOptions {
  task: Pick<Task, "inputBlock" | "targetUrl" | "blockChain" | "parameters">;
  registry: BlockRegistry;
  context: BlockContext;
  onStageStart?: (event: StageStartEvent) => void;
  onStageFinish?: (event: StageFinishEvent) => void;
}

export interface BlockChainResult {
  blockData: BlockData;
  items: JsonObject[];
}

interface StageOutput {
  items: JsonObject[];
  errorCount: number;
}

export function listStages(task: Pick<Task, "inputBlock" | "blockChain">): StageRef[] {
  return [
    { index: 0, type: "input", name: task.inputBlock },
    ...task.blockChain.map((ref, position) => ({ index: position + 1, type: ref.type, name: ref.name }))
  ];
}

export function createPendingStages(task: Pick<Task, "inputBlock" | "blockChain">): StageResult[] {
  return listStages(task).map((stage): StageResult => ({
    ...stage,
    status: "pending",
    inputCount: 0,
    outputCount: 0,
    errorCount: 0
  }));
}

async function runStage(
  stage: StageRef,
  items: JsonObject[],
  options: ExecuteBlockChainOptions
): Promise<StageOutput> {
  const { task, registry, context } = options;

  if (stage.type === "input") {
    const block = registry.getInput(stage.name);
    if (!block) {
      throw new BlockNotFoundError("input", stage.name);
    }
    return { items: await block.collect(task.targetUrl, task.parameters.input, context), errorCount: 0 };
  }

  if (stage.type === "processing") {
    const block = registry.getProcessing(stage.name);
    if (!block) {
      throw new BlockNotFoundError("processing", stage.name);
    }
    return { items: await block.process(items, task.parameters.processing[stage.name] ?? {}, context), errorCount: 0 };
  }

  const block = registry.getAction(stage.name);
  if (!block) {
    throw new BlockNotFoundError("action", stage.name);
  }

  const parameters = task.parameters.action[stage.name] ?? {};
  const results: JsonObject[] = [];
  let errorCount = 0;
  for (const item of items) {
    throwIfAborted(context.signal);
    try {
      results.push(await block.execute(item, parameters, context));
    } catch (error) {
      if (context.signal.aborted && isAbortError(error)) {
        throw error;
      }
      errorCount += 1;
      context.log(`Action ${stage.name} failed for an item: ${toErrorMessage(error)}`);
      results.push({ error: toErrorMessage(error), item });
    }
  }

  return { items: results, errorCount };
}

/**
 * Runs the input block and then every chain block in order, feeding each
 * stage the previous stage's output. Stages after a failure or a
 * cancellation are reported as skipped.
 */
export async function executeBlockChain(options: ExecuteBlockChainOptions): Promise<BlockChainResult> {
  const { context, onStageStart, onStageFinish } = options;
  const stages = listStages(options.task);
  const blockData = createEmptyBlockData();
  let current: JsonObject[] = [];

  const skipRemaining = (fromIndex: number) => {
    for (const stage of stages.slice(fromIndex)) {
      onStageFinish?.({ ...stage, status: "skipped", inputCount: 0, outputCount: 0, errorCount: 0 });
    }
  };

  for (const stage of stages) {
    if (context.signal.aborted) {
      skipRemaining(stage.index);
    }
    throwIfAborted(context.signal);

    const inputCount = current.length;
    onStageStart?.({ ...stage, inputCount });

    let output: StageOutput;
    try {
      output = await runStage(stage, current, options);
    } catch (error) {
      const cancelled = context.signal.aborted && isAbortError(error);
      const message =
        cancelled || error instanceof BlockNotFoundError
          ? toErrorMessage(error)
          : `Error executing ${stage.type} block ${stage.name}: ${toErrorMessage(error)}`;

      onStageFinish?.({ ...stage, status: "failed", inputCount, outputCount: 0, errorCount: 0, error: message });
      skipRemaining(stage.index + 1);

      if (cancelled) {
        throw createAbortError("Run cancelled");
      }
      if (error instanceof BlockNotFoundError) {
        throw error;
      }
      throw new Error(message, { cause: error });
    }

    if (stage.type === "input") {
      blockData.input = output.items;
    } else {
      blockData[stage.type][stage.name] = output.items;
    }
    current = output.items;

    onStageFinish?.({
      ...stage,
      status: "completed",
      inputCount,
      outputCount: output.items.length,
      errorCount: output.errorCount
    });
  }

  return { blockData, items: current };
}
