export type BlockType = "input" | "processing" | "action";
export type ChainBlockType = Exclude<BlockType, "input">;
export type BlockParameterType = "string" | "integer" | "float" | "boolean";
export type BlockParameterValue = string | number | boolean;
export type TaskStatus = "pending" | "running" | "completed" | "failed";
export type RunTrigger = "manual" | "schedule";
export type RunStatus = "running" | "completed" | "failed" | "cancelled";
export type StageStatus = "pending" | "running" | "completed" | "failed" | "skipped";

export type JsonObject = Record<string, unknown>;
export type BlockParameters = Record<string, BlockParameterValue>;

export const BLOCK_TYPES: readonly BlockType[] = ["input", "processing", "action"];

export interface BlockParameterSpec {
  type: BlockParameterType;
  required: boolean;
  description: string;
  default?: BlockParameterValue;
}

export type BlockParameterSpecMap = Record<string, BlockParameterSpec>;

export interface BlockRef {
  type: ChainBlockType;
  name: string;
}

export interface TaskParameters {
  input: BlockParameters;
  processing: Record<string, BlockParameters>;
  action: Record<string, BlockParameters>;
}

export interface BlockData {
  input: JsonObject[];
  processing: Record<string, JsonObject[]>;
  action: Record<string, JsonObject[]>;
}

export interface TaskSchedule {
  cron: string;
  timezone: string;
}

export interface Task {
  id: string;
  name: string;
  inputBlock: string;
  targetUrl: string;
  blockChain: BlockRef[];
  parameters: TaskParameters;
  schedule: TaskSchedule;
  status: TaskStatus;
  lastRun?: string;
  lastError?: string;
  createdAt: string;
  updatedAt: string;
  blockData: BlockData;
}

export interface TaskInput {
  name: string;
  inputBlock: string;
  targetUrl: string;
  blockChain: BlockRef[];
  parameters: TaskParameters;
  schedule: TaskSchedule;
}

export interface StageResult {
  index: number;
  type: BlockType;
  name: string;
  status: StageStatus;
  inputCount: number;
  outputCount: number;
  errorCount: number;
  startedAt?: string;
  finishedAt?: string;
  error?: string;
}

export interface TaskRun {
  id: string;
  taskId: string;
  taskName: string;
  trigger: RunTrigger;
  status: RunStatus;
  startedAt: string;
  finishedAt?: string;
  logs: string[];
  stages: StageResult[];
  error?: string;
}

export interface ItemStateRecord {
  taskId: string;
  itemHash: string;
  createdAt: string;
}

export interface AppState {
  tasks: Task[];
  runs: TaskRun[];
  itemStates: ItemStateRecord[];
}

export type TaskEventType = "status" | "stage" | "log";

export interface TaskEvent {
  type: TaskEventType;
  taskId: string;
  runId: string;
  status?: RunStatus | TaskStatus;
  stage?: StageResult;
  message?: string;
  at: string;
}

export function createEmptyBlockData(): BlockData {
  return {
    input: [],
    processing: {},
    action: {}
  };
}

export function createEmptyTaskParameters(): TaskParameters {
  return {
    input: {},
    processing: {},
    action: {}
  };
}
