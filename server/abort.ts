export function createAbortError(message = "Operation aborted"): Error {
  const error = new Error(message);
  error.name = "AbortError";
  return error;
}

export function isAbortError(error: unknown): boolean {
  if (!(error instanceof Error)) {
    return false;
  }

  if (error.name === "AbortError") {
    return true;
  }

  const message = error.message.toLowerCase();
  return message.includes("aborted") || message.includes("cancelled") || message.includes("canceled");
}

export function throwIfAborted(signal: AbortSignal | undefined, message = "Run cancelled"): void {
  if (signal?.aborted) {
    throw createAbortError(message);
  }
}
