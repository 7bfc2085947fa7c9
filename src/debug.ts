const DEBUG_ENABLED = process.env.AERIAL_RETRIEVAL_DEBUG === "1";

export type DebugLog = (...args: unknown[]) => void;

export function createDebugLog(tag: string): DebugLog {
  return (...args: unknown[]) => {
    if (DEBUG_ENABLED) {
      console.debug(`[${tag}]`, ...args);
    }
  };
}
