export const Stage = {
  LOADING_CONFIG: "loading_config",
  DISCOVERING_CONTENT: "discovering_content",
  RENDERING_TEMPLATES: "rendering_templates",
  COPYING_STATIC: "copying_static",
  DONE: "done",
} as const;

export type Stage = (typeof Stage)[keyof typeof Stage];

export interface ProgressEvent {
  stage: Stage;
  current: number;
  total: number;
  message: string;
}

/**
 * Receives progress synchronously. It must not throw or block.
 */
export type ProgressCallback = (event: ProgressEvent) => void;

export type ProgressReporter = (stage: Stage, current: number, total: number, message?: string) => void;

/**
 * Wrap an optional callback; without one, reporting is a no-op
 */
export function createProgressReporter(callback?: ProgressCallback): ProgressReporter {
  if (!callback) {
    return () => {};
  }
  return (stage, current, total, message = "") => {
    callback({ stage, current, total, message });
  };
}
