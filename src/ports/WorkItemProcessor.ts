import type { ValidatedWorkItem } from "../core/work-items/workItem.types";

export type ProcessContext = {
  signal: AbortSignal;
  deadline: Date;
};

export type ProcessResult =
  | { status: "success"; result?: Record<string, unknown> }
  | { status: "failure"; error: string; retryable?: boolean };

/**
 * Executes one work item (agent invocation, form handling, ...). May be called more
 * than once for the same item after a replica crash, so implementations must be
 * idempotent-safe.
 */
export interface WorkItemProcessor {
  process(item: ValidatedWorkItem, ctx: ProcessContext): Promise<ProcessResult>;
}
