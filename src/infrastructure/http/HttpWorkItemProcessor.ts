import { z } from "zod";
import type { ValidatedWorkItem } from "../../core/work-items/workItem.types";
import type { ProcessContext, ProcessResult, WorkItemProcessor } from "../../ports/WorkItemProcessor";
import { HttpRequestError, type HttpJsonClient } from "./httpJsonClient";

const processResponseSchema = z.discriminatedUnion("status", [
  z.object({ status: z.literal("success"), result: z.record(z.unknown()).optional() }),
  z.object({ status: z.literal("failure"), error: z.string(), retryable: z.boolean().optional() })
]);

/**
 * Hands a work item to the agent-execution service:
 * `POST {base}/work-items/{id}/process`.
 */
export class HttpWorkItemProcessor implements WorkItemProcessor {
  constructor(private readonly client: HttpJsonClient) {}

  async process(item: ValidatedWorkItem, ctx: ProcessContext): Promise<ProcessResult> {
    let body: unknown;
    try {
      body = await this.client.postJson(
        ["work-items", item.id, "process"],
        {
          tenantId: item.tenantId,
          procInstId: item.procInstId,
          activityName: item.activityName,
          attemptCount: item.attemptCount,
          draft: item.draft,
          deadline: ctx.deadline.toISOString()
        },
        { signal: ctx.signal }
      );
    } catch (err) {
      // The service rejected the item itself; retrying the same request cannot succeed.
      if (err instanceof HttpRequestError && err.status !== undefined && err.status >= 400 && err.status < 500 && err.status !== 429) {
        return { status: "failure", error: `processor rejected work item: ${err.status}`, retryable: false };
      }
      throw err;
    }

    const parsed = processResponseSchema.safeParse(body);
    if (!parsed.success) {
      return { status: "failure", error: "processor returned an unexpected response", retryable: true };
    }
    return parsed.data;
  }
}
