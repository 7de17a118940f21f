import { z } from "zod";

export class InvalidDraftError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "InvalidDraftError";
  }
}

const draftEnvelopeSchema = z
  .object({
    kind: z.string().trim().min(1)
  })
  .passthrough();

const formDraftSchema = z
  .object({
    kind: z.literal("form"),
    formValues: z.record(z.unknown())
  })
  .passthrough();

const agentDraftSchema = z
  .object({
    kind: z.literal("agent"),
    agentMode: z.enum(["draft", "complete", "a2a"]),
    instruction: z.string().optional()
  })
  .passthrough();

export type FormDraft = z.infer<typeof formDraftSchema>;
export type AgentDraft = z.infer<typeof agentDraftSchema>;
// Kinds this service does not know yet; fields are carried through untouched.
export type OpaqueDraft = z.infer<typeof draftEnvelopeSchema>;

export type WorkItemDraft = FormDraft | AgentDraft | OpaqueDraft;

const describeIssues = (error: z.ZodError): string =>
  error.issues
    .map((issue) => (issue.path.length > 0 ? `${issue.path.join(".")}: ${issue.message}` : issue.message))
    .join("; ");

const parseWith = <T>(schema: z.ZodType<T, z.ZodTypeDef, unknown>, raw: unknown, kind: string): T => {
  const parsed = schema.safeParse(raw);
  if (!parsed.success) {
    throw new InvalidDraftError(`Invalid ${kind} draft: ${describeIssues(parsed.error)}`);
  }
  return parsed.data;
};

/**
 * Validates a stored draft against the schema of its kind.
 * Throws InvalidDraftError when the draft is not an object with a non-empty `kind`,
 * or when a known kind is missing required fields.
 */
export const parseWorkItemDraft = (raw: unknown): WorkItemDraft => {
  const envelope = parseWith(draftEnvelopeSchema, raw, "work item");

  switch (envelope.kind) {
    case "form":
      return parseWith(formDraftSchema, raw, "form");
    case "agent":
      return parseWith(agentDraftSchema, raw, "agent");
    default:
      return envelope;
  }
};
