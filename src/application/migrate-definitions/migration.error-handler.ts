import { toErrorMessage } from "../../shared/logging/log";

export type MigrationFailureCode = "batch_read_failed" | "backup_failed" | "save_failed" | "lease_failed";

export type MigrationErrorContext = {
  batch: number;
  cursorAfterId: string | null;
  definitionId?: string;
  tenantId?: string;
};

export class MigrationFatalError extends Error {
  readonly code: MigrationFailureCode;
  readonly context: MigrationErrorContext;
  readonly cause?: unknown;

  constructor(args: { code: MigrationFailureCode; message: string; context: MigrationErrorContext; cause?: unknown }) {
    super(args.message);
    this.name = "MigrationFatalError";
    this.code = args.code;
    this.context = args.context;
    this.cause = args.cause;
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

const describeContext = (context: MigrationErrorContext) =>
  [
    `batch=${context.batch}`,
    `cursor=${context.cursorAfterId ?? "start"}`,
    context.tenantId && `tenant=${context.tenantId}`,
    context.definitionId && `id=${context.definitionId}`
  ]
    .filter(Boolean)
    .join(", ");

export const toMigrationFatalError = (
  reason: unknown,
  code: MigrationFailureCode,
  context: MigrationErrorContext
): MigrationFatalError => {
  if (reason instanceof MigrationFatalError) return reason;
  const message = `Migration failed at ${describeContext(context)}: ${toErrorMessage(reason)}`;
  const cause = reason instanceof Error ? reason.cause ?? reason : reason;
  return new MigrationFatalError({ code, message, context, cause });
};

export type MigrationSummary = {
  batches: number;
  migrated: number;
  unchanged: number;
  failed: number;
  skippedLocked: number;
  activitiesUpdated: number;
  lastCursor: string | null;
};

export const createMigrationSummaryTracker = () => {
  const summary: MigrationSummary = {
    batches: 0,
    migrated: 0,
    unchanged: 0,
    failed: 0,
    skippedLocked: 0,
    activitiesUpdated: 0,
    lastCursor: null
  };

  return {
    addBatch: (cursor: string) => {
      summary.batches += 1;
      summary.lastCursor = cursor;
    },
    addMigrated: (activities: number) => {
      summary.migrated += 1;
      summary.activitiesUpdated += activities;
    },
    addUnchanged: () => {
      summary.unchanged += 1;
    },
    addFailed: () => {
      summary.failed += 1;
    },
    addSkippedLocked: () => {
      summary.skippedLocked += 1;
    },
    summary: (): MigrationSummary => ({ ...summary })
  };
};
