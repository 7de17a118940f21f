import type { MigratedDefinition, MigrationTarget } from "../../ports/MigrationTargetRepository";

export type DefinitionMigrationResult =
  | ({ kind: "migrated"; activitiesUpdated: number } & MigratedDefinition)
  | { kind: "unchanged" };

/**
 * One-time rewrite of stored process definitions. Rows whose payload still contains
 * `pendingMarker` are eligible; a migrated row must no longer contain it.
 */
export type DefinitionMigration = {
  name: string;
  pendingMarker: string;
  migrate(target: MigrationTarget): DefinitionMigrationResult;
};

export class InvalidDefinitionError extends Error {
  readonly code = "invalid_definition";
  readonly context: { definitionId: string; tenantId: string };

  constructor(target: Pick<MigrationTarget, "id" | "tenantId">, reason: string) {
    super(`Definition ${target.tenantId}/${target.id} cannot be migrated: ${reason}`);
    this.name = "InvalidDefinitionError";
    this.context = { definitionId: target.id, tenantId: target.tenantId };
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

export const isRecord = (value: unknown): value is Record<string, unknown> =>
  typeof value === "object" && value !== null && !Array.isArray(value);
