import type { MigrationTarget } from "../../ports/MigrationTargetRepository";
import { BpmnPayloadError, writeActivityProperties } from "./bpmnPayload";
import {
  InvalidDefinitionError,
  isRecord,
  type DefinitionMigration,
  type DefinitionMigrationResult
} from "./definitionMigration";

export const taskActivityTypes: readonly string[] = [
  "userTask",
  "serviceTask",
  "sendTask",
  "receiveTask",
  "scriptTask",
  "manualTask"
];

const LEGACY_MARKER = '"inputMapping"';
const CURRENT_MARKER = '"inputData"';

const mergedLegacyKeys = ["checkpoints", "description", "instruction"] as const;

const isBlank = (value: unknown) =>
  value == null || value === "" || (Array.isArray(value) && value.length === 0);

const valueOr = (activity: Record<string, unknown>, key: string, fallback: unknown): unknown =>
  activity[key] === undefined ? fallback : activity[key];

/** Non-blank `checkpoints`/`description`/`instruction` from the legacy blob, which may be a JSON string. */
export const parseLegacyProperties = (raw: unknown): Record<string, unknown> | null => {
  let parsed: unknown = raw;
  if (typeof raw === "string") {
    if (raw.trim() === "") return null;
    try {
      parsed = JSON.parse(raw);
    } catch {
      return null;
    }
  }
  if (!isRecord(parsed)) return null;

  const picked: Record<string, unknown> = {};
  for (const key of mergedLegacyKeys) {
    if (!isBlank(parsed[key])) picked[key] = parsed[key];
  }
  return Object.keys(picked).length > 0 ? picked : null;
};

export const buildActivityProperties = (activity: Record<string, unknown>): Record<string, unknown> => {
  const properties: Record<string, unknown> = {
    role: valueOr(activity, "role", ""),
    duration: valueOr(activity, "duration", 5),
    instruction: valueOr(activity, "instruction", ""),
    description: valueOr(activity, "description", ""),
    checkpoints: valueOr(activity, "checkpoints", []),
    agentMode: valueOr(activity, "agentMode", "none"),
    orchestration: valueOr(activity, "orchestration", "none"),
    attachments: valueOr(activity, "attachments", []),
    inputData: valueOr(activity, "inputData", valueOr(activity, "inputMapping", [])),
    tool: valueOr(activity, "tool", "")
  };
  return { ...properties, ...parseLegacyProperties(activity.properties) };
};

const flattenActivity = (activity: Record<string, unknown>, properties: Record<string, unknown>): Record<string, unknown> => {
  const rest = { ...activity };
  delete rest.properties;
  delete rest.outputData;
  delete rest.inputMapping;
  return { ...rest, ...properties };
};

const readDefinition = (target: MigrationTarget): Record<string, unknown> => {
  let parsed: unknown = target.definition;
  if (typeof parsed === "string") {
    try {
      parsed = JSON.parse(parsed);
    } catch {
      throw new InvalidDefinitionError(target, "definition is not valid JSON");
    }
  }
  if (!isRecord(parsed)) {
    throw new InvalidDefinitionError(target, "definition is not an object");
  }
  return parsed;
};

const rewritePayload = (target: MigrationTarget, propertiesById: ReadonlyMap<string, Record<string, unknown>>): string => {
  if (propertiesById.size === 0) return target.payload;
  try {
    return writeActivityProperties(target.payload, propertiesById, taskActivityTypes);
  } catch (err) {
    if (err instanceof BpmnPayloadError) {
      throw new InvalidDefinitionError(target, `payload is not well-formed XML (${err.message})`);
    }
    throw err;
  }
};

/**
 * Folds each task activity's legacy `properties` blob into top-level fields and
 * renames `inputMapping` to `inputData`. The same properties are written to the
 * activity's `uengine:json` element in the BPMN payload.
 */
export const flattenActivityProperties: DefinitionMigration = {
  name: "flatten-activity-properties",
  pendingMarker: LEGACY_MARKER,

  migrate(target: MigrationTarget): DefinitionMigrationResult {
    const definition = readDefinition(target);
    const activities = definition.activities;
    if (!Array.isArray(activities)) return { kind: "unchanged" };

    let activitiesUpdated = 0;
    const propertiesById = new Map<string, Record<string, unknown>>();
    const migratedActivities = activities.map((activity: unknown) => {
      if (!isRecord(activity) || typeof activity.type !== "string" || !taskActivityTypes.includes(activity.type)) {
        return activity;
      }
      const properties = buildActivityProperties(activity);
      if (typeof activity.id === "string") propertiesById.set(activity.id, properties);
      activitiesUpdated += 1;
      return flattenActivity(activity, properties);
    });

    // Markers outside the rewritten task elements still have to go for the row to leave the pending set.
    const payload = rewritePayload(target, propertiesById).replaceAll(LEGACY_MARKER, CURRENT_MARKER);
    if (activitiesUpdated === 0 && payload === target.payload) return { kind: "unchanged" };

    return {
      kind: "migrated",
      activitiesUpdated,
      definition: { ...definition, activities: migratedActivities },
      payload
    };
  }
};
