import { InvalidDefinitionError } from "../../src/core/definitions/definitionMigration";
import {
  buildActivityProperties,
  flattenActivityProperties,
  parseLegacyProperties
} from "../../src/core/definitions/flattenActivityProperties";
import type { MigrationTarget } from "../../src/ports/MigrationTargetRepository";
import { bpmnDocument, readActivityJson, userTask } from "../support/bpmnFixtures";

const target = (definition: unknown, payload = '<json>{"inputMapping":[]}</json>'): MigrationTarget => ({
  id: "def-1",
  tenantId: "tenant-a",
  name: "Onboarding",
  definition,
  payload
});

describe("flattenActivityProperties", () => {
  it("fills defaults for a bare task activity", () => {
    expect(buildActivityProperties({ id: "a1", type: "userTask" })).toEqual({
      role: "",
      duration: 5,
      instruction: "",
      description: "",
      checkpoints: [],
      agentMode: "none",
      orchestration: "none",
      attachments: [],
      inputData: [],
      tool: ""
    });
  });

  it("prefers non-blank legacy properties over top-level values", () => {
    const props = buildActivityProperties({
      id: "a1",
      type: "userTask",
      role: "reviewer",
      description: "old",
      properties: JSON.stringify({ description: "from blob", instruction: "", checkpoints: ["signed"] })
    });

    expect(props).toMatchObject({
      role: "reviewer",
      description: "from blob",
      instruction: "",
      checkpoints: ["signed"]
    });
  });

  it("ignores unparseable legacy properties", () => {
    expect(parseLegacyProperties("{not json")).toBeNull();
    expect(parseLegacyProperties({ description: "", checkpoints: [] })).toBeNull();
    expect(parseLegacyProperties({ instruction: "do it", other: 1 })).toEqual({ instruction: "do it" });
  });

  it("rewrites task activities and the payload marker", () => {
    const result = flattenActivityProperties.migrate(
      target({
        name: "Onboarding",
        activities: [
          {
            id: "a1",
            type: "userTask",
            inputMapping: ["form.email"],
            outputData: ["x"],
            properties: { instruction: "check id" }
          },
          { id: "g1", type: "exclusiveGateway", properties: "{}" }
        ]
      })
    );

    expect(result).toEqual({
      kind: "migrated",
      activitiesUpdated: 1,
      payload: '<json>{"inputData":[]}</json>',
      definition: {
        name: "Onboarding",
        activities: [
          {
            id: "a1",
            type: "userTask",
            role: "",
            duration: 5,
            instruction: "check id",
            description: "",
            checkpoints: [],
            agentMode: "none",
            orchestration: "none",
            attachments: [],
            inputData: ["form.email"],
            tool: ""
          },
          { id: "g1", type: "exclusiveGateway", properties: "{}" }
        ]
      }
    });
  });

  it("writes the flattened properties into the activity's BPMN json", () => {
    const result = flattenActivityProperties.migrate(
      target(
        {
          activities: [
            { id: "a1", type: "userTask", inputMapping: ["form.email"], outputData: ["x"], properties: { instruction: "check id" } }
          ]
        },
        bpmnDocument(userTask("a1", '{"inputMapping":["form.email"],"outputData":["x"],"properties":"{}"}'))
      )
    );

    if (result.kind !== "migrated") throw new Error("expected a migrated result");
    expect(readActivityJson(result.payload, "a1")).toEqual({
      role: "",
      duration: 5,
      instruction: "check id",
      description: "",
      checkpoints: [],
      agentMode: "none",
      orchestration: "none",
      attachments: [],
      inputData: ["form.email"],
      tool: ""
    });
    expect(result.payload).not.toContain('"inputMapping"');
  });

  it("rejects a payload that is not XML", () => {
    expect(() => flattenActivityProperties.migrate(target({ activities: [{ id: "a1", type: "userTask" }] }, "plain text"))).toThrow(
      /^Definition tenant-a\/def-1 cannot be migrated: payload is not well-formed XML/
    );
  });

  it("parses a definition stored as a JSON string", () => {
    const result = flattenActivityProperties.migrate(
      target(JSON.stringify({ activities: [{ id: "a1", type: "scriptTask" }] }))
    );
    expect(result.kind === "migrated" && result.activitiesUpdated).toBe(1);
  });

  it("reports unchanged when there is nothing to rewrite", () => {
    expect(flattenActivityProperties.migrate(target({ activities: [] }, "<json>{}</json>"))).toEqual({ kind: "unchanged" });
    expect(flattenActivityProperties.migrate(target({ roles: [] }, "<json>{}</json>"))).toEqual({ kind: "unchanged" });
  });

  it("throws for definitions that are not JSON objects", () => {
    expect(() => flattenActivityProperties.migrate(target("{broken"))).toThrow(InvalidDefinitionError);
    expect(() => flattenActivityProperties.migrate(target(null))).toThrow(
      "Definition tenant-a/def-1 cannot be migrated: definition is not an object"
    );
  });

  it("uses the quoted legacy field name as the pending marker", () => {
    expect(flattenActivityProperties.pendingMarker).toBe('"inputMapping"');
  });
});
