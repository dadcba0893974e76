import { describe, it, expect, vi, beforeEach } from "vitest";
import type { ActionHandler } from "../service/ActionDispatcher";
import { TemplateIntegrityError, UnknownAction } from "../service/errors";
import { TEST_ACTOR, seededEngine, templateDoc } from "./fixtures";

const SAMPLE = "content/sample/s1/1.0";
const SET_STATUS = "action/core/set_status/1.0";

const templates = [
  templateDoc(SET_STATUS, "XX", {
    payload: { action_definition: { action_name: "Set status", captured_data: { status: "" } } },
  }),
  templateDoc(SAMPLE, "MX", {
    payload: { action_imports: { set_status: SET_STATUS, explode: SET_STATUS } },
  }),
];

const explode: ActionHandler = async (_instance, _definition, _captured, ctx) => {
  await ctx.update({ status: "tampered" });
  throw new Error("boom");
};

beforeEach(() => {
  vi.spyOn(console, "log").mockImplementation(() => undefined);
  vi.spyOn(console, "error").mockImplementation(() => undefined);
});

async function setup() {
  const dev = await seededEngine(templates, { actions: { explode } });
  const sample = await dev.engine.run(TEST_ACTOR, (uow) => dev.engine.factory.createInstance(uow, SAMPLE, "S1"));
  return { ...dev, sample };
}

describe("ActionDispatcher", () => {
  it("runs set_status, tracks the execution and records the action", async () => {
    const { engine, sample } = await setup();

    const result = await engine.run(TEST_ACTOR, (uow) =>
      engine.dispatcher.executeAction(uow, {
        instance: sample,
        actionGroup: "core_actions",
        actionKey: "set_status",
        capturedData: { status: "active" },
      }),
    );

    expect(result).toEqual({
      status: "success",
      message: "Status of MX-1R set to active",
      actionRecordEuid: "XX-16",
    });

    const { target, record } = await engine.read(async (s) => ({
      target: await s.findInstanceByEuid("MX-1R"),
      record: await s.findInstanceByEuid("XX-16"),
    }));

    expect(target?.status).toBe("active");
    const tracked = target?.actionGroups.core_actions.set_status;
    expect(tracked?.actionExecuted).toBe(1);
    expect(tracked?.executedAt).toHaveLength(1);
    expect(target?.actionGroups.core_actions.explode.actionExecuted).toBe(0);

    expect(record).toMatchObject({
      name: "set_status@MX-1R",
      status: "completed",
      polymorphicDiscriminator: "action_instance",
    });
    expect(record?.properties).toMatchObject({
      action_key: "set_status",
      action_group: "core_actions",
      target_instance_euid: "MX-1R",
      captured_data: { status: "active" },
      result: { status: "success", message: "Status of MX-1R set to active" },
      executed_by: "user-1",
      executed_at: tracked?.executedAt[0],
    });
  });

  it("audits the handler's change to the instance", async () => {
    const { engine, sample } = await setup();

    await engine.run(TEST_ACTOR, (uow) =>
      engine.dispatcher.executeAction(uow, {
        instance: sample,
        actionGroup: "core_actions",
        actionKey: "set_status",
        capturedData: { status: "active" },
        createActionRecord: false,
      }),
    );

    const history = await engine.read((s) => engine.recorder.history(s, "MX-1R"));
    expect(history.find((e) => e.columnName === "status")).toMatchObject({
      oldValue: "created",
      newValue: "active",
      changedBy: "user-1",
    });
  });

  it("skips the action record when asked", async () => {
    const { engine, store, sample } = await setup();

    const result = await engine.run(TEST_ACTOR, (uow) =>
      engine.dispatcher.executeAction(uow, {
        instance: sample,
        actionGroup: "core_actions",
        actionKey: "set_status",
        capturedData: { status: "active" },
        createActionRecord: false,
      }),
    );

    expect(result).toEqual({ status: "success", message: "Status of MX-1R set to active" });
    expect(store.counterValue("XX")).toBe(0);
  });

  it("rolls back a failing handler's writes but still tracks the attempt", async () => {
    const { engine, store, sample } = await setup();

    const result = await engine.run(TEST_ACTOR, (uow) =>
      engine.dispatcher.executeAction(uow, { instance: sample, actionGroup: "core_actions", actionKey: "explode" }),
    );

    expect(result).toEqual({
      status: "error",
      code: "ACTION_HANDLER_FAILURE",
      message: 'Action "explode" failed: boom',
    });

    const target = await engine.read((s) => s.findInstanceByEuid("MX-1R"));
    expect(target?.status).toBe("created");
    expect(target?.actionGroups.core_actions.explode.actionExecuted).toBe(1);
    expect(store.counterValue("XX")).toBe(0);
  });

  it("reports a set_status call without a status as a failure", async () => {
    const { engine, sample } = await setup();

    const result = await engine.run(TEST_ACTOR, (uow) =>
      engine.dispatcher.executeAction(uow, { instance: sample, actionGroup: "core_actions", actionKey: "set_status" }),
    );

    expect(result.status).toBe("error");
  });

  it("throws UnknownAction for an unregistered key", async () => {
    const { engine, sample } = await setup();

    await expect(
      engine.run(TEST_ACTOR, (uow) =>
        engine.dispatcher.executeAction(uow, { instance: sample, actionGroup: "core_actions", actionKey: "teleport" }),
      ),
    ).rejects.toThrow(UnknownAction);
  });

  it("needs an action template to record against", async () => {
    const { engine, sample } = await setup();

    await expect(
      engine.run(TEST_ACTOR, (uow) =>
        engine.dispatcher.executeAction(uow, {
          instance: sample,
          actionGroup: "core_actions",
          actionKey: "set_status",
          actionDefinition: { action_name: "Set status" },
          capturedData: { status: "active" },
        }),
      ),
    ).rejects.toThrow(TemplateIntegrityError);
  });

  it("runs handlers registered after startup with the captured data", async () => {
    const { engine, sample } = await setup();
    const handler = vi.fn<ActionHandler>(async () => ({ message: "ok", data: { checked: true } }));
    engine.dispatcher.register("inspect", handler);

    const result = await engine.run(TEST_ACTOR, (uow) =>
      engine.dispatcher.executeAction(uow, {
        instance: sample,
        actionGroup: "core_actions",
        actionKey: "inspect",
        actionDefinition: { action_name: "Inspect" },
        capturedData: { note: "looks fine" },
        createActionRecord: false,
      }),
    );

    expect(result).toEqual({ status: "success", message: "ok", data: { checked: true } });
    expect(handler).toHaveBeenCalledOnce();
    expect(handler.mock.calls[0][1]).toEqual({ action_name: "Inspect" });
    expect(handler.mock.calls[0][2]).toEqual({ note: "looks fine" });
  });
});
