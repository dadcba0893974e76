import type { Instance, InstancePatch, MaterializedAction } from "@shared/schema";
import { ActionHandlerFailure, ObjectNotFound, TemplateIntegrityError, UnknownAction } from "./errors";
import type { InstanceFactory } from "./InstanceFactory";
import type { PersistenceBoundary } from "./PersistenceBoundary";
import type { TemplateResolver } from "./TemplateResolver";
import type { UnitOfWork } from "./types";

export type ActionDefinition = Readonly<Record<string, unknown>>;

export type ActionOutcome = Readonly<{
  message?: string;
  data?: Record<string, unknown>;
}>;

export type ActionHandlerContext = Readonly<{
  uow: UnitOfWork;
  /** Persists a change to the target instance through the audited boundary. */
  update(patch: InstancePatch): Promise<Instance>;
}>;

export type ActionHandler = (
  instance: Instance,
  actionDefinition: ActionDefinition,
  capturedData: Readonly<Record<string, unknown>>,
  ctx: ActionHandlerContext,
) => Promise<ActionOutcome>;

export type ActionResult =
  | Readonly<{
      status: "success";
      message: string;
      data?: Record<string, unknown>;
      actionRecordEuid?: string;
    }>
  | Readonly<{
      status: "error";
      code: string;
      message: string;
    }>;

export type ExecuteActionInput = Readonly<{
  instance: Instance;
  actionGroup: string;
  actionKey: string;
  /** Defaults to the instance's materialized entry for the action. */
  actionDefinition?: ActionDefinition;
  capturedData?: Readonly<Record<string, unknown>>;
  createActionRecord?: boolean;
}>;

export const setStatusHandler: ActionHandler = async (instance, _definition, capturedData, ctx) => {
  const status = capturedData.status;
  if (typeof status !== "string" || status.trim() === "") {
    throw new Error("set_status requires a non-empty 'status' in the captured data");
  }
  const updated = await ctx.update({ status: status.trim() });
  return { message: `Status of ${instance.euid} set to ${updated.status}` };
};

export const BUILTIN_ACTION_HANDLERS: Readonly<Record<string, ActionHandler>> = {
  set_status: setStatusHandler,
};

function materializedEntry(instance: Instance, group: string, key: string): MaterializedAction | undefined {
  return instance.actionGroups[group]?.[key];
}

/**
 * Runs named actions against instances.
 *
 * Handlers come from an explicit registry filled at startup. A handler runs
 * inside a savepoint, so a failure undoes only its own writes; the action's
 * tracking counters are updated whatever the outcome.
 */
export class ActionDispatcher {
  private readonly handlers = new Map<string, ActionHandler>();

  constructor(
    private readonly resolver: TemplateResolver,
    private readonly factory: InstanceFactory,
    private readonly boundary: PersistenceBoundary,
  ) {}

  register(actionKey: string, handler: ActionHandler): this {
    this.handlers.set(actionKey, handler);
    return this;
  }

  registerAll(handlers: Readonly<Record<string, ActionHandler>>): this {
    for (const [key, handler] of Object.entries(handlers)) this.register(key, handler);
    return this;
  }

  has(actionKey: string): boolean {
    return this.handlers.has(actionKey);
  }

  async executeAction(uow: UnitOfWork, input: ExecuteActionInput): Promise<ActionResult> {
    const { instance, actionGroup, actionKey } = input;
    const handler = this.handlers.get(actionKey);
    if (!handler) throw new UnknownAction(actionKey);

    const definition: ActionDefinition =
      input.actionDefinition ?? materializedEntry(instance, actionGroup, actionKey) ?? {};
    const capturedData = input.capturedData ?? {};

    let result: ActionResult;
    let outcome: ActionOutcome = {};
    try {
      outcome = await uow.session.savepoint((session) => {
        const scoped: UnitOfWork = { session, actor: uow.actor };
        let current = instance;
        const ctx: ActionHandlerContext = {
          uow: scoped,
          update: async (patch) => {
            current = await this.boundary.updateInstance(scoped, current, patch);
            return current;
          },
        };
        return handler(instance, definition, capturedData, ctx);
      });
      result = { status: "success", message: outcome.message ?? `Action ${actionKey} completed` };
    } catch (err) {
      const failure = new ActionHandlerFailure(actionKey, err);
      console.error(`[action-dispatcher] ${failure.message} (instance ${instance.euid})`);
      result = { status: "error", code: failure.code, message: failure.message };
    }

    const latest = await uow.session.getInstance(instance.uuid);
    if (!latest) throw new ObjectNotFound(instance.euid);
    const executedAt = new Date().toISOString();
    await this.trackExecution(uow, latest, actionGroup, actionKey, executedAt);

    if (result.status !== "success") return result;

    const data = outcome.data;
    const withData = data ? { ...result, data } : result;
    if (input.createActionRecord === false) return withData;

    const record = await this.createActionRecord(uow, latest, input, definition, capturedData, withData, executedAt);
    return { ...withData, actionRecordEuid: record.euid };
  }

  private async trackExecution(
    uow: UnitOfWork,
    instance: Instance,
    actionGroup: string,
    actionKey: string,
    executedAt: string,
  ): Promise<void> {
    const entry = materializedEntry(instance, actionGroup, actionKey);
    if (!entry) return;
    const tracked: MaterializedAction = {
      ...entry,
      actionExecuted: entry.actionExecuted + 1,
      executedAt: [...entry.executedAt, executedAt],
    };
    await this.boundary.updateInstance(uow, instance, {
      actionGroups: {
        ...instance.actionGroups,
        [actionGroup]: { ...instance.actionGroups[actionGroup], [actionKey]: tracked },
      },
    });
  }

  private async createActionRecord(
    uow: UnitOfWork,
    target: Instance,
    input: ExecuteActionInput,
    definition: ActionDefinition,
    capturedData: Readonly<Record<string, unknown>>,
    result: ActionResult,
    executedAt: string,
  ): Promise<Instance> {
    const templateUuid = definition.actionTemplateUuid;
    if (typeof templateUuid !== "string" || templateUuid === "") {
      throw new TemplateIntegrityError(`Action "${input.actionKey}" has no actionTemplateUuid to record against`);
    }
    const template = await this.resolver.resolveByUuid(uow.session, templateUuid);
    return this.factory.createFromTemplate(uow, template, `${input.actionKey}@${target.euid}`, {
      createChildren: false,
      status: "completed",
      properties: {
        target_instance_euid: target.euid,
        action_group: input.actionGroup,
        action_key: input.actionKey,
        action_definition: { ...definition },
        captured_data: { ...capturedData },
        result: { ...result },
        executed_by: uow.actor.actorId,
        executed_at: executedAt,
      },
    });
  }
}
