import { AuditRecorder } from "../../audit";
import { TemplateSeeder } from "../config/seedTemplates";
import { EuidRegistry, type EuidRegistryOptions } from "../euid";
import { readAllPages, type ObjectStore, type StoreSession } from "../store";
import { ActionDispatcher, BUILTIN_ACTION_HANDLERS, type ActionHandler } from "../service/ActionDispatcher";
import { InstanceFactory } from "../service/InstanceFactory";
import { instanceDiscriminatorFor } from "../service/kinds";
import { LineageGraph } from "../service/LineageGraph";
import type { ObjectService } from "../service/ObjectService";
import { StoreBackedObjectService } from "../service/impl/StoreBackedObjectService";
import { AjvPayloadValidator, type PayloadValidator } from "../service/PayloadValidator";
import { PersistenceBoundary } from "../service/PersistenceBoundary";
import { TemplateResolver } from "../service/TemplateResolver";
import type { ActorContext, UnitOfWork } from "../service/types";

export type ObjectEngineOptions = Readonly<{
  registry?: EuidRegistry | EuidRegistryOptions;
  validator?: PayloadValidator;
  /** Application prefixes registered at startup, beyond those templates bring. */
  prefixes?: readonly string[];
  actions?: Readonly<Record<string, ActionHandler>>;
}>;

/**
 * Wires the engine's components around one ObjectStore.
 */
export class ObjectEngine {
  readonly registry: EuidRegistry;
  readonly recorder = new AuditRecorder();
  readonly resolver = new TemplateResolver();
  readonly validator: PayloadValidator;
  readonly boundary: PersistenceBoundary;
  readonly factory: InstanceFactory;
  readonly lineage: LineageGraph;
  readonly dispatcher: ActionDispatcher;
  readonly seeder: TemplateSeeder;
  readonly objects: ObjectService;

  constructor(
    readonly store: ObjectStore,
    opts: ObjectEngineOptions = {},
  ) {
    this.registry = opts.registry instanceof EuidRegistry ? opts.registry : new EuidRegistry(opts.registry);
    for (const prefix of opts.prefixes ?? []) this.registry.registerPrefix(prefix);

    this.validator = opts.validator ?? new AjvPayloadValidator();
    this.boundary = new PersistenceBoundary(this.registry, this.recorder, {
      onTemplateMutated: () => this.resolver.invalidateCache(),
    });
    this.factory = new InstanceFactory(this.resolver, this.boundary, this.validator);
    this.lineage = new LineageGraph(this.boundary);
    this.dispatcher = new ActionDispatcher(this.resolver, this.factory, this.boundary)
      .registerAll(BUILTIN_ACTION_HANDLERS)
      .registerAll(opts.actions ?? {});
    this.seeder = new TemplateSeeder(this.registry, this.boundary);
    this.objects = new StoreBackedObjectService(this.boundary, this.recorder, this.validator);
  }

  /**
   * Registers the instance prefix of every stored template, deleted ones
   * included, then ensures every registered prefix has a counter.
   */
  async provision(): Promise<void> {
    await this.store.transaction(async (session) => {
      const templates = await readAllPages((page) => session.listTemplates({}, page), { includeDeleted: true });
      for (const template of templates) {
        this.registry.registerPrefix(template.instancePrefix, instanceDiscriminatorFor(template));
      }
      await this.registry.provision(session);
    });
  }

  /** Runs work as one unit of work: it commits or rolls back as a whole. */
  async run<T>(actor: ActorContext, work: (uow: UnitOfWork) => Promise<T>): Promise<T> {
    return this.store.transaction((session) => work({ session, actor }));
  }

  async read<T>(work: (session: StoreSession) => Promise<T>): Promise<T> {
    return this.store.transaction(work);
  }
}
