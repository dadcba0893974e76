import type { Express, NextFunction, Request, RequestHandler, Response } from "express";
import { z } from "zod";
import {
  ConfigValidationError,
  ObjectDbError,
  ObjectNotFound,
  SchemaValidationError,
  type ObjectEngine,
  type ReadOptions,
} from "../platform/objectdb";
import { actorResolution } from "./middleware/actor";

// ---- Request shapes ----

const pagingQuery = z.object({
  page: z.coerce.number().int().min(1).optional(),
  pageSize: z.coerce.number().int().min(1).optional(),
  includeDeleted: z
    .enum(["true", "false"])
    .optional()
    .transform((v) => v === "true"),
});

const typeKeyQuery = z.object({
  category: z.string().min(1).optional(),
  type: z.string().min(1).optional(),
  subtype: z.string().min(1).optional(),
  version: z.string().min(1).optional(),
  polymorphic_discriminator: z.string().min(1).optional(),
  status: z.string().min(1).optional(),
});

const lineageQuery = z.object({
  parent_euid: z.string().min(1).optional(),
  child_euid: z.string().min(1).optional(),
  relationship_type: z.string().min(1).optional(),
});

const graphQuery = z.object({
  start_euid: z.string().min(1).optional(),
  depth: z.coerce.number().int().min(0).max(50).optional(),
});

const createInstanceBody = z.object({
  template_code: z.string().min(1),
  name: z.string().trim().min(1),
  properties: z.record(z.unknown()).optional(),
  status: z.string().min(1).optional(),
  create_children: z.boolean().optional(),
  singleton: z.boolean().optional(),
});

const updateInstanceBody = z
  .object({
    name: z.string().optional(),
    status: z.string().optional(),
    properties: z.record(z.unknown()).optional(),
  })
  .strict();

const createLineageBody = z.object({
  parent_euid: z.string().min(1),
  child_euid: z.string().min(1),
  relationship_type: z.string().trim().min(1).optional(),
});

const executeActionBody = z.object({
  action_group: z.string().min(1),
  action_key: z.string().min(1),
  captured_data: z.record(z.unknown()).optional(),
  create_action_record: z.boolean().optional(),
});

// ---- Helpers ----

function readOptions(query: unknown): ReadOptions {
  const parsed = pagingQuery.parse(query);
  return { page: parsed.page, pageSize: parsed.pageSize, includeDeleted: parsed.includeDeleted };
}

function errorBody(err: ObjectDbError): Record<string, unknown> {
  const body: Record<string, unknown> = { message: err.message, code: err.code };
  if (err instanceof SchemaValidationError) body.violations = err.violations;
  if (err instanceof ConfigValidationError) body.issues = err.issues;
  return body;
}

function handle(fn: (req: Request, res: Response) => Promise<unknown>): RequestHandler {
  return (req: Request, res: Response, next: NextFunction) => {
    fn(req, res).catch((err: unknown) => {
      if (err instanceof ObjectDbError) {
        return res.status(err.statusCode).json(errorBody(err));
      }
      if (err instanceof z.ZodError) {
        return res.status(400).json({ message: err.issues.map((i) => `${i.path.join(".")}: ${i.message}`).join("; ") });
      }
      next(err);
    });
  };
}

export function registerRoutes(app: Express, engine: ObjectEngine): Express {
  app.use("/api", actorResolution);

  // Templates
  app.get("/api/templates", handle(async (req, res) => {
    const { polymorphic_discriminator, ...key } = typeKeyQuery.parse(req.query);
    const result = await engine.read((session) =>
      engine.objects.listTemplates(session, { ...key, polymorphicDiscriminator: polymorphic_discriminator }, readOptions(req.query)),
    );
    res.json(result);
  }));

  // Instances
  app.get("/api/instances", handle(async (req, res) => {
    const { polymorphic_discriminator, ...key } = typeKeyQuery.parse(req.query);
    const result = await engine.read((session) =>
      engine.objects.listInstances(session, { ...key, polymorphicDiscriminator: polymorphic_discriminator }, readOptions(req.query)),
    );
    res.json(result);
  }));

  app.post("/api/instances", handle(async (req, res) => {
    const parsed = createInstanceBody.safeParse(req.body);
    if (!parsed.success) return res.status(400).json({ message: parsed.error.message });

    const { template_code, name, properties, status, create_children, singleton } = parsed.data;
    const opts = { properties, status, createChildren: create_children };
    const instance = await engine.run(req.actorContext, (uow) =>
      singleton
        ? engine.factory.getOrCreateSingletonInstance(uow, template_code, name, opts)
        : engine.factory.createInstance(uow, template_code, name, opts),
    );
    res.status(201).json(instance);
  }));

  app.patch("/api/instances/:euid", handle(async (req, res) => {
    const parsed = updateInstanceBody.safeParse(req.body);
    if (!parsed.success) return res.status(400).json({ message: parsed.error.message });

    const update = parsed.data;
    const instance = await engine.run(req.actorContext, (uow) => engine.objects.updateInstance(uow, req.params.euid, update));
    res.json(instance);
  }));

  app.get("/api/instances/:euid/children", handle(async (req, res) => {
    const { relationship_type } = lineageQuery.parse(req.query);
    const children = await engine.read(async (session) => {
      const instance = await session.findInstanceByEuid(req.params.euid);
      if (!instance || instance.isDeleted) throw new ObjectNotFound(req.params.euid);
      return engine.lineage.childrenOf(session, instance, relationship_type);
    });
    res.json(children);
  }));

  app.get("/api/instances/:euid/parents", handle(async (req, res) => {
    const { relationship_type } = lineageQuery.parse(req.query);
    const parents = await engine.read(async (session) => {
      const instance = await session.findInstanceByEuid(req.params.euid);
      if (!instance || instance.isDeleted) throw new ObjectNotFound(req.params.euid);
      return engine.lineage.parentsOf(session, instance, relationship_type);
    });
    res.json(parents);
  }));

  app.post("/api/instances/:euid/actions", handle(async (req, res) => {
    const parsed = executeActionBody.safeParse(req.body);
    if (!parsed.success) return res.status(400).json({ message: parsed.error.message });

    const { action_group, action_key, captured_data, create_action_record } = parsed.data;
    const result = await engine.run(req.actorContext, async (uow) => {
      const instance = await uow.session.findInstanceByEuid(req.params.euid);
      if (!instance || instance.isDeleted) throw new ObjectNotFound(req.params.euid);
      return engine.dispatcher.executeAction(uow, {
        instance,
        actionGroup: action_group,
        actionKey: action_key,
        capturedData: captured_data,
        createActionRecord: create_action_record,
      });
    });
    res.status(result.status === "success" ? 200 : 422).json(result);
  }));

  // Lineage
  app.get("/api/lineages", handle(async (req, res) => {
    const query = lineageQuery.parse(req.query);
    const result = await engine.read(async (session) => {
      const parent = query.parent_euid ? await session.findInstanceByEuid(query.parent_euid) : undefined;
      if (query.parent_euid && !parent) throw new ObjectNotFound(query.parent_euid);
      const child = query.child_euid ? await session.findInstanceByEuid(query.child_euid) : undefined;
      if (query.child_euid && !child) throw new ObjectNotFound(query.child_euid);
      return engine.objects.listLineages(
        session,
        {
          parentInstanceUuid: parent?.uuid,
          childInstanceUuid: child?.uuid,
          relationshipType: query.relationship_type,
        },
        readOptions(req.query),
      );
    });
    res.json(result);
  }));

  app.post("/api/lineage", handle(async (req, res) => {
    const parsed = createLineageBody.safeParse(req.body);
    if (!parsed.success) return res.status(400).json({ message: parsed.error.message });

    const { parent_euid, child_euid, relationship_type } = parsed.data;
    const lineage = await engine.run(req.actorContext, async (uow) => {
      const parent = await uow.session.findInstanceByEuid(parent_euid);
      if (!parent) throw new ObjectNotFound(parent_euid);
      const child = await uow.session.findInstanceByEuid(child_euid);
      if (!child) throw new ObjectNotFound(child_euid);
      return engine.factory.linkInstances(uow, parent, child, relationship_type);
    });
    res.status(201).json(lineage);
  }));

  // Any object by identifier
  app.get("/api/object/:euid", handle(async (req, res) => {
    const record = await engine.read((session) => engine.objects.getByEuid(session, req.params.euid));
    res.json(record);
  }));

  app.get("/api/object/:euid/history", handle(async (req, res) => {
    const entries = await engine.read((session) => engine.objects.history(session, req.params.euid));
    res.json(entries);
  }));

  app.delete("/api/object/:euid", handle(async (req, res) => {
    const record = await engine.run(req.actorContext, (uow) => engine.objects.softDelete(uow, req.params.euid));
    res.json(record);
  }));

  // Graph
  app.get("/api/graph", handle(async (req, res) => {
    const { start_euid, depth } = graphQuery.parse(req.query);
    const graph = await engine.read((session) => engine.lineage.exportGraph(session, { startEuid: start_euid, depth }));
    res.json(graph);
  }));

  return app;
}
