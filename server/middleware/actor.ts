import type { Request, Response, NextFunction } from "express";
import { SYSTEM_ACTOR, type ActorContext } from "../../platform/objectdb";

declare global {
  namespace Express {
    interface Request {
      actorContext: ActorContext;
    }
  }
}

const ACTOR_TYPES = ["user", "system", "agent"] as const;

function isActorType(value: string): value is ActorContext["actorType"] {
  return ACTOR_TYPES.some((t) => t === value);
}

function headerValue(req: Request, name: string): string | undefined {
  const raw = req.headers[name];
  const value = Array.isArray(raw) ? raw[0] : raw;
  return value?.trim() || undefined;
}

/**
 * Attributes the request to an actor from the x-actor-id and x-actor-type
 * headers. Requests without an actor run as the system actor.
 */
export function actorResolution(req: Request, res: Response, next: NextFunction) {
  const actorId = headerValue(req, "x-actor-id");
  const actorType = headerValue(req, "x-actor-type");

  if (actorType !== undefined && !isActorType(actorType)) {
    return res.status(400).json({ message: `Unknown actor type "${actorType}"` });
  }
  if (!actorId) {
    req.actorContext = SYSTEM_ACTOR;
    return next();
  }

  req.actorContext = { actorId, actorType: actorType ?? "user" };
  next();
}
