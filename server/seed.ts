import {
  ConfigValidationError,
  SYSTEM_ACTOR,
  hasErrors,
  loadTemplateDocuments,
  type ObjectEngine,
  type SeedOptions,
  type SeedSummary,
} from "../platform/objectdb";
import { log } from "@shared/log";

/**
 * Loads every template document under `dir` and seeds it in one unit of work.
 * Any unreadable file or invalid document aborts the whole seed.
 */
export async function seedFromConfig(engine: ObjectEngine, dir: string, opts: SeedOptions = {}): Promise<SeedSummary> {
  const { sources, issues } = await loadTemplateDocuments(dir);
  if (hasErrors(issues)) throw new ConfigValidationError(issues);

  log(`seeding ${sources.length} template document(s) from ${dir}`, "seed");
  return engine.run(SYSTEM_ACTOR, (uow) => engine.seeder.seedDocuments(uow, sources, opts));
}
