import type { StoreSession } from "../store";
import { StoreCounterMissing } from "../store/errors";
import { IdentifierIntegrityError, InvalidIdentifierInput } from "../service/errors";
import { formatEuid, normalizePrefix, validateEuid, type EuidEnvironment } from "./codec";

export const CORE_PREFIXES = {
  GT: "generic_template",
  GX: "generic_instance",
  GN: "generic_instance_lineage",
} as const;

export const OPTIONAL_PREFIXES = {
  WX: "workflow_instance",
  WSX: "workflow_step_instance",
  XX: "action_instance",
} as const;

const CORE_BY_PREFIX = new Map<string, string>(Object.entries(CORE_PREFIXES));

export type EuidRegistryOptions = Readonly<{
  environment?: EuidEnvironment;
  sandboxPrefix?: string;
  allowedSandboxPrefixes?: readonly string[];
}>;

/**
 * Maps identifier prefixes to the objects they name and hands out
 * identifiers from the store's per-prefix counters.
 */
export class EuidRegistry {
  private readonly prefixes = new Map<string, string | undefined>();
  private readonly environment: EuidEnvironment;
  private readonly sandboxPrefix?: string;
  private readonly allowedSandboxPrefixes?: readonly string[];

  constructor(opts: EuidRegistryOptions = {}) {
    this.environment = opts.environment ?? "production";
    if (this.environment === "sandbox") {
      if (!opts.sandboxPrefix) {
        throw new InvalidIdentifierInput("A sandbox environment requires a sandbox prefix");
      }
      this.sandboxPrefix = normalizePrefix(opts.sandboxPrefix);
      this.allowedSandboxPrefixes = opts.allowedSandboxPrefixes ?? [this.sandboxPrefix];
    }
    for (const [prefix, discriminator] of Object.entries({ ...CORE_PREFIXES, ...OPTIONAL_PREFIXES })) {
      this.prefixes.set(prefix, discriminator);
    }
  }

  /**
   * Registers an application prefix. Re-registering a prefix for the same
   * discriminator is a no-op; core prefixes cannot be taken over.
   */
  registerPrefix(raw: string, discriminator?: string): string {
    const prefix = normalizePrefix(raw);
    const core = CORE_BY_PREFIX.get(prefix);
    if (core !== undefined) {
      if (discriminator !== undefined && discriminator !== core) {
        throw new InvalidIdentifierInput(`Prefix ${prefix} is reserved for ${core}`);
      }
      return prefix;
    }
    if (this.prefixes.has(prefix)) {
      const existing = this.prefixes.get(prefix);
      if (existing !== undefined && discriminator !== undefined && existing !== discriminator) {
        throw new InvalidIdentifierInput(`Prefix ${prefix} is already registered for ${existing}`);
      }
      if (existing === undefined && discriminator !== undefined) this.prefixes.set(prefix, discriminator);
      return prefix;
    }
    this.prefixes.set(prefix, discriminator);
    return prefix;
  }

  isRegistered(raw: string): boolean {
    return this.prefixes.has(raw.trim().toUpperCase());
  }

  discriminatorFor(prefix: string): string | undefined {
    return this.prefixes.get(prefix);
  }

  registeredPrefixes(): string[] {
    return Array.from(this.prefixes.keys()).sort();
  }

  /** Ensures every registered prefix has a counter in the store. */
  async provision(session: StoreSession): Promise<void> {
    for (const prefix of this.prefixes.keys()) {
      await session.ensureCounter(prefix);
    }
  }

  async generate(session: StoreSession, prefix: string): Promise<string> {
    if (!this.prefixes.has(prefix)) {
      throw new IdentifierIntegrityError(`Prefix ${prefix} is not registered`);
    }
    let counterValue: number;
    try {
      counterValue = await session.nextCounterValue(prefix);
    } catch (err) {
      if (err instanceof StoreCounterMissing) {
        throw new IdentifierIntegrityError(`No counter provisioned for prefix ${prefix}`);
      }
      throw err;
    }
    return formatEuid(prefix, counterValue, this.sandboxPrefix);
  }

  validate(euid: string): boolean {
    return validateEuid(euid, {
      environment: this.environment,
      allowedSandboxPrefixes: this.allowedSandboxPrefixes,
    });
  }
}
