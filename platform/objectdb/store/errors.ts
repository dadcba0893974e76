/**
 * Store-level failure signals. The persistence boundary translates these
 * into typed engine errors; stores never throw engine errors themselves.
 */
export class StoreConstraintViolation extends Error {
  constructor(
    public readonly constraint: string,
    detail?: string,
  ) {
    super(`STORE_CONSTRAINT_VIOLATION: ${constraint}${detail ? ` (${detail})` : ""}`);
    this.name = "StoreConstraintViolation";
  }
}

export class StoreCounterMissing extends Error {
  constructor(public readonly prefix: string) {
    super(`STORE_COUNTER_MISSING: no counter provisioned for prefix ${prefix}`);
    this.name = "StoreCounterMissing";
  }
}
