import { InvalidIdentifierInput } from "../service/errors";

/**
 * Crockford base-32 alphabet. I, L, O and U never appear in an identifier.
 */
export const EUID_ALPHABET = "0123456789ABCDEFGHJKMNPQRSTVWXYZ";

const BASE = EUID_ALPHABET.length;

const CHAR = "[0-9A-HJKMNP-TV-Z]";
const PREFIX = "[A-HJKMNP-TV-Z]+";
const BODY = `[1-9A-HJKMNP-TV-Z]${CHAR}*`;

const PRODUCTION_PATTERN = new RegExp(`^(${PREFIX})-(${BODY})(${CHAR})$`);
const SANDBOX_PATTERN = new RegExp(`^([A-HJKMNP-TV-Z]):(${PREFIX})-(${BODY})(${CHAR})$`);

export type EuidEnvironment = "production" | "sandbox";

export type EuidValidationOptions = Readonly<{
  environment?: EuidEnvironment;
  allowedSandboxPrefixes?: readonly string[];
}>;

export type DecodedEuid = Readonly<{
  prefix: string;
  counterValue: number;
  sandbox?: string;
}>;

function valueOf(char: string): number {
  const v = EUID_ALPHABET.indexOf(char);
  if (v < 0 || char.length !== 1) {
    throw new InvalidIdentifierInput(`Character "${char}" is not in the identifier alphabet`);
  }
  return v;
}

export function encode(counterValue: number): string {
  if (!Number.isSafeInteger(counterValue) || counterValue <= 0) {
    throw new InvalidIdentifierInput(`Counter value must be a positive integer, got ${counterValue}`);
  }
  let n = counterValue;
  let body = "";
  while (n > 0) {
    body = EUID_ALPHABET[n % BASE] + body;
    n = Math.floor(n / BASE);
  }
  return body;
}

export function decodeBody(body: string): number {
  if (body.length === 0 || body[0] === "0") {
    throw new InvalidIdentifierInput(`Identifier body "${body}" is empty or has a leading zero`);
  }
  let n = 0;
  for (const char of body) {
    n = n * BASE + valueOf(char);
  }
  if (!Number.isSafeInteger(n)) {
    throw new InvalidIdentifierInput(`Identifier body "${body}" is out of range`);
  }
  return n;
}

/**
 * Luhn mod-32 check character over PREFIX+BODY.
 * The rightmost payload character is weighted 2, then 1, 2, ...
 */
export function checksum(prefix: string, body: string): string {
  const payload = prefix + body;
  let total = 0;
  let factor = 2;
  for (let i = payload.length - 1; i >= 0; i--) {
    const product = valueOf(payload[i]) * factor;
    total += Math.floor(product / BASE) + (product % BASE);
    factor = factor === 2 ? 1 : 2;
  }
  return EUID_ALPHABET[(BASE - (total % BASE)) % BASE];
}

export function normalizePrefix(raw: string): string {
  const prefix = raw.trim().toUpperCase();
  if (!/^[A-Z]+$/.test(prefix)) {
    throw new InvalidIdentifierInput(`Prefix "${raw}" must contain letters only`);
  }
  for (const char of prefix) {
    if (!EUID_ALPHABET.includes(char)) {
      throw new InvalidIdentifierInput(`Prefix "${raw}" contains "${char}", which is not in the identifier alphabet`);
    }
  }
  return prefix;
}

export function formatEuid(prefix: string, counterValue: number, sandbox?: string): string {
  const p = normalizePrefix(prefix);
  const body = encode(counterValue);
  const euid = `${p}-${body}${checksum(p, body)}`;
  if (sandbox === undefined) return euid;
  const s = normalizePrefix(sandbox);
  if (s.length !== 1) {
    throw new InvalidIdentifierInput(`Sandbox prefix "${sandbox}" must be a single letter`);
  }
  return `${s}:${euid}`;
}

type ParsedEuid = { sandbox?: string; prefix: string; body: string; check: string };

function parse(euid: string): ParsedEuid | undefined {
  const production = PRODUCTION_PATTERN.exec(euid);
  if (production) {
    return { prefix: production[1], body: production[2], check: production[3] };
  }
  const sandboxed = SANDBOX_PATTERN.exec(euid);
  if (sandboxed) {
    return { sandbox: sandboxed[1], prefix: sandboxed[2], body: sandboxed[3], check: sandboxed[4] };
  }
  return undefined;
}

export function validateEuid(euid: string, opts: EuidValidationOptions = {}): boolean {
  const parsed = parse(euid);
  if (!parsed) return false;

  const environment = opts.environment ?? "production";
  if (environment === "production" && parsed.sandbox !== undefined) return false;
  if (environment === "sandbox") {
    if (parsed.sandbox === undefined) return false;
    if (opts.allowedSandboxPrefixes && !opts.allowedSandboxPrefixes.includes(parsed.sandbox)) return false;
  }

  return checksum(parsed.prefix, parsed.body) === parsed.check;
}

export function decodeEuid(euid: string): DecodedEuid {
  const parsed = parse(euid);
  if (!parsed || checksum(parsed.prefix, parsed.body) !== parsed.check) {
    throw new InvalidIdentifierInput(`"${euid}" is not a valid identifier`);
  }
  const decoded = { prefix: parsed.prefix, counterValue: decodeBody(parsed.body) };
  return parsed.sandbox === undefined ? decoded : { ...decoded, sandbox: parsed.sandbox };
}
