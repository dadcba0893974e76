function timestamp(): string {
  return new Date().toLocaleTimeString("en-US", {
    hour: "numeric",
    minute: "2-digit",
    second: "2-digit",
    hour12: true,
  });
}

export function log(message: string, source = "express") {
  console.log(`${timestamp()} [${source}] ${message}`);
}

export function logError(message: string, err?: unknown, source = "express") {
  const detail = err === undefined ? "" : `: ${err instanceof Error ? err.message : String(err)}`;
  console.error(`${timestamp()} [${source}] ${message}${detail}`);
}
