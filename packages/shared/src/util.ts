/** Compile-time exhaustiveness guard for switch statements over tagged unions. */
export function assertNever(value: never, label = 'value'): never {
  throw new Error(`unexpected ${label}: ${JSON.stringify(value)}`);
}

/** Message text of an unknown thrown value */
export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}
