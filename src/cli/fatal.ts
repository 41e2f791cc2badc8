/**
 * Text printed by the bin entry points when a runner rejects.
 */
export function describeFatal(cause: unknown): string {
  return cause instanceof Error ? (cause.stack ?? cause.message) : String(cause);
}
