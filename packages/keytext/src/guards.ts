/**
 * Shared type guards.
 * @internal
 */

/**
 * Type guard for plain objects.
 * @internal
 */
export function isObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value)
}
