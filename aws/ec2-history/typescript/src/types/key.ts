/**
 * Instance identity.
 *
 * EC2 instance ids are only unique within a region, so every lookup goes
 * through the composite (region, instanceId) key.
 */

// ============================================================================
// Key Types
// ============================================================================

/**
 * Composite identity of an instance.
 */
export interface InstanceKey {
  /** Region the instance lives in, e.g. 'eu-west-1' */
  readonly region: string;
  /** Instance identifier, e.g. 'i-0abc123' */
  readonly instanceId: string;
}

// ============================================================================
// Key Utilities
// ============================================================================

/**
 * Creates an instance key.
 *
 * @example
 * ```typescript
 * const key = createInstanceKey('us-east-1', 'i-0abc123');
 * ```
 */
export function createInstanceKey(region: string, instanceId: string): InstanceKey {
  return { region, instanceId };
}

/**
 * Flattens a key into the string used for map lookups. Encoded as a JSON
 * pair so no region or id can collide with another pair.
 */
export function instanceKeyId(key: InstanceKey): string {
  return JSON.stringify([key.region, key.instanceId]);
}

/**
 * Orders keys by region, then by instance id. Plain code point comparison
 * so the order does not depend on the host locale.
 */
export function compareInstanceKeys(a: InstanceKey, b: InstanceKey): number {
  if (a.region !== b.region) {
    return a.region < b.region ? -1 : 1;
  }
  if (a.instanceId !== b.instanceId) {
    return a.instanceId < b.instanceId ? -1 : 1;
  }
  return 0;
}
