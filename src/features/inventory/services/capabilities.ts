/**
 * Capability policy for the ledger boundary
 * The core never checks identity; the engine asks the policy before every write.
 */

export const CAPABILITIES = [
  'parts_add',
  'parts_lists',
  'jobs_add',
  'jobs_assign',
  'orders_create',
  'orders_submit',
  'orders_edit',
  'orders_receive',
  'orders_return',
  'trucks_transfer',
  'trucks_receive',
] as const;

export type Capability = (typeof CAPABILITIES)[number];

export const isCapability = (value: unknown): value is Capability =>
  typeof value === 'string' && CAPABILITIES.some((capability) => capability === value);

export interface CapabilityPolicy {
  /** Recorded as `performedBy` on movements */
  readonly actor: string | null;
  can(capability: Capability): boolean;
}

/** Unrestricted policy for privileged roles, imports and sync replays */
export function allowAll(actor: string | null = null): CapabilityPolicy {
  return { actor, can: () => true };
}

/** Grant exactly the listed permission keys; unknown keys are ignored */
export function fromPermissionKeys(keys: Iterable<string>, actor: string | null = null): CapabilityPolicy {
  const granted = new Set<Capability>();
  for (const key of keys) {
    if (isCapability(key)) granted.add(key);
  }
  return { actor, can: (capability) => granted.has(capability) };
}
