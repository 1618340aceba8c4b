/**
 * Eviction Policies
 * @module cache/eviction-policy
 *
 * Victim selection over the ordered contents of one set. Policies never
 * mutate the set; the owning level removes the victim it is handed.
 */

import { ConfigurationError } from '../errors/index.js';
import { EVICTION_POLICIES, EvictionPolicyName } from './types.js';

/**
 * Read-only view of a set's ordering: oldest is the arrival (FIFO) or
 * least-recent (LRU/MRU) end, newest the opposite end.
 */
export interface OrderedTags {
  oldest(): number | undefined;
  newest(): number | undefined;
}

/**
 * Pick the tag to evict, or undefined when the set is empty
 */
export function selectVictim(policy: EvictionPolicyName, order: OrderedTags): number | undefined {
  switch (policy) {
    case 'FIFO':
    case 'LRU':
      return order.oldest();
    case 'MRU':
      return order.newest();
    default: {
      const unreachable: never = policy;
      throw new Error(`Unhandled eviction policy: ${String(unreachable)}`);
    }
  }
}

/**
 * Whether hits move a tag to the most-recent end
 */
export function tracksRecency(policy: EvictionPolicyName): boolean {
  switch (policy) {
    case 'FIFO':
      return false;
    case 'LRU':
    case 'MRU':
      return true;
    default: {
      const unreachable: never = policy;
      throw new Error(`Unhandled eviction policy: ${String(unreachable)}`);
    }
  }
}

export function isEvictionPolicy(value: string): value is EvictionPolicyName {
  return EVICTION_POLICIES.some(policy => policy === value);
}

/**
 * Normalise a configured policy name (case-insensitive)
 */
export function parseEvictionPolicy(name: string, level?: string): EvictionPolicyName {
  const normalised = name.trim().toUpperCase();
  if (!isEvictionPolicy(normalised)) {
    throw ConfigurationError.policy('evictionPolicy', name, EVICTION_POLICIES, level);
  }
  return normalised;
}
