/**
 * Capacity Guard
 *
 * Admits or rejects a whole batch for one target against its quota.
 * Pure: the occupied-size figure comes from the caller.
 */

import type { CapacityDecision, StorageTarget } from '@skyrelay/core';
import { formatGb } from '@skyrelay/utils';

export class CapacityGuard {
  evaluate(
    target: StorageTarget,
    existingOccupiedBytes: number,
    pendingBatchBytes: number,
    degraded: boolean = false
  ): CapacityDecision {
    const base = {
      target: target.name,
      existingBytes: existingOccupiedBytes,
      pendingBytes: pendingBatchBytes,
      degraded,
    };

    if (!target.capacity) {
      return { ...base, admitted: true, verdict: 'unconstrained', reason: 'unconstrained' };
    }

    const maxBytes = target.capacity.maxBytes;
    const total = existingOccupiedBytes + pendingBatchBytes;

    if (total <= maxBytes) {
      const marginBytes = maxBytes - total;
      return {
        ...base,
        admitted: true,
        verdict: 'within-quota',
        maxBytes,
        marginBytes,
        reason: `available: ${marginBytes} bytes (${formatGb(marginBytes, 4)} GB)`,
      };
    }

    const overageBytes = total - maxBytes;
    return {
      ...base,
      admitted: false,
      verdict: 'over-quota',
      maxBytes,
      overageBytes,
      reason: `exceeds quota by ${overageBytes} bytes (${formatGb(overageBytes, 4)} GB)`,
    };
  }

  /**
   * Decision for an enabled target that has no live connection
   */
  unavailable(target: StorageTarget, pendingBatchBytes: number, cause?: string): CapacityDecision {
    return {
      target: target.name,
      admitted: false,
      verdict: 'unavailable',
      reason: cause ? `unavailable: ${cause}` : 'unavailable',
      existingBytes: 0,
      pendingBytes: pendingBatchBytes,
      degraded: false,
    };
  }
}
