/**
 * Admin Gate
 * Only the configured administrator can create and finalize projects
 */

import { ErrorCodes, StakeVoteError } from './types.js';

/**
 * Result from a gate check
 */
export interface GateResult {
  allowed: boolean;
  reason?: string;
}

/**
 * Human-readable requirements for UI
 */
export interface GateRequirements {
  type: string;
  description: string;
  requirements: string[];
}

export class AdminGate {
  readonly type = 'admin' as const;

  constructor(readonly adminKey: string) {}

  check(caller: string): GateResult {
    const allowed = caller === this.adminKey;
    return {
      allowed,
      reason: allowed ? undefined : 'Only the administrator can perform this operation',
    };
  }

  /**
   * Throw unless the caller is the administrator
   */
  assert(caller: string, operation: string): void {
    const result = this.check(caller);
    if (!result.allowed) {
      throw new StakeVoteError(
        `${operation}: ${result.reason}`,
        ErrorCodes.UNAUTHORIZED,
        403
      );
    }
  }

  getRequirements(): GateRequirements {
    return {
      type: this.type,
      description: 'Administrator only',
      requirements: ['Must sign with the configured administrator key'],
    };
  }
}
