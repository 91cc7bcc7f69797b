/**
 * Decides whether a refresh cycle runs `local_only` or `augmented`.
 *
 * `augmented` needs a configured credential and a successful reachability
 * probe. Any failure downgrades the cycle to `local_only` with a warning;
 * nothing is raised to callers. The decision is memoized per cycle so a
 * retry inside the same cycle reuses it and the mode can only flip between
 * refreshes.
 *
 * @module overlay/mode-arbiter
 */
import type { Logger } from '@netglass/shared/logger';
import { noopLogger } from '@netglass/shared/logger';
import type { RemoteApiClient } from './remote-api-client.js';
import type { SourceMode } from './types.js';

export interface ModeDecision {
  mode: SourceMode;
  /** Why the cycle was downgraded; absent when augmented or no credential is set. */
  reason?: string;
}

/** The parts of the remote client the arbiter depends on. */
export type ModeProbe = Pick<RemoteApiClient, 'configured' | 'probe'>;

export class ModeArbiter {
  private memo: { cycle: number; decision: Promise<ModeDecision> } | null = null;
  private readonly logger: Logger;

  constructor(
    private readonly remote: ModeProbe | null,
    logger?: Logger,
  ) {
    this.logger = logger ?? noopLogger;
  }

  /** Select the mode for `cycle`, probing at most once per cycle. */
  selectMode(cycle: number): Promise<ModeDecision> {
    if (this.memo?.cycle === cycle) return this.memo.decision;
    const decision = this.decide();
    this.memo = { cycle, decision };
    return decision;
  }

  private async decide(): Promise<ModeDecision> {
    if (!this.remote?.configured) return { mode: 'local_only' };

    const probe = await this.remote.probe();
    if (probe.ok) return { mode: 'augmented' };

    this.logger.warn(`remote API unavailable, using local-only mode: ${probe.error.message}`, {
      code: probe.error.code,
    });
    return { mode: 'local_only', reason: probe.error.message };
  }
}
