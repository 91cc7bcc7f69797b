/**
 * One refresh attempt: run the agent, parse, normalize, and augment when the
 * cycle's mode allows it.
 *
 * The mode probe runs alongside the agent command so an unreachable remote
 * API never delays local data by more than its own timeout.
 *
 * @module overlay/state-loader
 */
import { STATUS_ARGS, type CommandExecutor } from './command-executor.js';
import { ExecutionFailureError, ExecutionTimeoutError } from './errors.js';
import type { ModeArbiter } from './mode-arbiter.js';
import { normalizeStatus } from './normalizer.js';
import { parseStatus } from './raw-parser.js';
import type { RemoteApiClient } from './remote-api-client.js';
import type { LoadContext, LoadResult, StateLoader } from './types.js';

export interface AgentStateLoaderDeps {
  executor: Pick<CommandExecutor, 'run'>;
  arbiter: Pick<ModeArbiter, 'selectMode'>;
  remote: Pick<RemoteApiClient, 'augment'> | null;
  commandTimeoutMs: number;
  clock?: () => Date;
}

export class AgentStateLoader implements StateLoader {
  private readonly clock: () => Date;

  constructor(private readonly deps: AgentStateLoaderDeps) {
    this.clock = deps.clock ?? (() => new Date());
  }

  async load(context: LoadContext): Promise<LoadResult> {
    const [decision, execution] = await Promise.all([
      this.deps.arbiter.selectMode(context.cycle),
      this.deps.executor.run(STATUS_ARGS, this.deps.commandTimeoutMs),
    ]);

    if (execution.kind === 'timeout') {
      return { ok: false, error: new ExecutionTimeoutError(execution.timeoutMs) };
    }
    if (execution.kind === 'failure') {
      return { ok: false, error: new ExecutionFailureError(execution.exitCode, execution.stderr) };
    }

    const parsed = parseStatus(execution.stdout);
    if (!parsed.success) return { ok: false, error: parsed.error };

    const state = normalizeStatus(parsed.data, { capturedAt: this.clock().toISOString() });
    if (decision.mode !== 'augmented' || !this.deps.remote) return { ok: true, state };

    const augmented = await this.deps.remote.augment(state);
    return { ok: true, state: augmented.state };
  }
}
