/**
 * Checkpoint Sweeper
 *
 * Polls for sessions that have been waiting for contact info longer than
 * maxWaitMs and clears their flag (reason "expired"), so a reply that arrives
 * days later is handled as a fresh turn instead of a stale resume.
 */

import type { ConversationEvent, FlagClearReason } from '../../../../packages/shared-types/src';
import type { CheckpointStore } from '../services/checkpoint-store';
import type { ClearCheckpointOptions } from '../services/inbound-router';
import { describeError } from '../utils/logging';

/**
 * Sweeper configuration
 */
export interface SweeperConfig {
  store: Pick<CheckpointStore, 'findWaitingSessions'>;
  /** Clears a flag under the same per-session lock inbound messages use */
  checkpoints: CheckpointClearer;
  pollIntervalMs: number;
  maxWaitMs: number;
  now?: () => Date;
}

export interface CheckpointClearer {
  clearCheckpoint(
    sessionId: string,
    reason: FlagClearReason,
    options?: ClearCheckpointOptions
  ): Promise<ConversationEvent | null>;
}

export interface SweepResult {
  expired: string[];
  failed: string[];
}

export class CheckpointSweeper {
  private config: Required<SweeperConfig>;
  private isRunning = false;
  private isSweeping = false;
  private pollTimer: NodeJS.Timeout | null = null;

  constructor(config: SweeperConfig) {
    this.config = {
      ...config,
      now: config.now ?? (() => new Date()),
    };
  }

  /**
   * Start the polling loop
   */
  start(): void {
    if (this.isRunning) {
      console.log('[Sweeper] Already running');
      return;
    }

    this.isRunning = true;
    console.log('[Sweeper] Started');
    console.log(`[Sweeper] Config: poll=${this.config.pollIntervalMs}ms, maxWait=${this.config.maxWaitMs}ms`);
    this.schedule(0);
  }

  /**
   * Stop the worker
   */
  stop(): void {
    this.isRunning = false;
    if (this.pollTimer) {
      clearTimeout(this.pollTimer);
      this.pollTimer = null;
    }
    console.log('[Sweeper] Stopped');
  }

  get running(): boolean {
    return this.isRunning;
  }

  /**
   * Expire every checkpoint older than maxWaitMs. One failing session does not
   * stop the others.
   */
  async sweep(): Promise<SweepResult> {
    const result: SweepResult = { expired: [], failed: [] };
    if (this.isSweeping) {
      console.log('[Sweeper] Previous sweep still running, skipping');
      return result;
    }

    this.isSweeping = true;
    try {
      const cutoff = new Date(this.config.now().getTime() - this.config.maxWaitMs);
      const sessions = await this.config.store.findWaitingSessions({ olderThan: cutoff });

      if (sessions.length > 0) {
        console.log(`[Sweeper] Found ${sessions.length} expired checkpoint(s)`);
      }

      for (const session of sessions) {
        try {
          // null: the session was resumed, or paused again, after the query ran
          const event = await this.config.checkpoints.clearCheckpoint(session.sessionId, 'expired', {
            olderThan: cutoff,
          });
          if (event) {
            result.expired.push(session.sessionId);
          }
        } catch (error) {
          console.error(`[Sweeper] Failed to expire session ${session.sessionId}:`, describeError(error));
          result.failed.push(session.sessionId);
        }
      }
    } finally {
      this.isSweeping = false;
    }

    return result;
  }

  private schedule(delayMs: number): void {
    this.pollTimer = setTimeout(() => {
      this.sweep()
        .catch((error: unknown) => {
          console.error('[Sweeper] Error in sweep:', describeError(error));
        })
        .finally(() => {
          if (this.isRunning) {
            this.schedule(this.config.pollIntervalMs);
          }
        });
    }, delayMs);
  }
}

/**
 * Create a checkpoint sweeper instance
 */
export function createCheckpointSweeper(config: SweeperConfig): CheckpointSweeper {
  return new CheckpointSweeper(config);
}
