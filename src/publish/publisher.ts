/**
 * Publish collaborators - the external side effect the orchestrator guards.
 */

import { execa } from 'execa';
import { logger } from '../utils/logger.js';
import { PublishAmbiguousOutcomeError, PublishTransportError } from '../pipeline/errors.js';
import type { GroupKey } from '../pipeline/types.js';

/** What is sent to the collaborator for one group */
export interface PublishPayload {
  token: string;
  trackId: number;
  groupKey: GroupKey;
  items: Array<{ id: string; payload: unknown }>;
}

export type PublishOutcome = { ok: true; reference?: string } | { ok: false; reason: string };

/**
 * External publish call. Resolving `{ ok: false }` is an explicit
 * rejection; throwing is a transport error, except for
 * PublishAmbiguousOutcomeError, which means the outcome is unknown.
 */
export interface Publisher {
  publish(payload: PublishPayload, options: { signal: AbortSignal }): Promise<PublishOutcome>;
}

export interface CommandPublisherConfig {
  command: string;
  args?: string[];
  cwd?: string;
  env?: Record<string, string>;
}

/**
 * Runs a configured executable per publish, JSON payload on stdin.
 *
 * Exit 0 is success (stdout becomes the reference), any other exit is an
 * explicit rejection with stderr as the reason. A process that was
 * cancelled or killed leaves the outcome unknown.
 */
export class CommandPublisher implements Publisher {
  constructor(private readonly config: CommandPublisherConfig) {}

  async publish(payload: PublishPayload, options: { signal: AbortSignal }): Promise<PublishOutcome> {
    const startTime = Date.now();
    let result;
    try {
      result = await execa(this.config.command, this.config.args ?? [], {
        cwd: this.config.cwd,
        env: this.config.env,
        input: JSON.stringify(payload),
        cancelSignal: options.signal,
        reject: false,
        stripFinalNewline: true,
      });
    } catch (error) {
      throw new PublishTransportError(
        `Failed to run publish command ${this.config.command}: ${error instanceof Error ? error.message : String(error)}`,
        { cause: error }
      );
    }

    const durationMs = Date.now() - startTime;

    if (result.isCanceled) {
      throw new PublishAmbiguousOutcomeError(
        `Publish command for ${payload.token} was cancelled after ${durationMs}ms`
      );
    }

    if (result.signal !== undefined) {
      throw new PublishAmbiguousOutcomeError(`Publish command for ${payload.token} was killed by ${result.signal}`);
    }

    if (result.exitCode === undefined) {
      // Could not be spawned
      throw new PublishTransportError(`Publish command ${this.config.command} did not start`);
    }

    logger.info('Publish command finished', {
      token: payload.token,
      exitCode: result.exitCode,
      durationMs,
    });

    if (result.exitCode === 0) {
      const reference = result.stdout.trim();
      return reference.length > 0 ? { ok: true, reference } : { ok: true };
    }

    const stderr = result.stderr.trim();
    return { ok: false, reason: stderr.length > 0 ? stderr : `exit code ${result.exitCode}` };
  }
}
