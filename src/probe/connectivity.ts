/**
 * Connectivity probe
 *
 * Blocks until freshly provisioned hosts answer on the management channel,
 * so the configuration backend never runs against a host still booting.
 */

import { UnreachableError } from '../errors.js';
import { settleWithConcurrency } from '../utils/concurrency.js';
import { silentLogger, type Logger } from '../utils/logger.js';
import { withRetry } from '../utils/retry.js';
import type { ManagementChannel, SshCredential } from './ssh.js';

export interface ProbeSettings {
  /** Wait between attempts in ms (default: 3000) */
  intervalMs: number;
  /** Attempts per host (default: 50) */
  maxAttempts: number;
  /** Bound on one handshake in ms (default: 2000) */
  attemptTimeoutMs: number;
  /** Bound on the whole poll for one host in ms */
  deadlineMs?: number;
}

export const DEFAULT_PROBE_SETTINGS: ProbeSettings = {
  intervalMs: 3000,
  maxAttempts: 50,
  attemptTimeoutMs: 2000,
};

export interface ProbeTarget {
  name: string;
  address: string;
}

export class ConnectivityProbe {
  private readonly log: Logger;
  private readonly sleep?: (ms: number) => Promise<void>;

  constructor(
    private readonly channel: ManagementChannel,
    private readonly credential: SshCredential,
    private readonly settings: ProbeSettings = DEFAULT_PROBE_SETTINGS,
    options: { logger?: Logger; sleep?: (ms: number) => Promise<void> } = {}
  ) {
    this.log = (options.logger ?? silentLogger()).child({ component: 'probe' });
    this.sleep = options.sleep;
  }

  /**
   * Resolve once `address` answers; reject with UnreachableError when the
   * attempt budget or the deadline runs out.
   */
  async awaitReachable(address: string): Promise<void> {
    await this.channel.purgeIdentity(address);
    await this.poll(address);
  }

  private async poll(address: string): Promise<void> {
    const result = await withRetry(
      (signal) => this.channel.handshake(address, this.credential, signal),
      {
        maxAttempts: this.settings.maxAttempts,
        intervalMs: this.settings.intervalMs,
        attemptTimeoutMs: this.settings.attemptTimeoutMs,
        deadlineMs: this.settings.deadlineMs,
        sleep: this.sleep,
        logger: this.log,
        label: `handshake ${address}`,
      }
    );

    if (!result.success) {
      throw new UnreachableError([address], result.attempts);
    }
    this.log.info(`${address} is reachable`, { attempts: result.attempts });
  }

  /**
   * Probe every target at once and wait for all of them. Host identities
   * are purged one at a time before any handshake starts, since every purge
   * rewrites the same known-hosts file.
   *
   * @throws UnreachableError listing every address that never answered
   */
  async probeAll(targets: ProbeTarget[]): Promise<void> {
    if (targets.length === 0) return;

    for (const target of targets) {
      await this.channel.purgeIdentity(target.address);
    }

    const results = await settleWithConcurrency({
      items: targets,
      concurrency: targets.length,
      fn: (target) => this.poll(target.address),
    });

    const unreachable: string[] = [];
    results.forEach((result, i) => {
      if (result.status === 'rejected') {
        unreachable.push(targets[i].address);
        const reason: unknown = result.reason;
        if (!(reason instanceof UnreachableError)) {
          this.log.warn(`Probe of ${targets[i].name} failed`, {
            error: reason instanceof Error ? reason.message : String(reason),
          });
        }
      }
    });

    if (unreachable.length > 0) {
      throw new UnreachableError(unreachable, this.settings.maxAttempts);
    }
  }
}
