/**
 * SSH management channel
 *
 * Two operations the probe needs: forget a cached host key (addresses are
 * recycled by the provider, so a stale key would fail the handshake) and a
 * non-interactive `echo ready` round trip.
 */

import { homedir } from 'node:os';
import { join } from 'node:path';
import { CommandError } from '../errors.js';
import { formatCommand, runCommand, type CommandRunner } from '../utils/exec.js';

export interface SshCredential {
  user: string;
  keyPath: string;
}

export interface ManagementChannel {
  /** Drop any cached host identity for `address` */
  purgeIdentity(address: string): Promise<void>;
  /**
   * One reachability check
   * @throws when the host did not answer
   */
  handshake(address: string, credential: SshCredential, signal: AbortSignal): Promise<void>;
}

export interface SshChannelOptions {
  /** Connect timeout passed to ssh, in seconds (default: 2) */
  connectTimeoutSec?: number;
  knownHostsPath?: string;
  runner?: CommandRunner;
}

export class SshManagementChannel implements ManagementChannel {
  private readonly connectTimeoutSec: number;
  private readonly knownHostsPath: string;
  private readonly runner: CommandRunner;
  /** Tail of the queued known-hosts rewrites */
  private purgeChain: Promise<void> = Promise.resolve();

  constructor(options: SshChannelOptions = {}) {
    this.connectTimeoutSec = options.connectTimeoutSec ?? 2;
    this.knownHostsPath = options.knownHostsPath ?? join(homedir(), '.ssh', 'known_hosts');
    this.runner = options.runner ?? runCommand;
  }

  /**
   * Calls are queued: `ssh-keygen -R` rewrites the whole file, so two
   * overlapping runs would each write back the other's removed entry.
   */
  purgeIdentity(address: string): Promise<void> {
    const run = this.purgeChain.then(async () => {
      // Exit 1 just means there was no entry
      await this.runner('ssh-keygen', ['-f', this.knownHostsPath, '-R', address]);
    });
    // The caller sees a failure through `run`; later purges still go ahead
    this.purgeChain = run.catch(() => undefined);
    return run;
  }

  handshakeArgs(address: string, credential: SshCredential): string[] {
    return [
      '-o', 'BatchMode=yes',
      '-o', `ConnectTimeout=${this.connectTimeoutSec}`,
      '-o', 'StrictHostKeyChecking=accept-new',
      '-o', `UserKnownHostsFile=${this.knownHostsPath}`,
      '-i', credential.keyPath,
      `${credential.user}@${address}`,
      'echo ready',
    ];
  }

  async handshake(address: string, credential: SshCredential, signal: AbortSignal): Promise<void> {
    const args = this.handshakeArgs(address, credential);
    const output = await this.runner('ssh', args, { signal });
    if (output.exitCode !== 0 || !output.stdout.includes('ready')) {
      throw new CommandError(formatCommand('ssh', args), output.exitCode, output.stderr);
    }
  }
}
