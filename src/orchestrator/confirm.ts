/**
 * Operator confirmation gate
 */

import { createInterface } from 'node:readline';
import chalk from 'chalk';

export interface ConfirmationRequest {
  kind: 'apply' | 'destroy';
  message: string;
  /** One line per affected node */
  details: string[];
}

export interface Confirmer {
  confirm(request: ConfirmationRequest): Promise<boolean>;
}

/**
 * Interpret a y/n answer; anything else is the default
 */
export function parseAnswer(answer: string, defaultValue: boolean): boolean {
  const trimmed = answer.trim().toLowerCase();
  if (trimmed === 'y' || trimmed === 'yes') return true;
  if (trimmed === 'n' || trimmed === 'no') return false;
  return defaultValue;
}

/**
 * Prompt user for confirmation
 * Returns true if user confirms, false otherwise. Input closing before an
 * answer (Ctrl-D) counts as the default.
 */
export async function promptConfirmation(
  message: string,
  defaultValue = false,
  streams: { input: NodeJS.ReadableStream; output: NodeJS.WritableStream } = {
    input: process.stdin,
    output: process.stderr,
  }
): Promise<boolean> {
  const rl = createInterface({ input: streams.input, output: streams.output });
  const defaultHint = defaultValue ? '[Y/n]' : '[y/N]';

  return new Promise((resolve) => {
    let settled = false;
    const settle = (value: boolean) => {
      if (settled) return;
      settled = true;
      resolve(value);
    };

    rl.on('close', () => settle(defaultValue));
    rl.question(`${message} ${defaultHint} `, (answer) => {
      settle(parseAnswer(answer, defaultValue));
      rl.close();
    });
  });
}

export class PromptConfirmer implements Confirmer {
  async confirm(request: ConfirmationRequest): Promise<boolean> {
    const color = request.kind === 'destroy' ? chalk.red : chalk.yellow;
    console.error(color.bold(`\n${request.message}`));
    for (const line of request.details) {
      console.error(`  ${line}`);
    }
    return promptConfirmation(
      request.kind === 'destroy' ? 'Destroy these nodes?' : 'Apply these changes?',
      false
    );
  }
}

/** `--yes` */
export const autoApprove: Confirmer = {
  confirm: async () => true,
};

/** No terminal and no `--yes`: nothing destructive happens */
export const declineAll: Confirmer = {
  confirm: async () => false,
};

export function createConfirmer(options: { yes: boolean; interactive: boolean }): Confirmer {
  if (options.yes) return autoApprove;
  return options.interactive ? new PromptConfirmer() : declineAll;
}
