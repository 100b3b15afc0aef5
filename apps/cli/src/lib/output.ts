/**
 * Output Formatter
 *
 * Consistent CLI output formatting.
 */

import chalk from 'chalk';
import {
  NoEligibleTargetsError,
  isReplicationError,
  type CapacityDecision,
  type TransferOutcome,
} from '@skyrelay/core';
import { errorMessage, formatGb } from '@skyrelay/utils';

export function printSuccess(message: string): void {
  console.log(chalk.green('✓'), message);
}

export function printError(message: string): void {
  console.error(chalk.red('✗'), message);
}

export function printWarning(message: string): void {
  console.warn(chalk.yellow('!'), message);
}

export function printInfo(message: string): void {
  console.log(chalk.blue('i'), message);
}

export function printHeader(title: string): void {
  console.log();
  console.log(chalk.bold.underline(title));
  console.log();
}

export function printKeyValue(key: string, value: unknown): void {
  console.log(`  ${chalk.gray(key + ':')} ${value}`);
}

export function printDecision(decision: CapacityDecision): void {
  printHeader(`Capacity check: ${decision.target}`);
  printKeyValue('Existing files', `${formatGb(decision.existingBytes, 4)} GB`);
  printKeyValue('New files', `${formatGb(decision.pendingBytes, 4)} GB`);
  printKeyValue('Total would be', `${formatGb(decision.existingBytes + decision.pendingBytes, 4)} GB`);
  if (decision.maxBytes !== undefined) {
    printKeyValue('Maximum limit', `${formatGb(decision.maxBytes, 4)} GB`);
  }

  const status = decision.admitted ? chalk.green('eligible') : chalk.red('skipped');
  printKeyValue('Status', `${status} (${decision.reason})`);
  if (decision.degraded) {
    printWarning(`Occupied size of ${decision.target} could not be fully measured`);
  }
}

export function printOutcome(outcome: TransferOutcome): void {
  switch (outcome.status) {
    case 'succeeded':
      printSuccess(`[${outcome.target}] Uploaded ${outcome.item.name}`);
      break;
    case 'transfer-failed':
      printError(`[${outcome.target}] Failed ${outcome.item.name}: ${outcome.reason}`);
      break;
    // Rejected and unavailable targets are reported once by their decision
    case 'capacity-rejected':
    case 'client-unavailable':
      break;
  }
}

/**
 * Print an error and mark the process as failed
 */
export function printCommandError(error: unknown): void {
  if (isReplicationError(error)) {
    printError(`${chalk.gray(`[${error.code}]`)} ${error.message}`);
  } else {
    printError(errorMessage(error));
  }

  if (error instanceof NoEligibleTargetsError) {
    for (const decision of error.decisions) {
      printKeyValue(decision.target, decision.reason);
    }
  }

  process.exitCode = 1;
}
