/**
 * Upload Command
 *
 * Replicates the top-level files of a folder to every enabled target, prints
 * a per-target summary and writes the presigned link report.
 */

import ora from 'ora';
import chalk from 'chalk';
import {
  LinkPublisher,
  ReplicationEngine,
  measureUsage,
  renderLinkReport,
  scanSourceDirectory,
  totalBytes,
  type ConnectedTarget,
  type ReplicationResult,
  type TransferProgressEvent,
  type TransferStartEvent,
} from '@skyrelay/upload';
import { formatDuration, formatGb, safeWriteFile } from '@skyrelay/utils';
import { config, resolveRunSettings, type CommandOptions } from '../config/index.js';
import {
  printCommandError,
  printDecision,
  printHeader,
  printInfo,
  printKeyValue,
  printOutcome,
  printSuccess,
  printWarning,
} from '../lib/output.js';
import { loadAndConnect, printLinks, printUsage } from '../lib/targets.js';

export async function uploadCommand(dir: string, options: CommandOptions): Promise<void> {
  const controller = new AbortController();
  const onInterrupt = () => {
    printWarning('Interrupted, cancelling transfers in flight...');
    controller.abort();
  };
  process.once('SIGINT', onInterrupt);

  try {
    const settings = resolveRunSettings(config, options);

    const spinner = ora('Scanning source folder...').start();
    const items = await scanSourceDirectory(dir);
    spinner.succeed(`Found ${items.length} file(s), ${formatGb(totalBytes(items))} GB`);

    const connected = await loadAndConnect(settings.targetsFile, true);

    const engine = new ReplicationEngine({
      retry: settings.retry,
      transferTimeoutMs: settings.transferTimeoutMs,
      maxConcurrentTransfers: settings.maxConcurrentTransfers,
      partSizeBytes: settings.partSizeBytes,
      maxConcurrentParts: settings.maxConcurrentParts,
      rejectDegradedUsage: settings.rejectDegradedUsage,
    });

    engine.on('decision', printDecision);
    engine.on('transfer:start', (event: TransferStartEvent) => {
      const retryNote = event.attempt > 1 ? chalk.yellow(` (attempt ${event.attempt})`) : '';
      printInfo(`[${event.target}] Uploading: ${event.item.name} (${formatGb(event.item.sizeBytes)} GB)${retryNote}`);
    });
    engine.on('progress', (event: TransferProgressEvent) => console.log(chalk.gray(event.line)));
    engine.on('transfer:complete', printOutcome);

    const result = await engine.run(connected, items, controller.signal);

    await printSummary(result, connected);

    const sections = await new LinkPublisher().publishAll(result.ledger, connected, settings.expirySeconds);
    if (sections.length === 0) {
      printWarning('Nothing was uploaded, no links to publish');
      return;
    }

    printHeader('Presigned URLs');
    printLinks(sections);

    await safeWriteFile(settings.reportFile, renderLinkReport(sections, {
      expirySeconds: settings.expirySeconds,
      generatedAt: new Date(),
    }));
    console.log();
    printSuccess(`Presigned URLs saved to ${settings.reportFile}`);
  } catch (error) {
    printCommandError(error);
  } finally {
    process.removeListener('SIGINT', onInterrupt);
  }
}

async function printSummary(result: ReplicationResult, connected: readonly ConnectedTarget[]): Promise<void> {
  printHeader(`Upload summary (${formatDuration(result.durationMs)})`);

  for (const entry of connected) {
    if (!entry.target.enabled) {
      continue;
    }

    const name = entry.target.name;
    const uploaded = result.ledger.succeeded(name).length;
    const failures = result.ledger.failures(name);

    console.log(chalk.bold(`${name}:`));
    printKeyValue('Files uploaded', `${uploaded}/${result.items.length}`);
    if (failures.length > 0) {
      const reasons = new Set(failures.map((f) => ('reason' in f ? f.reason : f.status)));
      printKeyValue('Not uploaded', `${failures.length} (${[...reasons].join('; ')})`);
    }

    if (entry.client) {
      printUsage(entry.target, await measureUsage(entry.client, entry.target.bucket));
    } else {
      printKeyValue('Status', entry.error ?? entry.state);
    }
    console.log();
  }
}
