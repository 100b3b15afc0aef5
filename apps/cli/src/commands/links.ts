/**
 * Links Command
 *
 * Regenerates presigned URLs for everything currently stored in each enabled
 * target's bucket and rewrites the link report.
 */

import { LinkPublisher, renderLinkReport } from '@skyrelay/upload';
import { safeWriteFile } from '@skyrelay/utils';
import { config, resolveRunSettings, type CommandOptions } from '../config/index.js';
import { printCommandError, printHeader, printSuccess, printWarning } from '../lib/output.js';
import { loadAndConnect, printLinks } from '../lib/targets.js';

export async function linksCommand(options: CommandOptions): Promise<void> {
  try {
    const settings = resolveRunSettings(config, options);
    const connected = await loadAndConnect(settings.targetsFile, false);

    const publisher = new LinkPublisher();
    const sections = await Promise.all(
      connected
        .filter((entry) => entry.state === 'ready')
        .map((entry) => publisher.publishBucket(entry, settings.expirySeconds))
    );

    const total = sections.reduce((sum, section) => sum + section.links.length, 0);
    if (total === 0) {
      printWarning('No files found in any bucket');
      return;
    }

    printHeader('Presigned URLs');
    printLinks(sections);

    await safeWriteFile(settings.reportFile, renderLinkReport(sections, {
      expirySeconds: settings.expirySeconds,
      generatedAt: new Date(),
    }));
    console.log();
    printSuccess(`${total} presigned URL(s) saved to ${settings.reportFile}`);
  } catch (error) {
    printCommandError(error);
  }
}
