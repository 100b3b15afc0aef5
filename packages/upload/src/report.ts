/**
 * Link Report
 *
 * Plain-text document of presigned URLs grouped by target. Meant for people,
 * rewritten in full on every run.
 */

import type { LinkSection } from './linkPublisher.js';

const RULE = '='.repeat(70);
const DIVIDER = '-'.repeat(70);

export interface LinkReportOptions {
  expirySeconds: number;
  generatedAt?: Date;
}

/**
 * "7 days", "12 hours", "90 minutes" or "45 seconds"
 */
export function describeExpiry(seconds: number): string {
  const units: Array<[number, string]> = [
    [86400, 'day'],
    [3600, 'hour'],
    [60, 'minute'],
  ];
  for (const [size, unit] of units) {
    if (seconds >= size && seconds % size === 0) {
      const count = seconds / size;
      return `${count} ${unit}${count === 1 ? '' : 's'}`;
    }
  }
  return `${seconds} second${seconds === 1 ? '' : 's'}`;
}

export function renderLinkReport(sections: readonly LinkSection[], options: LinkReportOptions): string {
  const lines: string[] = [
    RULE,
    `PRESIGNED URLs (Valid for ${describeExpiry(options.expirySeconds)})`,
    RULE,
  ];
  if (options.generatedAt) {
    lines.push(`Generated: ${options.generatedAt.toISOString()}`);
  }
  lines.push('');

  for (const section of sections) {
    if (section.links.length === 0) {
      continue;
    }

    lines.push(`${section.target}:`);
    lines.push(`Endpoint: ${section.endpoint}`);
    lines.push(`Bucket: ${section.bucket}`);
    if (section.expirySeconds !== options.expirySeconds) {
      lines.push(`Valid for: ${describeExpiry(section.expirySeconds)} (provider limit)`);
    }
    lines.push(DIVIDER, '');

    for (const link of section.links) {
      lines.push(`File: ${link.fileName}`);
      lines.push(`URL: ${link.url}`);
      if (link.publicUrl) {
        lines.push(`Public URL: ${link.publicUrl}`);
      }
      lines.push('');
    }
    lines.push('');
  }

  lines.push(
    RULE,
    `NOTE: These URLs will expire in ${describeExpiry(options.expirySeconds)} (${options.expirySeconds} seconds)`,
    RULE,
    ''
  );

  return lines.join('\n');
}
