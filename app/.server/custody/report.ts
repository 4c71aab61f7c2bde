/**
 * Chain of custody report
 *
 * Fixed plain-text layout: header with transcript metadata, one stanza per
 * custody entry, one stanza per publication, footer with generation time.
 * Field order is stable so external verifiers can parse the text.
 */
import { format, parseISO } from 'date-fns';
import type { Transcript } from '~/types/transcript';
import type { CustodyEntry } from '~/types/custody-entry';
import { CUSTODY_ACTION_LABELS } from '~/types/custody-entry';
import type { HashPublication } from '~/types/hash-publication';
import { PUBLICATION_SERVICE_LABELS } from '~/types/hash-publication';

const HEAVY_RULE = '═'.repeat(59);
const LIGHT_RULE = '─'.repeat(59);

/**
 * Medium date + time, local time zone (e.g. "Dec 11, 2025, 3:04:05 PM")
 */
export function formatReportDate(value: string | Date): string {
  const date = typeof value === 'string' ? parseISO(value) : value;
  return format(date, 'MMM d, yyyy, h:mm:ss a');
}

export function renderCustodyReport(
  transcript: Pick<Transcript, 'id' | 'title' | 'sourcePlatform' | 'createdAt' | 'fileHash'>,
  entries: readonly CustodyEntry[],
  publications: readonly HashPublication[],
  generatedAt: Date
): string {
  let report = [
    HEAVY_RULE,
    'CHAIN OF CUSTODY REPORT',
    HEAVY_RULE,
    '',
    `Transcript: ${transcript.title}`,
    `Transcript ID: ${transcript.id}`,
    `Platform: ${transcript.sourcePlatform}`,
    `Created: ${formatReportDate(transcript.createdAt)}`,
    `Current Hash: ${transcript.fileHash}`,
    '',
    LIGHT_RULE,
    'CUSTODY HISTORY',
    LIGHT_RULE,
    '',
  ].join('\n');

  entries.forEach((entry, index) => {
    const lines = [
      '',
      `[${index + 1}] ${CUSTODY_ACTION_LABELS[entry.action]}`,
      `Timestamp: ${formatReportDate(entry.timestamp)}`,
      `Hash: ${entry.fileHash}`,
      `Status: ${entry.verificationStatus}`,
      `Details: ${entry.details}`,
    ];
    if (entry.storageLocation) {
      lines.push(`Location: ${entry.storageLocation}`);
    }
    report += `${lines.join('\n')}\n`;
  });

  report += ['', LIGHT_RULE, 'HASH PUBLICATIONS', LIGHT_RULE, ''].join('\n');

  publications.forEach((publication, index) => {
    const lines = [
      '',
      `[${index + 1}] ${PUBLICATION_SERVICE_LABELS[publication.service]}`,
      `Published: ${formatReportDate(publication.publishedAt)}`,
      `Status: ${publication.confirmationStatus}`,
    ];
    if (publication.publicUrl) {
      lines.push(`URL: ${publication.publicUrl}`);
    }
    if (publication.transactionId) {
      lines.push(`Transaction ID: ${publication.transactionId}`);
    }
    report += `${lines.join('\n')}\n`;
  });

  report += [
    '',
    HEAVY_RULE,
    'END OF REPORT',
    `Generated: ${formatReportDate(generatedAt)}`,
    HEAVY_RULE,
  ].join('\n');

  return report;
}
