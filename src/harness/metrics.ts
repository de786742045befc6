/**
 * Delivery metrics.
 *
 * Summarizes queue counters across the views attached to a harness, for
 * comparing thinning factors and checking how much a backlog was thinned.
 */

import type { QueueStats } from '../state/queue.js';

export interface DeliverySource {
  stats: QueueStats;
  pending: number;
  rendered: number;
}

export interface DeliverySummary {
  views: number;
  posted: number;
  forwarded: number;
  skipped: number;
  /** Snapshots still queued (paused or disabled views). */
  pending: number;
  /** onStateChanged calls, including redeliveries on resume. */
  rendered: number;
  /** skipped / posted, 0 when nothing was posted. */
  skipRatio: number;
}

export function summarizeDelivery(sources: DeliverySource[]): DeliverySummary {
  const summary: DeliverySummary = {
    views: sources.length,
    posted: 0,
    forwarded: 0,
    skipped: 0,
    pending: 0,
    rendered: 0,
    skipRatio: 0,
  };

  for (const source of sources) {
    summary.posted += source.stats.posted;
    summary.forwarded += source.stats.forwarded;
    summary.skipped += source.stats.skipped;
    summary.pending += source.pending;
    summary.rendered += source.rendered;
  }

  summary.skipRatio = summary.posted === 0 ? 0 : summary.skipped / summary.posted;
  return summary;
}

export function formatDelivery(summary: DeliverySummary, label?: string): string {
  const lines: string[] = [];
  if (label) lines.push(`── ${label} ──`);
  lines.push(`  Views:     ${summary.views}`);
  lines.push(`  Posted:    ${summary.posted}`);
  lines.push(`  Forwarded: ${summary.forwarded}`);
  lines.push(`  Skipped:   ${summary.skipped} (${(summary.skipRatio * 100).toFixed(1)}%)`);
  lines.push(`  Pending:   ${summary.pending}`);
  lines.push(`  Rendered:  ${summary.rendered}`);
  return lines.join('\n');
}
