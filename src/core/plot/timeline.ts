/**
 * Text timeline of archive timestamps
 */

import color from "picocolors";
import { formatDate } from "../../utils/format";
import type { ListingEntry } from "../borg/listing";

const DAY_MS = 24 * 60 * 60 * 1000;
const LABEL_CROWDING_MS = 36 * 60 * 60 * 1000;
const LABEL_WIDTH = 10;

export interface TimelineOptions {
  color?: boolean;
  /** Print the archive name beside each marker */
  names?: boolean;
  /** Upper bound on blank rows drawn for one gap */
  maxGapRows?: number;
}

/**
 * One date label per archive. A label is blanked when the archive sits less
 * than 36 hours from both neighbours; the first two and the last archive keep
 * theirs so the ends of the axis stay readable.
 */
export function makeLabels(times: Date[]): string[] {
  const labels = times.map((time) => formatDate(time));

  for (let i = 2; i < times.length - 1; i++) {
    const prev = times[i - 1];
    const current = times[i];
    const next = times[i + 1];
    if (!prev || !current || !next) continue;

    const sincePrev = current.getTime() - prev.getTime();
    const untilNext = next.getTime() - current.getTime();
    if (sincePrev < LABEL_CROWDING_MS && untilNext < LABEL_CROWDING_MS) {
      labels[i] = "";
    }
  }

  return labels;
}

/**
 * Blank rows between two archives: one per whole day without an archive,
 * capped at `maxGapRows`
 */
export function gapRows(previous: Date, current: Date, maxGapRows: number): number {
  const days = Math.floor((current.getTime() - previous.getTime()) / DAY_MS);
  return Math.min(Math.max(days - 1, 0), maxGapRows);
}

export function renderTimeline(entries: ListingEntry[], options: TimelineOptions = {}): string[] {
  const c = color.createColors(options.color ?? false);
  const maxGapRows = options.maxGapRows ?? 3;
  const labels = makeLabels(entries.map((entry) => entry.time));
  const spacer = `${" ".repeat(LABEL_WIDTH)}   ${c.dim("│")}`;
  const lines: string[] = [];

  entries.forEach((entry, i) => {
    const previous = entries[i - 1];
    if (previous) {
      const days = Math.floor((entry.time.getTime() - previous.time.getTime()) / DAY_MS);
      const rows = gapRows(previous.time, entry.time, maxGapRows);
      for (let row = 0; row < rows; row++) {
        const truncated = row === rows - 1 && days - 1 > maxGapRows;
        lines.push(truncated ? `${spacer} ${c.dim(`… ${days} days`)}` : spacer);
      }
    }

    const label = (labels[i] ?? "").padEnd(LABEL_WIDTH);
    const name = options.names ? ` ${entry.name}` : "";
    lines.push(`${label} ──${c.green("●")}${name}`);
  });

  return lines;
}
