/**
 * Parse `borg list` output
 *
 * Default line format: `<archive name padded to 36> <Day>, YYYY-MM-DD HH:MM:SS [<id>]`
 */

export interface ListingEntry {
  name: string;
  time: Date;
}

export interface ParsedListing {
  entries: ListingEntry[];
  /** Non-empty lines that did not look like an archive row */
  skipped: number;
}

const LISTING_LINE =
  /^(.+?)\s+(?:[A-Za-z]{3},\s+)?(\d{4})-(\d{2})-(\d{2})[ T](\d{2}):(\d{2}):(\d{2})(?:\s|$)/;

export function parseListingLine(line: string): ListingEntry | null {
  const match = line.match(LISTING_LINE);
  if (!match) return null;

  const [, name, year, month, day, hours, minutes, seconds] = match;
  if (!name || !year || !month || !day || !hours || !minutes || !seconds) return null;

  // borg prints archive times in local time
  const time = new Date(
    Number(year),
    Number(month) - 1,
    Number(day),
    Number(hours),
    Number(minutes),
    Number(seconds),
  );
  if (Number.isNaN(time.getTime())) return null;

  return { name: name.trim(), time };
}

/**
 * Parse a whole listing, returning entries in chronological order
 */
export function parseBorgListing(output: string): ParsedListing {
  const entries: ListingEntry[] = [];
  let skipped = 0;

  for (const line of output.split(/\r?\n/)) {
    if (line.trim() === "") continue;
    const entry = parseListingLine(line);
    if (entry) {
      entries.push(entry);
    } else {
      skipped++;
    }
  }

  entries.sort((a, b) => a.time.getTime() - b.time.getTime());
  return { entries, skipped };
}
