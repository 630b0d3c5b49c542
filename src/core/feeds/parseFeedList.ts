import { parse } from "csv-parse/sync";
import { createFeedSpec, type FeedSpec, InvalidFeedSpecError } from "./feedSpec";

export type MalformedFeedRecord = {
  line: number;
  fields: string[];
  reason: string;
};

export type ParsedFeedList = {
  specs: FeedSpec[];
  malformed: MalformedFeedRecord[];
};

const splitRecord = (text: string): string[] => {
  const rows: unknown = parse(text, { bom: true, relax_column_count: true, relax_quotes: true });
  if (!Array.isArray(rows)) return [];

  const first: unknown = rows[0];
  return Array.isArray(first) ? first.map((field) => String(field)) : [];
};

/**
 * Parses the feed list: one CSV record per line, `graph,feed,url[,feed_info_url]`.
 * Blank lines and records whose first field starts with `#` are ignored.
 * Bad records are collected, never thrown.
 */
export const parseFeedList = (text: string): ParsedFeedList => {
  const specs: FeedSpec[] = [];
  const malformed: MalformedFeedRecord[] = [];

  text.split(/\r?\n/).forEach((rawLine, index) => {
    const line = index + 1;
    if (rawLine.trim() === "") return;

    let fields: string[];
    try {
      fields = splitRecord(rawLine);
    } catch (err) {
      malformed.push({ line, fields: [rawLine], reason: err instanceof Error ? err.message : String(err) });
      return;
    }

    if (fields.length === 0 || fields[0].trim().startsWith("#")) return;

    try {
      specs.push(createFeedSpec(fields, line));
    } catch (err) {
      if (!(err instanceof InvalidFeedSpecError)) throw err;
      malformed.push({ line, fields, reason: err.message });
    }
  });

  return { specs, malformed };
};
