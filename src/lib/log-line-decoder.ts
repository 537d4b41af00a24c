import { LOG_TAGS, type LogTag } from '../types/request-record';

// Column layout of `varnishlog -o` output:
//   "  270 RxHeader     c Host: www.dogs.com"
export const LOG_TAG_START = 6;
export const LOG_TAG_END = 19;
export const LOG_VALUE_START = 21;

export interface DecodedLogLine {
  tag: string;
  value: string;
}

/**
 * Split one varnishlog line into its tag and value columns.
 * Returns null for lines too short to carry a value (blank separators etc).
 */
export function decodeLogLine(line: string): DecodedLogLine | null {
  if (line.length <= LOG_VALUE_START) {
    return null;
  }

  return {
    tag: line.slice(LOG_TAG_START, LOG_TAG_END).trim(),
    value: line.slice(LOG_VALUE_START),
  };
}

export function toLogTag(tag: string): LogTag | null {
  return LOG_TAGS.find((known) => known === tag) ?? null;
}
