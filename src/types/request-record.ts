/**
 * varnishlog tags the assembler reacts to
 */
export type LogTag = 'RxRequest' | 'RxURL' | 'RxProtocol' | 'RxHeader' | 'ReqEnd';

export const LOG_TAGS: readonly LogTag[] = ['RxRequest', 'RxURL', 'RxProtocol', 'RxHeader', 'ReqEnd'];

export interface HeaderEntry {
  name: string;
  value: string;
}

/**
 * One request as reconstructed from the log feed. Fields stay undefined
 * until their tag has been seen.
 */
export interface RequestRecord {
  method?: string;
  path?: string;
  protocol?: string;
  headers: HeaderEntry[];     // append order, duplicates kept
}

export interface HttpVersion {
  major: number;
  minor: number;
}

export type ReplayScheme = 'http' | 'https';

export interface OutboundRequest {
  readonly method: string;
  readonly url: string;         // scheme + target host + path/query
  readonly scheme: ReplayScheme;
  readonly protocol: string;
  readonly version: Readonly<HttpVersion>;
  readonly headers: readonly Readonly<HeaderEntry>[];
  readonly originalHost: string;  // source Host header, '' when absent
}

export function createEmptyRecord(): RequestRecord {
  return { headers: [] };
}

export function cloneRecord(record: RequestRecord): RequestRecord {
  return {
    ...record,
    headers: record.headers.map((header) => ({ ...header })),
  };
}

/**
 * Case-insensitive header lookup, first match wins
 */
export function getHeader(headers: readonly HeaderEntry[], name: string): string | undefined {
  const wanted = name.toLowerCase();
  return headers.find((header) => header.name.toLowerCase() === wanted)?.value;
}
