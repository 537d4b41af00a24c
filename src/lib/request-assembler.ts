import {
  type RequestRecord,
  type HeaderEntry,
  type LogTag,
  cloneRecord,
  createEmptyRecord,
} from '../types/request-record';
import { decodeLogLine, toLogTag } from './log-line-decoder';

export type RecordCallback = (record: RequestRecord) => void;

export interface RequestAssemblerOptions {
  /** Called with the raw value of an RxHeader line that has no "Name: Value" shape */
  onMalformedHeader?: (value: string) => void;
  /** Called when an RxRequest arrives before the previous record's ReqEnd */
  onAbandoned?: (record: RequestRecord) => void;
}

/**
 * Parse an RxHeader value. Splits on the first colon only, so values such as
 * "Referer: http://www.dogs.com/" keep their own colons.
 */
export function parseHeaderLine(value: string): HeaderEntry | null {
  const separator = value.indexOf(':');
  if (separator === -1) return null;

  const name = value.slice(0, separator).trim();
  if (!name) return null;

  return {
    name,
    value: value.slice(separator + 1).trim(),
  };
}

/**
 * Folds tagged varnishlog lines into request records.
 *
 * RxRequest starts a record, ReqEnd completes it. On completion the slot is
 * replaced with a fresh record before the callback runs, so the completed
 * record is no longer reachable from the assembler.
 */
export class RequestAssembler {
  private record: RequestRecord = createEmptyRecord();
  private options: RequestAssemblerOptions;

  constructor(options: RequestAssemblerOptions = {}) {
    this.options = options;
  }

  /**
   * Decode and apply one raw log line
   */
  processLine(line: string, onComplete: RecordCallback): void {
    const decoded = decodeLogLine(line);
    if (!decoded) return;

    const tag = toLogTag(decoded.tag);
    if (!tag) return;

    this.apply(tag, decoded.value, onComplete);
  }

  apply(tag: LogTag, value: string, onComplete: RecordCallback): void {
    switch (tag) {
      case 'RxRequest':
        if (this.hasContent()) {
          this.options.onAbandoned?.(cloneRecord(this.record));
        }
        this.record = createEmptyRecord();
        this.record.method = value;
        break;

      case 'RxURL':
        this.record.path = value;
        break;

      case 'RxProtocol':
        this.record.protocol = value;
        break;

      case 'RxHeader': {
        const header = parseHeaderLine(value);
        if (header) {
          this.record.headers.push(header);
        } else {
          this.options.onMalformedHeader?.(value);
        }
        break;
      }

      case 'ReqEnd': {
        const completed = this.record;
        this.record = createEmptyRecord();
        onComplete(completed);
        break;
      }
    }
  }

  /**
   * Copy of the record currently being built
   */
  current(): RequestRecord {
    return cloneRecord(this.record);
  }

  private hasContent(): boolean {
    const { method, path, protocol, headers } = this.record;
    return method !== undefined || path !== undefined || protocol !== undefined || headers.length > 0;
  }
}
