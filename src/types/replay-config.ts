export type LogSourceKind = 'varnishlog' | 'file' | 'stdin';

export interface ReplayConfig {
  targetHost: string;           // e.g. "teststage.local" or "10.0.0.5:8080"
  source: LogSourceKind;
  inputPath?: string;           // only for source === 'file'

  // varnishlog process
  varnishlogBinary: string;
  varnishlogArgs: string[];

  // Output
  verbose: boolean;
  color: boolean;
  jsonLogPath?: string;

  requestTimeout?: number;      // ms, socket timeout per request (unset = transport default)
}

/**
 * Settings that may be stored in ~/.varnish-replay/config.json
 */
export type StoredReplayConfig = Partial<
  Pick<ReplayConfig, 'varnishlogBinary' | 'varnishlogArgs' | 'requestTimeout'>
>;

/**
 * Client requests only, grouped by request, unbuffered, limited to the
 * tags the assembler understands
 */
export const DEFAULT_VARNISHLOG_ARGS: string[] = [
  '-c',
  '-o',
  '-u',
  '-i',
  'RxRequest,RxURL,RxProtocol,RxHeader,ReqEnd',
];

export const DEFAULT_REPLAY_CONFIG: Omit<ReplayConfig, 'targetHost'> = {
  source: 'varnishlog',
  varnishlogBinary: 'varnishlog',
  varnishlogArgs: DEFAULT_VARNISHLOG_ARGS,
  verbose: false,
  color: true,
};
