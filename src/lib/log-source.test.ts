import * as fs from 'fs/promises';
import * as os from 'os';
import * as path from 'path';
import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { startVarnishlog, openLogFile, openLogSource } from './log-source';
import { DEFAULT_REPLAY_CONFIG, type ReplayConfig } from '../types/replay-config';

function readAll(stream: NodeJS.ReadableStream): Promise<string> {
  return new Promise((resolve, reject) => {
    const chunks: string[] = [];
    stream.on('data', (chunk) => chunks.push(String(chunk)));
    stream.on('end', () => resolve(chunks.join('')));
    stream.on('error', reject);
  });
}

// node stands in for varnishlog so the tests need no Varnish install
const node = process.execPath;

describe('startVarnishlog()', () => {
  it('streams the process output', async () => {
    const source = await startVarnishlog(node, ['-e', 'console.log("  270 RxRequest    c GET")']);

    const output = await readAll(source.stream);
    await source.done;

    expect(output).toBe('  270 RxRequest    c GET\n');
    expect(source.description).toBe(`${node} -e console.log("  270 RxRequest    c GET")`);
  });

  it('rejects done when the process exits with an error code', async () => {
    const source = await startVarnishlog(node, ['-e', 'process.exit(3)']);

    await expect(source.done).rejects.toThrow(`${node} exited with code 3`);
  });

  it('fails to start when the binary does not exist', async () => {
    await expect(startVarnishlog('varnishlog-missing-for-test', [])).rejects.toThrow(
      'varnishlog-missing-for-test not found. Install Varnish or pass --varnishlog <path>'
    );
  });

  it('reports termination by signal', async () => {
    const source = await startVarnishlog(node, ['-e', 'setInterval(() => {}, 1000)']);

    source.close();

    await expect(source.done).rejects.toThrow(`${node} was terminated by SIGTERM`);
  });
});

describe('openLogFile()', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await fs.mkdtemp(path.join(os.tmpdir(), 'log-source-'));
  });

  afterEach(async () => {
    await fs.rm(dir, { recursive: true, force: true });
  });

  it('reads a captured log', async () => {
    const filePath = path.join(dir, 'capture.log');
    await fs.writeFile(filePath, 'line one\nline two\n', 'utf-8');

    const source = await openLogFile(filePath);

    expect(await readAll(source.stream)).toBe('line one\nline two\n');
    await expect(source.done).resolves.toBeUndefined();
  });

  it('maps each logged byte to one character', async () => {
    const filePath = path.join(dir, 'bytes.log');
    await fs.writeFile(filePath, Buffer.from([0x2f, 0x63, 0x61, 0x66, 0xe9, 0x0a]));

    const source = await openLogFile(filePath);

    expect(await readAll(source.stream)).toBe('/caf\u00e9\n');
  });

  it('rejects a missing file', async () => {
    const filePath = path.join(dir, 'missing.log');

    await expect(openLogFile(filePath)).rejects.toThrow(`Log file not found: ${filePath}`);
  });
});

describe('openLogSource()', () => {
  const base: ReplayConfig = { ...DEFAULT_REPLAY_CONFIG, targetHost: 'teststage.local' };

  it('requires a path for file sources', async () => {
    await expect(openLogSource({ ...base, source: 'file' })).rejects.toThrow('No input file given');
  });

  it('uses stdin for stdin sources', async () => {
    const source = await openLogSource({ ...base, source: 'stdin' });

    expect(source.stream).toBe(process.stdin);
    expect(source.description).toBe('stdin');
  });

  it('starts the configured binary for varnishlog sources', async () => {
    const source = await openLogSource({
      ...base,
      varnishlogBinary: node,
      varnishlogArgs: ['-e', 'console.log("ready")'],
    });

    expect(await readAll(source.stream)).toBe('ready\n');
    await source.done;
  });
});
