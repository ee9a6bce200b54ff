import { mkdtemp, readdir, readFile, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import type { RunningProcess } from '@reeldrop/utils';
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';

import { CurlTransfer, CurlTransferAgent } from '../clients/curl.js';
import { DEFAULT_RESTRICTED_PATTERNS } from '../rateLimitGuard.js';
import type { TransferRequest } from '../transferAgent.js';

interface FakeProcessOptions {
  exit: number;
  stdout?: string;
  stderr?: string;
  spawnError?: Error;
  kill?: () => void;
}

function fakeProcess(options: FakeProcessOptions): RunningProcess {
  return {
    pid: 4242,
    exitCode: options.exit,
    stdout: options.stdout ?? '',
    stderr: options.stderr ?? '',
    spawnError: options.spawnError,
    exited: Promise.resolve(options.exit),
    kill: options.kill ?? (() => {}),
  };
}

async function settled(transfer: CurlTransfer): Promise<void> {
  await vi.waitFor(() => {
    expect(transfer.exitCode()).not.toBeNull();
  });
}

describe('CurlTransferAgent', () => {
  const request: TransferRequest = {
    jobId: 'ep01.mkv',
    source: 'https://a.test/ep01.mkv',
    targetPath: '/downloads/ep01.mkv',
    markerPath: '/downloads/ep01.mkv.part',
  };

  it('spawns a resumable curl writing into the marker', async () => {
    const spawnProcess = vi.fn((_command: string, _args: string[]) => fakeProcess({ exit: 22 }));
    const agent = new CurlTransferAgent({ curlPath: 'curl-test', retries: 5, extraArgs: ['-b', 'jar'] }, spawnProcess);

    await agent.start(request);

    expect(agent.markerSuffix).toBe('.part');
    expect(spawnProcess).toHaveBeenCalledWith('curl-test', [
      '-fL', '-sS',
      '--retry', '5',
      '--max-redirs', '10',
      '-C', '-',
      '-w', '%{url_effective}',
      '-o', '/downloads/ep01.mkv.part',
      '-b', 'jar',
      'https://a.test/ep01.mkv',
    ]);
  });
});

describe('CurlTransfer', () => {
  let dir: string;
  let request: TransferRequest;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), 'reeldrop-curl-'));
    request = {
      jobId: 'ep01.mkv',
      source: 'https://a.test/ep01.mkv',
      targetPath: join(dir, 'ep01.mkv'),
      markerPath: join(dir, 'ep01.mkv.part'),
    };
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it('promotes the marker after a clean exit', async () => {
    await writeFile(request.markerPath, 'payload');
    const transfer = new CurlTransfer(
      fakeProcess({ exit: 0, stdout: 'https://cdn.test/ep01.mkv' }),
      request,
      DEFAULT_RESTRICTED_PATTERNS
    );

    expect(transfer.exitCode()).toBeNull();
    await settled(transfer);

    expect(transfer.exitCode()).toBe(0);
    expect(await readdir(dir)).toEqual(['ep01.mkv']);
    expect(await readFile(request.targetPath, 'utf8')).toBe('payload');
  });

  it('reports a failed move as a failure', async () => {
    const transfer = new CurlTransfer(fakeProcess({ exit: 0 }), request, DEFAULT_RESTRICTED_PATTERNS);
    await settled(transfer);

    expect(transfer.exitCode()).toBe(1);
    expect(transfer.diagnostic()).toMatch(/^could not move partial into place: /);
  });

  it('keeps the partial and the last stderr line on a non-zero exit', async () => {
    await writeFile(request.markerPath, 'half');
    const transfer = new CurlTransfer(
      fakeProcess({ exit: 22, stderr: 'retrying\ncurl: (22) The requested URL returned error: 404\n' }),
      request,
      DEFAULT_RESTRICTED_PATTERNS
    );
    await settled(transfer);

    expect(transfer.exitCode()).toBe(22);
    expect(transfer.diagnostic()).toBe('curl: (22) The requested URL returned error: 404');
    expect(await readdir(dir)).toEqual(['ep01.mkv.part']);
  });

  it('reports a spawn failure', async () => {
    const transfer = new CurlTransfer(
      fakeProcess({ exit: 127, spawnError: new Error('spawn curl ENOENT') }),
      request,
      DEFAULT_RESTRICTED_PATTERNS
    );
    await settled(transfer);

    expect(transfer.exitCode()).toBe(127);
    expect(transfer.diagnostic()).toBe('spawn curl ENOENT');
  });

  it('discards the partial when redirected to a restricted page', async () => {
    await writeFile(request.markerPath, '<html>sign up</html>');
    const transfer = new CurlTransfer(
      fakeProcess({ exit: 0, stdout: 'https://a.test/Register' }),
      request,
      DEFAULT_RESTRICTED_PATTERNS
    );
    await settled(transfer);

    expect(transfer.restrictedUrl()).toBe('https://a.test/Register');
    expect(transfer.diagnostic()).toBe('redirected to https://a.test/Register');
    expect(await readdir(dir)).toEqual([]);
  });

  it('kills the process on abort', () => {
    const kill = vi.fn();
    const transfer = new CurlTransfer(fakeProcess({ exit: 22, kill }), request, DEFAULT_RESTRICTED_PATTERNS);

    transfer.abort();

    expect(kill).toHaveBeenCalledTimes(1);
  });
});
