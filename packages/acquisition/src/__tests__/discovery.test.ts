import { describe, expect, it, vi } from 'vitest';

import { CurlHeaderProbe, discoverCandidates, type HeaderProbe, type ProbeResult } from '../discovery.js';
import { RateLimitGuard } from '../rateLimitGuard.js';

class MapProbe implements HeaderProbe {
  readonly probed: string[] = [];

  constructor(private readonly results: Record<string, Partial<ProbeResult>>) {}

  async probe(url: string): Promise<ProbeResult> {
    this.probed.push(url);
    return { headers: '', finalLocation: null, contentLength: null, ...this.results[url] };
  }
}

describe('discoverCandidates', () => {
  it('keeps matching links in input order', async () => {
    const probe = new MapProbe({
      'https://a.test/get?id=2': { headers: 'Content-Disposition: attachment; filename="Ep02.mkv"' },
    });

    const candidates = await discoverCandidates(
      ['https://a.test/ep01.mkv', 'https://a.test/get?id=2', 'https://a.test/about.html'],
      { extension: 'mkv', probe }
    );

    expect(candidates).toEqual([
      { source: 'https://a.test/ep01.mkv', filename: 'ep01.mkv', extension: 'mkv' },
      { source: 'https://a.test/get?id=2', filename: 'Ep02.mkv', extension: 'mkv' },
    ]);
  });

  it('trips the guard on a restricted redirect and stops probing', async () => {
    const guard = new RateLimitGuard();
    const probe = new MapProbe({
      'https://a.test/ep02.mkv': { finalLocation: 'https://a.test/register?from=ep02' },
    });

    const candidates = await discoverCandidates(
      ['https://a.test/ep01.mkv', 'https://a.test/ep02.mkv', 'https://a.test/ep03.mkv'],
      { extension: 'mkv', probe, guard }
    );

    expect(candidates.map(c => c.filename)).toEqual(['ep01.mkv']);
    expect(probe.probed).toEqual(['https://a.test/ep01.mkv', 'https://a.test/ep02.mkv']);
    expect(guard.getTrip()).toMatchObject({
      url: 'https://a.test/register?from=ep02',
      reason: 'probe redirected to a restricted page',
    });
  });

  it('works from the url alone without a probe', async () => {
    const candidates = await discoverCandidates(
      ['https://a.test/ep01.mp4', 'https://a.test/ep02.mkv'],
      { extension: 'mp4' }
    );

    expect(candidates.map(c => c.filename)).toEqual(['ep01.mp4']);
  });
});

describe('CurlHeaderProbe', () => {
  it('follows redirects with a HEAD request and parses the chain', async () => {
    const headers = 'HTTP/1.1 302 Found\r\nLocation: https://cdn.test/ep01.mkv\r\n\r\nHTTP/1.1 200 OK\r\nContent-Length: 42\r\n';
    const run = vi.fn(async (_command: string, _args: string[]) => ({
      exitCode: 0,
      stdout: headers,
      stderr: '',
      duration: 5,
      timedOut: false,
    }));

    const result = await new CurlHeaderProbe('curl-test', ['-b', 'jar'], run).probe('https://a.test/ep01');

    expect(run).toHaveBeenCalledWith('curl-test', ['-sIL', '--max-redirs', '10', '-b', 'jar', 'https://a.test/ep01']);
    expect(result).toEqual({ headers, finalLocation: 'https://cdn.test/ep01.mkv', contentLength: 42 });
  });

  it('returns empty headers when curl fails', async () => {
    const run = vi.fn(async () => ({ exitCode: 6, stdout: '', stderr: 'could not resolve host', duration: 1, timedOut: false }));

    const result = await new CurlHeaderProbe('curl', [], run).probe('https://a.test/ep01.mkv');

    expect(result).toEqual({ headers: '', finalLocation: null, contentLength: null });
  });
});
