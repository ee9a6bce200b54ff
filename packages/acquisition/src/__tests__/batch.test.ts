import { mkdtemp, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { ConfigInvalidError, type Candidate } from '@reeldrop/core';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';

import { runBatch } from '../batch.js';
import { RateLimitGuard } from '../rateLimitGuard.js';
import { MemoryArtifactStore, ScriptedAgent } from './fakes.js';

function episodes(count: number): Candidate[] {
  return Array.from({ length: count }, (_, i) => {
    const filename = `ep0${i + 1}.mkv`;
    return { source: `https://media.test/${filename}`, filename, extension: 'mkv' };
  });
}

const noSleep = async (): Promise<void> => {};

describe('runBatch', () => {
  let dir: string;
  let store: MemoryArtifactStore;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), 'reeldrop-batch-'));
    store = new MemoryArtifactStore();
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it('skips the episode already on disk and downloads the rest', async () => {
    await writeFile(join(dir, 'ep03.mkv'), 'x');
    const agent = new ScriptedAgent(store);

    const summary = await runBatch({
      targetDir: dir,
      maxConcurrent: 2,
      candidates: episodes(5),
      agent,
      store,
      sleep: noSleep,
    });

    expect(summary.counts).toMatchObject({ DONE: 4, SKIPPED: 1, FAILED: 0, PAUSED: 0 });
    expect(agent.started.map(r => r.jobId)).toEqual(['ep01.mkv', 'ep02.mkv', 'ep04.mkv', 'ep05.mkv']);
    expect(summary.notDone).toEqual([
      expect.objectContaining({
        id: 'ep03.mkv',
        status: 'SKIPPED',
        outcome: 'SKIPPED_EXISTING',
        reason: 'already exists in target directory',
      }),
    ]);
    expect(summary.halted).toBe(false);
  });

  it('admits a candidate whose partial was left by an earlier run', async () => {
    await writeFile(join(dir, 'ep01.mkv.part'), 'half');
    const agent = new ScriptedAgent(store);

    const summary = await runBatch({
      targetDir: dir,
      candidates: episodes(1),
      agent,
      store,
      sleep: noSleep,
    });

    expect(agent.started).toEqual([expect.objectContaining({ jobId: 'ep01.mkv', markerPath: join(dir, 'ep01.mkv.part') })]);
    expect(summary.jobs).toEqual([expect.objectContaining({ id: 'ep01.mkv', status: 'DONE' })]);
  });

  it('skips candidates beyond the limit', async () => {
    const agent = new ScriptedAgent(store);

    const summary = await runBatch({
      targetDir: dir,
      maxConcurrent: 2,
      limit: 2,
      candidates: episodes(4),
      agent,
      store,
      sleep: noSleep,
    });

    expect(summary.jobs.map(j => [j.id, j.status, j.outcome])).toEqual([
      ['ep01.mkv', 'DONE', undefined],
      ['ep02.mkv', 'DONE', undefined],
      ['ep03.mkv', 'SKIPPED', 'OVER_LIMIT'],
      ['ep04.mkv', 'SKIPPED', 'OVER_LIMIT'],
    ]);
  });

  it('pauses the rest of the batch when a transfer lands on a restricted page', async () => {
    const agent = new ScriptedAgent(store, {
      'https://media.test/ep01.mkv': [
        { marker: 100 },
        { marker: null, exit: 0, restricted: 'https://media.test/register' },
      ],
    });
    const guard = new RateLimitGuard();

    const summary = await runBatch({
      targetDir: dir,
      maxConcurrent: 2,
      candidates: episodes(5),
      agent,
      store,
      guard,
      sleep: noSleep,
    });

    expect(agent.started).toHaveLength(2);
    expect(summary.counts).toMatchObject({ DONE: 1, PAUSED: 4 });
    expect(summary.halted).toBe(true);
    expect(summary.haltReason).toBe('transfer redirected to a restricted page');
    expect(guard.getTrip()?.url).toBe('https://media.test/register');
  });

  it('rejects an invalid concurrency before starting anything', async () => {
    const agent = new ScriptedAgent(store);

    await expect(runBatch({
      targetDir: dir,
      maxConcurrent: 0,
      candidates: episodes(2),
      agent,
      store,
      sleep: noSleep,
    })).rejects.toBeInstanceOf(ConfigInvalidError);
    expect(agent.started).toEqual([]);
  });

  it('rejects a target directory that cannot be created', async () => {
    const file = join(dir, 'not-a-dir');
    await writeFile(file, 'x');
    const agent = new ScriptedAgent(store);

    await expect(runBatch({
      targetDir: file,
      candidates: episodes(1),
      agent,
      store,
      sleep: noSleep,
    })).rejects.toMatchObject({ code: 'CONFIG_INVALID', details: { field: 'targetDir' } });
    expect(agent.started).toEqual([]);
  });
});
