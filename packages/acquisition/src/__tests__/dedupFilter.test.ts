import { mkdtemp, readdir, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import type { Candidate } from '@reeldrop/core';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';

import { filterExisting } from '../dedupFilter.js';

function candidates(...names: string[]): Candidate[] {
  return names.map(filename => ({ source: `https://media.test/${filename}`, filename, extension: 'mkv' }));
}

describe('filterExisting', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), 'reeldrop-dedup-'));
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it('skips a candidate whose file exists, ignoring case', async () => {
    await writeFile(join(dir, 'EP03.MKV'), 'x');

    const result = await filterExisting(dir, candidates('ep01.mkv', 'ep02.mkv', 'ep03.mkv', 'ep04.mkv', 'ep05.mkv'));

    expect(result.admitted.map(c => c.filename)).toEqual(['ep01.mkv', 'ep02.mkv', 'ep04.mkv', 'ep05.mkv']);
    expect(result.skipped).toEqual([
      expect.objectContaining({ filename: 'ep03.mkv', skipReason: 'already exists in target directory' }),
    ]);
    expect(result.decisions).toHaveLength(5);
  });

  it('admits a candidate that only has a leftover partial', async () => {
    await writeFile(join(dir, 'ep02.mkv.part'), 'x');

    const result = await filterExisting(dir, candidates('ep01.mkv', 'ep02.mkv'));

    expect(result.admitted.map(c => c.filename)).toEqual(['ep01.mkv', 'ep02.mkv']);
    expect(result.skipped).toEqual([]);
  });

  it('keeps only the first of two candidates with the same filename', async () => {
    const result = await filterExisting(dir, candidates('Ep01.mkv', 'ep01.MKV'));

    expect(result.admitted.map(c => c.filename)).toEqual(['Ep01.mkv']);
    expect(result.skipped[0]?.skipReason).toBe('duplicate of an earlier candidate');
  });

  it('yields the same skip set on an unchanged directory', async () => {
    await writeFile(join(dir, 'ep01.mkv'), 'x');
    await writeFile(join(dir, 'ep04.mkv'), 'x');
    const list = candidates('ep01.mkv', 'ep02.mkv', 'ep03.mkv', 'ep04.mkv');

    const first = await filterExisting(dir, list);
    const second = await filterExisting(dir, list);

    expect(second.skipped).toEqual(first.skipped);
    expect(await readdir(dir)).toEqual(['ep01.mkv', 'ep04.mkv']);
  });

  it('treats a missing directory as empty', async () => {
    const result = await filterExisting(join(dir, 'not-yet'), candidates('ep01.mkv'));

    expect(result.admitted).toHaveLength(1);
  });
});
