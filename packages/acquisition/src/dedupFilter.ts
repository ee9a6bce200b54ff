/**
 * Dedup Filter
 *
 * Compares candidates against a single listing of the target directory,
 * taken before any transfer starts. Matching is case-insensitive on the
 * filename a job would write. A leftover partial does not count: the job
 * is admitted and the agent resumes it.
 */

import type { Candidate } from '@reeldrop/core';
import { createLogger, listFileNames, sanitizeFilename } from '@reeldrop/utils';

export interface DedupDecision {
  candidate: Candidate;
  filename: string;
  /** Set when the candidate must not be admitted */
  skipReason?: string;
}

export interface DedupResult {
  /** One decision per candidate, in input order */
  decisions: DedupDecision[];
  admitted: Candidate[];
  skipped: DedupDecision[];
}

const log = createLogger({ component: 'dedup-filter' });

export async function filterExisting(
  targetDir: string,
  candidates: readonly Candidate[]
): Promise<DedupResult> {
  const listing = await listFileNames(targetDir);
  const existing = new Set(listing.map(name => name.toLowerCase()));
  const claimed = new Set<string>();

  const decisions = candidates.map((candidate): DedupDecision => {
    const filename = sanitizeFilename(candidate.filename);
    const key = filename.toLowerCase();

    let skipReason: string | undefined;
    if (existing.has(key)) {
      skipReason = 'already exists in target directory';
    } else if (claimed.has(key)) {
      skipReason = 'duplicate of an earlier candidate';
    }

    claimed.add(key);
    return { candidate, filename, skipReason };
  });

  const skipped = decisions.filter(d => d.skipReason !== undefined);
  const admitted = decisions.filter(d => d.skipReason === undefined).map(d => d.candidate);

  log.info(
    { targetDir, listed: listing.length, candidates: candidates.length, skipped: skipped.length },
    'Checked target directory for existing files'
  );

  return { decisions, admitted, skipped };
}
