/**
 * Candidate Discovery
 *
 * Turns a list of links into ordered candidates. Each link is probed with a
 * HEAD request chain; a probe that lands on the restricted-access page trips
 * the rate-limit guard and stops further probing.
 */

import { CommandExecutionError, type Candidate, type MediaExtension } from '@reeldrop/core';
import { createLogger, executeCommand, getExtension, type CommandResult } from '@reeldrop/utils';
import {
  inferFilename,
  parseContentLength,
  parseFinalLocation,
  rawFilename,
  urlMatchesExtension,
} from './linkDetector.js';
import { DEFAULT_RESTRICTED_PATTERNS, isRestrictedRedirect, type RateLimitGuard } from './rateLimitGuard.js';

export interface ProbeResult {
  headers: string;
  finalLocation: string | null;
  contentLength: number | null;
}

export interface HeaderProbe {
  probe(url: string): Promise<ProbeResult>;
}

export type CommandRunner = (command: string, args: string[]) => Promise<CommandResult>;

const log = createLogger({ component: 'discovery' });

/**
 * HEAD probe through curl (`-sIL`), following redirects
 */
export class CurlHeaderProbe implements HeaderProbe {
  constructor(
    private readonly curlPath: string = 'curl',
    private readonly extraArgs: string[] = [],
    private readonly run: CommandRunner = (command, args) => executeCommand(command, args, { timeout: 60_000 })
  ) {}

  async probe(url: string): Promise<ProbeResult> {
    const args = ['-sIL', '--max-redirs', '10', ...this.extraArgs, url];
    const result = await this.run(this.curlPath, args);

    if (result.exitCode !== 0) {
      const error = new CommandExecutionError(this.curlPath, result.exitCode, result.stderr);
      log.warn({ url, error: error.message, details: error.details }, 'Header probe failed');
      return { headers: '', finalLocation: null, contentLength: null };
    }

    return {
      headers: result.stdout,
      finalLocation: parseFinalLocation(result.stdout),
      contentLength: parseContentLength(result.stdout),
    };
  }
}

export interface DiscoveryOptions {
  extension: MediaExtension;
  /** Without a probe, filenames come from the url alone */
  probe?: HeaderProbe;
  guard?: RateLimitGuard;
  restrictedPatterns?: readonly string[];
}

export async function discoverCandidates(
  urls: readonly string[],
  options: DiscoveryOptions
): Promise<Candidate[]> {
  const patterns = options.restrictedPatterns ?? DEFAULT_RESTRICTED_PATTERNS;
  const candidates: Candidate[] = [];

  for (const url of urls) {
    if (options.guard?.isTripped()) {
      log.warn({ remaining: urls.length - urls.indexOf(url) }, 'Rate limited, probing stopped');
      break;
    }

    const result = options.probe ? await options.probe.probe(url) : null;
    const headers = result?.headers ?? '';

    if (result?.finalLocation && isRestrictedRedirect(result.finalLocation, patterns)) {
      options.guard?.observe({
        restricted: true,
        url: result.finalLocation,
        reason: 'probe redirected to a restricted page',
      });
      continue;
    }

    const raw = rawFilename(url, headers);
    const wanted = urlMatchesExtension(url, options.extension)
      || getExtension(raw) === options.extension;

    if (!wanted) {
      log.debug({ url, name: raw }, 'Not a matching media link');
      continue;
    }

    candidates.push({
      source: url,
      filename: inferFilename(url, headers, options.extension),
      extension: options.extension,
    });
  }

  log.info({ urls: urls.length, candidates: candidates.length }, 'Discovery finished');
  return candidates;
}
