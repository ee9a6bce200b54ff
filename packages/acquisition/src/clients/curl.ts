/**
 * curl Transfer Agent
 *
 * Runs one `curl` process per transfer. curl writes into `<target>.part`
 * and resumes from it (`-C -`); the file is renamed to the target only
 * after a clean exit, so the marker/final-artifact protocol holds.
 *
 * With `-w %{url_effective}` curl reports where redirects ended; a
 * restricted-access page there means the site is rate limiting us and the
 * partial is discarded instead of promoted.
 */

import {
  createLogger,
  moveFile,
  removeFile,
  startProcess,
  type RunningProcess,
} from '@reeldrop/utils';
import { DEFAULT_RESTRICTED_PATTERNS, isRestrictedRedirect } from '../rateLimitGuard.js';
import type { TransferAgent, TransferHandle, TransferRequest } from '../transferAgent.js';

export interface CurlConfig {
  curlPath: string;
  retries: number;
  maxRedirects: number;
  restrictedPatterns: readonly string[];
  /** Extra arguments placed before the url, e.g. cookie or header flags */
  extraArgs: string[];
}

export type ProcessStarter = (command: string, args: string[]) => RunningProcess;

const log = createLogger({ component: 'curl-agent' });

export class CurlTransferAgent implements TransferAgent {
  readonly name = 'curl';
  readonly markerSuffix = '.part';

  private readonly config: CurlConfig;
  private readonly spawnProcess: ProcessStarter;

  constructor(config?: Partial<CurlConfig>, spawnProcess: ProcessStarter = startProcess) {
    this.config = {
      curlPath: config?.curlPath ?? 'curl',
      retries: config?.retries ?? 3,
      maxRedirects: config?.maxRedirects ?? 10,
      restrictedPatterns: config?.restrictedPatterns ?? DEFAULT_RESTRICTED_PATTERNS,
      extraArgs: config?.extraArgs ?? [],
    };
    this.spawnProcess = spawnProcess;
  }

  buildArgs(request: TransferRequest): string[] {
    return [
      '-fL',
      '-sS',
      '--retry', String(this.config.retries),
      '--max-redirs', String(this.config.maxRedirects),
      '-C', '-',
      '-w', '%{url_effective}',
      '-o', request.markerPath,
      ...this.config.extraArgs,
      request.source,
    ];
  }

  async start(request: TransferRequest): Promise<TransferHandle> {
    const args = this.buildArgs(request);
    log.debug({ jobId: request.jobId, command: this.config.curlPath, args }, 'Spawning curl');

    const proc = this.spawnProcess(this.config.curlPath, args);
    return new CurlTransfer(proc, request, this.config.restrictedPatterns);
  }
}

/**
 * Handle for one curl process. The exit code is withheld until the
 * marker has been promoted (or discarded), so a supervisor never sees
 * a zero exit before the final artifact is in place.
 */
export class CurlTransfer implements TransferHandle {
  private code: number | null = null;
  private detail: string | undefined;
  private restricted: string | undefined;

  constructor(
    private readonly proc: RunningProcess,
    private readonly request: TransferRequest,
    private readonly restrictedPatterns: readonly string[]
  ) {
    void proc.exited
      .then(exitCode => this.finalize(exitCode))
      .catch((error: unknown) => {
        this.detail = error instanceof Error ? error.message : String(error);
        this.code = 1;
      });
  }

  exitCode(): number | null {
    return this.code;
  }

  diagnostic(): string | undefined {
    return this.detail;
  }

  restrictedUrl(): string | undefined {
    return this.restricted;
  }

  abort(): void {
    this.proc.kill();
  }

  private async finalize(exitCode: number): Promise<void> {
    const effectiveUrl = this.proc.stdout.trim();

    if (effectiveUrl && isRestrictedRedirect(effectiveUrl, this.restrictedPatterns)) {
      this.restricted = effectiveUrl;
      this.detail = `redirected to ${effectiveUrl}`;
      await removeFile(this.request.markerPath);
      this.code = exitCode;
      return;
    }

    if (exitCode !== 0) {
      this.detail = this.proc.spawnError?.message ?? lastLine(this.proc.stderr);
      this.code = exitCode;
      return;
    }

    try {
      await moveFile(this.request.markerPath, this.request.targetPath);
      this.code = 0;
    } catch (error) {
      this.detail = `could not move partial into place: ${error instanceof Error ? error.message : String(error)}`;
      this.code = 1;
    }
  }
}

function lastLine(text: string): string | undefined {
  const lines = text.split(/\r?\n/).map(line => line.trim()).filter(Boolean);
  return lines.at(-1);
}
