/**
 * Transfer Agent
 * 
 * Capability interface for the external program that moves the bytes.
 * The agent writes to `markerPath` while the transfer is in flight and
 * leaves the finished file at `targetPath`.
 */

export interface TransferRequest {
  jobId: string;
  source: string;
  targetPath: string;
  markerPath: string;
}

export interface TransferHandle {
  /** Null while the agent is still running */
  exitCode(): number | null;
  /** Agent-specific detail for a failed transfer */
  diagnostic(): string | undefined;
  /** Restricted-access url the transfer ended on, if any */
  restrictedUrl?(): string | undefined;
  /** Stop the agent; used when the transfer is declared stalled */
  abort?(): void;
}

export interface TransferAgent {
  readonly name: string;
  /** Suffix appended to the target path for the in-progress file */
  readonly markerSuffix: string;
  start(request: TransferRequest): Promise<TransferHandle>;
}

export function markerPathFor(targetPath: string, agent: Pick<TransferAgent, 'markerSuffix'>): string {
  return `${targetPath}${agent.markerSuffix}`;
}
