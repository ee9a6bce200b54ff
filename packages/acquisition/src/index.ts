/**
 * @reeldrop/acquisition
 * 
 * Download orchestration layer.
 * 
 * Responsibilities:
 * - Discover candidates from links (url matching, header probing)
 * - Skip files already present in the target directory
 * - Admit transfers under a fixed concurrency ceiling
 * - Detect completion from the files the transfer agent leaves behind
 * - Halt admissions when the site rate limits us
 */

// Link detection and discovery
export {
  extractUrls,
  urlMatchesExtension,
  inferFilename,
  rawFilename,
  parseDispositionFilename,
  parseRedirectBasename,
  parseFinalLocation,
  parseContentLength,
} from './linkDetector.js';

export {
  CurlHeaderProbe,
  discoverCandidates,
  type HeaderProbe,
  type ProbeResult,
  type DiscoveryOptions,
  type CommandRunner,
} from './discovery.js';

// Rate limiting
export {
  RateLimitGuard,
  isRestrictedRedirect,
  DEFAULT_RESTRICTED_PATTERNS,
  type RateLimitSignal,
  type RateLimitTrip,
} from './rateLimitGuard.js';

// Dedup
export {
  filterExisting,
  type DedupDecision,
  type DedupResult,
} from './dedupFilter.js';

// Transfers
export {
  markerPathFor,
  type TransferAgent,
  type TransferHandle,
  type TransferRequest,
} from './transferAgent.js';

export { fsArtifactStore, type ArtifactStore } from './artifacts.js';

export {
  TransferSupervisor,
  transferSupervisorFactory,
  type Supervisor,
  type SupervisorFactory,
  type SupervisorPoll,
  type SupervisorStatus,
  type TransferSupervisorOptions,
} from './transferSupervisor.js';

export {
  CurlTransferAgent,
  CurlTransfer,
  type CurlConfig,
  type ProcessStarter,
} from './clients/curl.js';

// Queue
export {
  AdmissionQueue,
  type AdmissionQueueOptions,
  type QueueHaltEvent,
  type QueueJobEvent,
} from './admissionQueue.js';

export { runBatch, prepareJobs, type RunBatchOptions } from './batch.js';
