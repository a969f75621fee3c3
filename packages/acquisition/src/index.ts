/**
 * @linkgarden/acquisition
 *
 * Download orchestration layer.
 *
 * Responsibilities:
 * - Run links through the downloader one at a time
 * - Enforce per-link time, image-count and size limits
 * - Route limit breaches through the decision gateway
 * - Publish progress and completion events
 */

// Orchestrator
export {
  DownloadOrchestrator,
  type OrchestratorOptions,
  type ItemOutcome,
} from './orchestrator.js';

// Decision gateway
export { DecisionGateway, type LimitResolver } from './decisionGateway.js';

// Progress
export {
  ObserverRegistry,
  createSnapshot,
  type ProgressSnapshot,
  type RunStatus,
  type ProgressObserver,
  type CompletionObserver,
  type Unsubscribe,
} from './progress.js';

export { RunControl } from './runControl.js';

// Tool invocation
export {
  buildToolInvocation,
  formatInvocation,
  type ToolInvocation,
  type BuildOptions,
} from './commandBuilder.js';

export {
  spawnLauncher,
  isToolAvailable,
  type ProcessLauncher,
  type LaunchOptions,
} from './launcher.js';

// Output parsing
export {
  isImageEvent,
  countImageEvents,
  measureOutputSizeMb,
  deriveErrorMessage,
  ConsecutiveDedupe,
} from './outputParser.js';
