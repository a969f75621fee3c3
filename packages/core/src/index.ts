/**
 * @linkgarden/core
 *
 * Core package containing:
 * - Link model and status state machine
 * - JSON-backed link store
 * - Application configuration
 * - Error handling
 */

// State machine
export {
  isValidTransition,
  getNextStatuses,
  assertTransition,
  CLASSIFIABLE_STATUSES,
  type LinkStatusTransition,
} from './stateMachine.js';

// Types
export {
  LINK_STATUSES,
  LIMIT_KINDS,
  createLink,
} from './types/link.js';

export type {
  Link,
  LinkInput,
  LinkStatus,
  LinkSource,
  LimitKind,
  FilterReference,
} from './types/link.js';

// Link store
export {
  JsonLinkStore,
  extractUrls,
  trimTrailingClosers,
  type LinkStore,
} from './store/linkStore.js';

// Configuration
export {
  ConfigStore,
  loadConfig,
  parseConfig,
  defaultConfig,
  getDataPaths,
  appConfigSchema,
  type AppConfig,
  type DownloadLimits,
  type ToolConfig,
  type OrchestratorSettings,
  type DataPaths,
} from './config/index.js';

// Errors
export {
  LinkGardenError,
  ConfigurationError,
  StoreIOError,
  StateTransitionError,
  NotFoundError,
  ValidationError,
  ToolInvocationError,
  PatternError,
  ObserverError,
} from './errors/index.js';
