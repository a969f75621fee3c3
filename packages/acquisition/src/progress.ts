/**
 * Download Progress
 *
 * The snapshot the orchestrator publishes while a run is active, and the
 * registry of progress/completion subscribers.
 */

import { ObserverError, type Link } from '@linkgarden/core';
import { createLogger } from '@linkgarden/utils';

const log = createLogger({ module: 'progress' });

export type RunStatus = 'idle' | 'running' | 'paused' | 'stopped';

export interface ProgressSnapshot {
  status: RunStatus;
  currentLink: Readonly<Link> | null;
  totalLinks: number;
  completedLinks: number;
  failedLinks: number;
  /** Fraction of the batch finished, 0..1 */
  currentProgress: number;
  currentOperation: string;
  imagesDownloaded: number;
  lastOutputLine: string;
}

export function createSnapshot(totalLinks: number = 0, status: RunStatus = 'idle'): ProgressSnapshot {
  return {
    status,
    currentLink: null,
    totalLinks,
    completedLinks: 0,
    failedLinks: 0,
    currentProgress: 0,
    currentOperation: status === 'idle' ? 'Idle' : '',
    imagesDownloaded: 0,
    lastOutputLine: '',
  };
}

export type ProgressObserver = (snapshot: Readonly<ProgressSnapshot>) => void;
export type CompletionObserver = (linkId: string, success: boolean) => void;

export type Unsubscribe = () => void;

/**
 * Subscribers of one orchestrator. A throwing subscriber is logged and
 * does not prevent the others from being called.
 */
export class ObserverRegistry {
  private progressObservers = new Set<ProgressObserver>();
  private completionObservers = new Set<CompletionObserver>();

  onProgress(observer: ProgressObserver): Unsubscribe {
    this.progressObservers.add(observer);
    return () => {
      this.progressObservers.delete(observer);
    };
  }

  onCompletion(observer: CompletionObserver): Unsubscribe {
    this.completionObservers.add(observer);
    return () => {
      this.completionObservers.delete(observer);
    };
  }

  notifyProgress(snapshot: ProgressSnapshot): void {
    // Subscribers get a copy they cannot use to reach into the run
    const copy: Readonly<ProgressSnapshot> = Object.freeze({ ...snapshot });
    for (const observer of this.progressObservers) {
      try {
        observer(copy);
      } catch (error) {
        log.error({ err: new ObserverError('progress', error) }, 'Error in progress callback');
      }
    }
  }

  notifyCompletion(linkId: string, success: boolean): void {
    for (const observer of this.completionObservers) {
      try {
        observer(linkId, success);
      } catch (error) {
        log.error({ err: new ObserverError('completion', error) }, 'Error in completion callback');
      }
    }
  }
}
