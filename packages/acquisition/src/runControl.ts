/**
 * Run Control
 *
 * Cooperative control signals for one orchestrator run. Any caller may raise
 * them at any time; the worker reads them once per tick and between items.
 */

export class RunControl {
  private stopRequested = false;
  private pauseRequested = false;
  private skipRequested = false;

  requestStop(): void {
    this.stopRequested = true;
  }

  requestPause(): void {
    this.pauseRequested = true;
  }

  requestResume(): void {
    this.pauseRequested = false;
  }

  requestSkip(): void {
    this.skipRequested = true;
  }

  clearSkip(): void {
    this.skipRequested = false;
  }

  get stopped(): boolean {
    return this.stopRequested;
  }

  /** Stop wins over pause */
  get paused(): boolean {
    return this.pauseRequested && !this.stopRequested;
  }

  get skipping(): boolean {
    return this.skipRequested;
  }

  /** Whether the item in flight should be abandoned */
  get cancelled(): boolean {
    return this.stopRequested || this.skipRequested;
  }
}
