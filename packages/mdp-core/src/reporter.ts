/**
 * Progress reporter for value iteration runs.
 *
 * UX-only: events are recorded and logged but never read by the engine.
 * The CLI wires `iteration` to PolicyEngine's onIteration hook.
 */

import type {
  ILogger,
  IterationComputedEvent,
  ProgressCallback,
  ProgressEvent,
} from '@bellman/mdp-contracts';

export class ProgressReporter {
  private events: ProgressEvent[] = [];
  private startTime: number = 0;

  constructor(
    private logger: ILogger,
    private onProgress?: ProgressCallback
  ) {}

  /**
   * Report a parsed model.
   */
  modelLoaded(source: string, stateCount: number, actionCount: number): void {
    this.emit({
      type: 'model_loaded',
      timestamp: Date.now(),
      data: { source, stateCount, actionCount },
    });
    this.logger.info(`Loaded ${stateCount} states (${actionCount} actions) from ${source}`);
  }

  /**
   * Report the start of an extension from `from` cached snapshots to `target`.
   */
  extensionStarted(from: number, target: number): void {
    this.startTime = Date.now();
    this.emit({
      type: 'extension_started',
      timestamp: this.startTime,
      data: { from, target },
    });
    if (target > from) {
      this.logger.info(`Computing iterations ${from + 1}..${target}`);
    } else {
      this.logger.info(`Iterations 1..${target} already cached`);
    }
  }

  /**
   * Report one committed snapshot. Matches the engine's onIteration signature.
   */
  iteration(event: IterationComputedEvent): void {
    let maxValue = 0;
    for (const entry of event.snapshot.values()) {
      maxValue = Math.max(maxValue, Math.abs(entry.value));
    }
    this.emit({
      type: 'iteration_computed',
      timestamp: Date.now(),
      data: { iteration: event.iteration, maxValue },
    });
    this.logger.debug(`Iteration ${event.iteration + 1} computed`, { maxValue });
  }

  /**
   * Report the end of an extension.
   */
  extensionCompleted(iterations: number): void {
    const durationMs = this.startTime === 0 ? 0 : Date.now() - this.startTime;
    this.emit({
      type: 'extension_completed',
      timestamp: Date.now(),
      data: { iterations, durationMs },
    });
    this.logger.info(`${iterations} iterations ready in ${durationMs}ms`);
  }

  /**
   * Get all emitted events (for debugging/testing).
   */
  getEvents(): readonly ProgressEvent[] {
    return [...this.events];
  }

  clear(): void {
    this.events = [];
    this.startTime = 0;
  }

  private emit(event: ProgressEvent): void {
    this.events.push(event);
    this.onProgress?.(event);
  }
}
