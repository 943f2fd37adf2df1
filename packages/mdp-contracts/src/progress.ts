/**
 * Progress event types.
 *
 * UX-only: the engine never reads these back.
 */

export type ProgressEventType =
  | 'model_loaded'
  | 'extension_started'
  | 'iteration_computed'
  | 'extension_completed';

export interface BaseProgressEvent {
  type: ProgressEventType;
  timestamp: number;
}

export interface ModelLoadedEvent extends BaseProgressEvent {
  type: 'model_loaded';
  data: {
    source: string;
    stateCount: number;
    actionCount: number;
  };
}

export interface ExtensionStartedEvent extends BaseProgressEvent {
  type: 'extension_started';
  data: {
    from: number;
    target: number;
  };
}

export interface IterationComputedProgressEvent extends BaseProgressEvent {
  type: 'iteration_computed';
  data: {
    iteration: number;
    /** Largest absolute value in the snapshot */
    maxValue: number;
  };
}

export interface ExtensionCompletedEvent extends BaseProgressEvent {
  type: 'extension_completed';
  data: {
    iterations: number;
    durationMs: number;
  };
}

export type ProgressEvent =
  | ModelLoadedEvent
  | ExtensionStartedEvent
  | IterationComputedProgressEvent
  | ExtensionCompletedEvent;

export type ProgressCallback = (event: ProgressEvent) => void;
