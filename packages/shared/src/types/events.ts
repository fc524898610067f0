/**
 * Base interface for all pipeline events.
 * All events include common metadata fields.
 */
export interface BaseEvent {
  /** Schema version for event format compatibility */
  schemaVersion: number;
  /** ISO 8601 timestamp when the event occurred */
  timestamp: string;
  /** Unique identifier for the pipeline run */
  runId: string;
  /** Event type discriminator */
  type: string;
}

/**
 * Emitted when a pipeline run starts.
 */
export interface RunStarted extends BaseEvent {
  type: 'RunStarted';
  payload: {
    /** Directory being packaged */
    root: string;
    repository: string;
    branch: string;
    commit: string;
  };
}

/** Emitted when a candidate file is left out of the document */
export interface FileSkipped extends BaseEvent {
  type: 'FileSkipped';
  payload: {
    path: string;
    reason: 'oversized' | 'stat-failed' | 'unreadable-directory';
    sizeBytes?: number;
  };
}

/** Emitted once the output document has been written */
export interface PackCompleted extends BaseEvent {
  type: 'PackCompleted';
  payload: {
    outputPath: string;
    totalFiles: number;
    totalSize: number;
    /** Number of records tagged `error` */
    errorFiles: number;
  };
}

/** Emitted when the blob store returned a blob id */
export interface BlobStored extends BaseEvent {
  type: 'BlobStored';
  payload: {
    blobId: string;
    /** Name of the extraction strategy that matched */
    source: string;
    url: string;
  };
}

/** Emitted when the name-record server accepted the update */
export interface RecordUpdated extends BaseEvent {
  type: 'RecordUpdated';
  payload: {
    label: string;
    repository: string;
    cid: string;
    transactionHash?: string;
  };
}

/** Emitted when the run ends, successfully or not */
export interface RunFinished extends BaseEvent {
  type: 'RunFinished';
  payload: {
    status: 'success' | 'failure';
    durationMs: number;
    blobId?: string;
    error?: string;
  };
}

export type PipelineEvent =
  | RunStarted
  | FileSkipped
  | PackCompleted
  | BlobStored
  | RecordUpdated
  | RunFinished;

export type PipelineEventType = PipelineEvent['type'];
