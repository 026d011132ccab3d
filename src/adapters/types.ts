import type {
  ObservedDatastream,
  ObservedSensor,
  RawExternalId,
  SourceObservation,
} from "../types";

/** What a pipeline has already ingested, handed to the adapter before each fetch. */
export interface FetchWindow {
  defaultStart: Date;
  lastSuccessAt: Date | null;
  /** Latest stored timestamp of a datastream, or `defaultStart` when it has none. */
  since(datastreamExternalId: RawExternalId): Date;
}

export interface SourceBatch {
  sensors: ObservedSensor[];
  datastreams: ObservedDatastream[];
  observations: SourceObservation[];
}

export interface SourceAdapter {
  /** Namespace of every external id the adapter emits. */
  readonly source: string;
  fetch(window: FetchWindow): Promise<SourceBatch>;
  /** Called once the fetched batch is fully stored. */
  commit?(): void;
  /** Called when a run fails after a fetch; buffered sources keep their data. */
  rollback?(): void;
  close?(): Promise<void>;
}
