import { z } from "zod";
import { optionalCoordinate } from "../common/geometry";
import type { Logger } from "../common/logger";
import {
  datastreamExternalId,
  normalizeExternalId,
  type ExternalId,
  type ObservedDatastream,
  type ObservedSensor,
  type SourceObservation,
} from "../types";
import type { FetchWindow, SourceAdapter, SourceBatch } from "./types";

export const FOUR_TRAFFIC_SOURCE = "4traffic sensors";

const COORDINATE_KEYS = new Set(["lat", "lon"]);

const payloadSchema = z.object({
  device_id: z.union([z.string(), z.number()]),
  measured_at: z.string(),
  data: z
    .object({ lat: optionalCoordinate, lon: optionalCoordinate })
    .catchall(z.union([z.number(), z.string(), z.boolean(), z.null()])),
});

export type FourTrafficPayload = z.infer<typeof payloadSchema>;

/** The subset of the MQTT subscriber the adapter listens to. */
export interface MessageFeed {
  on(event: "message", listener: (topic: string, payload: unknown) => void): unknown;
  stop?(): Promise<void>;
}

export interface FourTrafficAdapterOptions {
  feed: MessageFeed;
  logger: Logger;
  /** Only topics containing this text are buffered. */
  topicFilter?: string;
  /** Oldest messages are dropped beyond this many buffered. */
  maxBuffered?: number;
  source?: string;
}

/**
 * Push source: messages arrive between ticks and are buffered. A fetch
 * drains the buffer; the drained messages are released on commit and put
 * back in front on rollback.
 */
export class FourTrafficAdapter implements SourceAdapter {
  readonly source: string;
  private readonly logger: Logger;
  private readonly feed: MessageFeed;
  private readonly topicFilter: string;
  private readonly maxBuffered: number;
  private buffer: FourTrafficPayload[] = [];
  private inFlight: FourTrafficPayload[] = [];

  constructor(options: FourTrafficAdapterOptions) {
    this.logger = options.logger;
    this.topicFilter = options.topicFilter ?? "4traffic";
    this.maxBuffered = options.maxBuffered ?? 100_000;
    this.source = options.source ?? FOUR_TRAFFIC_SOURCE;
    this.feed = options.feed;
    this.feed.on("message", (topic, payload) => this.receive(topic, payload));
  }

  get buffered(): number {
    return this.buffer.length;
  }

  receive(topic: string, payload: unknown) {
    if (!topic.includes(this.topicFilter)) {
      this.logger.with().str("topic", topic).logger().debug("Ignoring message on foreign topic");
      return;
    }
    const parsed = payloadSchema.safeParse(payload);
    if (!parsed.success) {
      this.logger
        .with()
        .str("source", this.source)
        .str("topic", topic)
        .str("issue", parsed.error.issues[0]?.message)
        .logger()
        .warn("Dropping malformed message");
      return;
    }
    this.buffer.push(parsed.data);
    this.enforceLimit();
  }

  private enforceLimit() {
    if (this.buffer.length <= this.maxBuffered) return;
    const dropped = this.buffer.splice(0, this.buffer.length - this.maxBuffered);
    this.logger
      .with()
      .str("source", this.source)
      .num("dropped", dropped.length)
      .logger()
      .warn("Message buffer full; dropped oldest messages");
  }

  async fetch(_window: FetchWindow): Promise<SourceBatch> {
    // a retried fetch within one run sees the same messages again
    if (!this.inFlight.length) {
      this.inFlight = this.buffer;
      this.buffer = [];
    }
    return this.toBatch(this.inFlight);
  }

  commit() {
    this.inFlight = [];
  }

  rollback() {
    this.buffer = [...this.inFlight, ...this.buffer];
    this.inFlight = [];
    this.enforceLimit();
  }

  async close(): Promise<void> {
    await this.feed.stop?.();
    if (this.buffer.length) {
      this.logger
        .with()
        .str("source", this.source)
        .num("discarded", this.buffer.length)
        .logger()
        .warn("Closing with buffered messages not yet stored");
    }
  }

  toBatch(messages: FourTrafficPayload[]): SourceBatch {
    const sensors = new Map<ExternalId, ObservedSensor>();
    const datastreams = new Map<ExternalId, ObservedDatastream>();
    const observations: SourceObservation[] = [];

    for (const message of messages) {
      const sensorId = normalizeExternalId(message.device_id);
      if (sensorId === null) continue;
      const { lat, lon } = message.data;

      if (!sensors.has(sensorId)) {
        sensors.set(sensorId, {
          source: this.source,
          externalId: sensorId,
          description: "",
          longitude: lon ?? null,
          latitude: lat ?? null,
          confidential: false,
        });
      }

      for (const [key, value] of Object.entries(message.data)) {
        if (COORDINATE_KEYS.has(key)) continue;
        const dsId = datastreamExternalId(sensorId, key);
        if (!datastreams.has(dsId)) {
          datastreams.set(dsId, {
            sensorExternalId: sensorId,
            externalId: dsId,
            categoryLabel: key,
            confidential: false,
          });
        }
        observations.push({
          datastreamExternalId: dsId,
          timestamp: message.measured_at,
          rawValue: typeof value === "number" || typeof value === "string" ? value : null,
        });
      }
    }

    return {
      sensors: [...sensors.values()],
      datastreams: [...datastreams.values()],
      observations,
    };
  }
}
