import * as mqtt from "mqtt";
import type { IClientOptions, MqttClient } from "mqtt";
import events from "events";
import type { Logger } from "../../common/logger";

function getRequiredProperty<
  C extends Record<string, unknown>,
  P extends keyof C & string
>(config: C, propName: P): NonNullable<C[P]> {
  const value = config[propName];
  if (value !== undefined && value !== null) {
    return value;
  }
  throw new Error("Missing required configuration property '" + propName + "'");
}

export type JsonSubscriberOptions = {
  serverUrl: string;
  topics: string[];
  clientId: string;
  username?: string;
  password?: string;
  keepalive?: number;
  qos?: 0 | 1 | 2;
  logger: Logger;
  mqttOptions?: Omit<
    IClientOptions,
    "clientId" | "clean" | "keepalive" | "username" | "password"
  >;
};

export interface JsonSubscriber extends events.EventEmitter {
  on(
    event: "connect" | "close" | "reconnect" | "offline" | "end",
    listener: () => void
  ): this;
  on(event: "error", listener: (error: Error) => void): this;
  /** One decoded JSON document per MQTT message; undecodable payloads are dropped. */
  on(event: "message", listener: (topic: string, payload: unknown) => void): this;

  emit(event: "connect" | "close" | "reconnect" | "offline" | "end"): boolean;
  emit(event: "error", error: Error): boolean;
  emit(event: "message", topic: string, payload: unknown): boolean;
}

/*
 * MQTT subscriber for brokers that publish plain JSON documents
 */
export class JsonSubscriber extends events.EventEmitter {
  private readonly serverUrl: string;
  private readonly topics: string[];
  private readonly qos: 0 | 1 | 2;
  private readonly mqttOptions: IClientOptions;
  private readonly logger: Logger;

  private client: MqttClient | null = null;
  private connecting = false;
  private connected = false;

  constructor(config: JsonSubscriberOptions) {
    super();
    this.logger = getRequiredProperty(config, "logger");
    this.serverUrl = getRequiredProperty(config, "serverUrl");
    this.topics = getRequiredProperty(config, "topics");
    this.qos = config.qos ?? 1;

    this.mqttOptions = {
      ...(config.mqttOptions || {}),
      clientId: getRequiredProperty(config, "clientId"),
      clean: true,
      keepalive: config.keepalive ?? 60,
      connectTimeout: 30000,
      username: config.username,
      password: config.password,
    };
  }

  get isConnected(): boolean {
    return this.connected;
  }

  start() {
    if (this.client) return;
    this.connecting = true;
    this.logger.info("Attempting to connect: " + this.serverUrl);
    const client = mqtt.connect(this.serverUrl, this.mqttOptions);
    this.client = client;

    client.on("connect", () => {
      this.logger.info("Client has connected");
      this.connecting = false;
      this.connected = true;
      for (const topic of this.topics) {
        this.logger.info(`Subscribing to topic: ${topic}`);
        client.subscribe(topic, { qos: this.qos }, (err) => {
          if (err) {
            this.logger.with().str("topic", topic).error(err).logger().error("Subscribe failed");
          }
        });
      }
      this.emit("connect");
    });

    client.on("error", (error) => {
      this.logger.with().error(error).logger().warn("MQTT client error");
      if (this.connecting) {
        this.emit("error", error);
      }
    });

    client.on("close", () => {
      if (this.connected) {
        this.connected = false;
        this.emit("close");
      }
    });

    client.on("reconnect", () => {
      this.emit("reconnect");
    });

    client.on("offline", () => {
      this.emit("offline");
    });

    client.on("end", () => {
      this.emit("end");
    });

    client.on("message", (topic, message) => {
      let payload: unknown;
      try {
        payload = JSON.parse(message.toString("utf8"));
      } catch (e) {
        this.logger
          .with()
          .str("topic", topic)
          .error(e)
          .logger()
          .warn("Dropping message that is not JSON");
        return;
      }
      if (this.logger.isTraceEnabled()) {
        this.logger
          .with()
          .str("topic", topic)
          .any("payload", payload)
          .logger()
          .trace(`Received message on topic ${topic}`);
      }
      this.emit("message", topic, payload);
    });
  }

  async stop(): Promise<void> {
    const client = this.client;
    this.client = null;
    if (client) await client.endAsync();
  }
}
