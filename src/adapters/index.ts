import type { Logger } from "../common/logger";
import { JsonSubscriber } from "../clients/mqtt";
import { ConfigError, secretFromEnv, type SourceConfig } from "../config";
import { FROST_SOURCE, FrostAdapter } from "./frost";
import { FOUR_TRAFFIC_SOURCE, FourTrafficAdapter } from "./fourTraffic";
import { HttpSource } from "./http";
import { INRIX_SOURCE, InrixAdapter, loadSegmentCatalog } from "./inrix";
import { LANUV_SOURCE, LanuvAdapter } from "./lanuv";
import { SENSOR_COMMUNITY_SOURCE, SensorCommunityAdapter } from "./sensorCommunity";
import type { SourceAdapter } from "./types";

export type { FetchWindow, SourceAdapter, SourceBatch } from "./types";

/** Builds the adapter for one configured source; MQTT sources start listening at once. */
export function createAdapter(config: SourceConfig, logger: Logger): SourceAdapter {
  const timeoutMs = config.timeoutSec * 1000;
  switch (config.kind) {
    case "frost": {
      const username = secretFromEnv(config.usernameEnv);
      const password = secretFromEnv(config.passwordEnv);
      const source = config.name ?? FROST_SOURCE;
      return new FrostAdapter({
        http: new HttpSource({
          source,
          baseURL: config.baseUrl,
          timeoutMs,
          auth: username && password ? { username, password } : undefined,
        }),
        logger,
        source,
      });
    }
    case "sensor-community": {
      const source = config.name ?? SENSOR_COMMUNITY_SOURCE;
      return new SensorCommunityAdapter({
        http: new HttpSource({ source, baseURL: config.baseUrl, timeoutMs }),
        logger,
        area: config.area,
        valueTypes: config.valueTypes,
        archive: config.archive,
        source,
      });
    }
    case "lanuv": {
      const source = config.name ?? LANUV_SOURCE;
      return new LanuvAdapter({
        http: new HttpSource({ source, timeoutMs }),
        logger,
        url: config.url,
        stations: config.stations,
        encoding: config.encoding,
        source,
      });
    }
    case "mqtt": {
      const source = config.name ?? FOUR_TRAFFIC_SOURCE;
      const subscriber = new JsonSubscriber({
        serverUrl: config.url,
        topics: config.topics,
        clientId: config.clientId,
        username: secretFromEnv(config.usernameEnv),
        password: secretFromEnv(config.passwordEnv),
        keepalive: config.keepaliveSec,
        logger: logger.with().str("source", source).logger(),
      });
      subscriber.on("error", (err) =>
        logger.with().str("source", source).error(err).logger().error("MQTT connection failed")
      );
      const adapter = new FourTrafficAdapter({
        feed: subscriber,
        logger,
        topicFilter: config.topicFilter,
        maxBuffered: config.maxBuffered,
        source,
      });
      subscriber.start();
      return adapter;
    }
    case "inrix": {
      const source = config.name ?? INRIX_SOURCE;
      const appId = secretFromEnv(config.appIdEnv);
      const hashToken = secretFromEnv(config.hashTokenEnv);
      if (!appId || !hashToken) {
        throw new ConfigError(
          `Source ${source} needs ${config.appIdEnv} and ${config.hashTokenEnv} in the environment`
        );
      }
      return new InrixAdapter({
        http: new HttpSource({ source, timeoutMs }),
        logger,
        tokenUrl: config.tokenUrl,
        segmentsUrl: config.segmentsUrl,
        appId,
        hashToken,
        box: config.box,
        segments: loadSegmentCatalog(config.segmentsFile),
        source,
      });
    }
  }
}
