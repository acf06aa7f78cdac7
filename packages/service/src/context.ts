/**
 * Everything the routes and the channel share, built once per server.
 */

import type { Config } from "@testcast/core";
import { RecorderChannel } from "./channel.js";
import { GenerationCache } from "./codegen-cache.js";
import { IngestionService } from "./ingestion.js";
import {
  InMemorySnapshotStore,
  SessionRegistry,
  type SessionSnapshotStore,
} from "./registry.js";

export interface ServiceContext {
  config: Config;
  registry: SessionRegistry;
  ingestion: IngestionService;
  channel: RecorderChannel;
  codegen: GenerationCache;
}

export interface ServiceContextOptions {
  store?: SessionSnapshotStore;
  now?: () => number;
}

export function createServiceContext(
  config: Config,
  options: ServiceContextOptions = {}
): ServiceContext {
  const { now } = options;
  const registry = new SessionRegistry({
    admission: { maxEventCount: config.maxEventCount },
    store: options.store ?? new InMemorySnapshotStore(),
    now,
  });
  const ingestion = new IngestionService({
    registry,
    redactKeys: config.redactKeys,
    now,
  });
  return {
    config,
    registry,
    ingestion,
    channel: new RecorderChannel({ registry, ingestion, now }),
    codegen: new GenerationCache(config.codegenCacheSize),
  };
}
