import { RetryConfig, SinkConfig } from "../config";
import { Logger } from "../observability";
import { HttpSink } from "./httpSink";
import { LocalJsonSink } from "./localJsonSink";
import { Sink } from "./types";

export function createSink(config: SinkConfig, options: { retry?: RetryConfig; logger?: Logger } = {}): Sink {
  switch (config.type) {
    case "local_json":
      return new LocalJsonSink(config.snapshotPath);
    case "http":
      return new HttpSink({ endpoint: config.httpEndpoint, token: config.httpToken, ...options });
  }
}

export * from "./baseSink";
export * from "./httpSink";
export * from "./localJsonSink";
export * from "./types";
