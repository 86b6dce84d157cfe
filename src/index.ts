export * from "./lib/packets";
export * from "./lib/format/formatPacket";
export { toCanonicalText } from "./lib/format/canonicalJson";
export * from "./lib/config/listenerConfig";
export * from "./lib/connection/TelemetryListener";
export * from "./lib/recorder/runRecorder";
export * from "./lib/samples/SamplePacketStore";
export * from "./store/useListenerStatsStore";
export {
  createLogger,
  getLogLevel,
  resolveLogLevel,
  setLogLevel,
  type Logger,
  type LogLevel,
} from "./lib/logger";
