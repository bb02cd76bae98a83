export { MemoryBus, type ServiceHandler } from "./bus/memory-bus.js";
export { MessageTypeRegistry } from "./bus/message-types.js";
export { createTextCodec, type StringEncoding, type TextCodec } from "./bus/codec.js";
export type * from "./bus/types.js";

export { WebSocketCloudTransport, type UpFrame, type WebSocketTransportOptions } from "./cloud/ws-transport.js";
export { OutboundQueue } from "./cloud/outbound-queue.js";
export { ConnectionStringError, deviceUrl, parseConnectionString, type ConnectionInfo } from "./cloud/connection-string.js";
export type * from "./cloud/types.js";

export { RelayService, AUTO_CREATED_MODE, registerDiagnosticServices } from "./relay/service.js";
export { RelayRegistry, type RegisterOutcome, type RegisterResult } from "./relay/registry.js";
export { RelayEntity, type CloudForwarder, type DeliveryResult } from "./relay/entity.js";
export { DesiredStateReconciler, type ReconcileReport, type ReportedState, type StateReporter } from "./relay/reconciler.js";
export { CommandBridge, canTransition } from "./relay/command-bridge.js";
export { FileRelayStateStore, MemoryRelayStateStore, type RelayStateStore } from "./relay/state-store.js";
export { parseRelayMode, relayModeName } from "./relay/relay-mode.js";
export * from "./relay/errors.js";
export * from "./relay/types.js";

export { loadConfig, ConfigResolutionError, type RelayConfig } from "./config.js";
export { createLogger, type Logger } from "./log.js";
