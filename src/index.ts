export { createApp, createRuntime, startServer, type AppOptions, type BridgeRuntime } from "./server/app.js";
export { BridgeService, type BridgeDependencies, type ChatOptions, type OpenedChat } from "./server/services/BridgeService.js";
export { CredentialAcquirer } from "./server/services/credentialAcquirer.js";
export { CredentialManager } from "./server/services/credentialManager.js";
export { CredentialStore } from "./server/services/credentialStore.js";
export { SessionStore, deriveSessionKey } from "./server/services/sessionStore.js";
export { UsageTracker, createUsageFetcher } from "./server/services/usageTracker.js";
export { HttpUpstreamTransport, UpstreamHttpError, type UpstreamTransport } from "./server/services/UpstreamClient.js";
export { decodeUpstreamEvent } from "./server/stream/events.js";
export { ChunkStream, aggregateChunks, transformStream } from "./server/stream/transformer.js";
export type * from "./server/stream/types.js";
export * from "./server/translator/index.js";
export * from "./shared/index.js";
