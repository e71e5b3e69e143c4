/**
 * WebSocket and worker message type enumerations.
 *
 * @module shared/constants/WebSocketEnums
 */

/**
 * Enumeration of messages streamed to snapshot subscribers.
 */
export enum WebSocketMessageType {
  SNAPSHOT = "SNAPSHOT",
  TERMINATED = "TERMINATED",
  ERROR = "ERROR",
}

/**
 * Enumeration of worker message types for background decision batches.
 */
export enum WorkerMessageType {
  EVALUATE = "evaluate",
  RESULT = "result",
  READY = "ready",
  SHUTDOWN = "shutdown",
}
