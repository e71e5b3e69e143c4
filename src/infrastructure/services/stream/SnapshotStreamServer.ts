import type { IncomingMessage } from "node:http";
import type { Duplex } from "node:stream";
import { WebSocketServer, WebSocket } from "ws";
import type { RoundCoordinator } from "../../../domain/simulation/core/RoundCoordinator";
import { SimulationEventType } from "../../../shared/constants/SimulationEnums";
import { WebSocketMessageType } from "../../../shared/constants/WebSocketEnums";
import {
  encodeMsgPack,
  toSnapshotMessage,
  toTerminatedMessage,
} from "../../../shared/MessagePackCodec";
import type {
  PublishedFrame,
  SimulationOutcome,
} from "../../../shared/types/simulation/rounds";
import { logger, LogCategory } from "../../utils/logger";

/**
 * Read-only WebSocket stream of published snapshots.
 *
 * Each published frame is encoded once with MessagePack and sent to every
 * open client. A client that connects mid-run first receives the latest
 * frame. Incoming messages are answered with an ERROR; observers cannot
 * steer the run.
 */
export class SnapshotStreamServer {
  private readonly wss: WebSocketServer;
  private cachedFrame: Buffer | null = null;
  private cachedGeneration = -1;

  private readonly onFrame = (frame: PublishedFrame): void => {
    this.cachedFrame = encodeMsgPack(toSnapshotMessage(frame));
    this.cachedGeneration = frame.generation;
    this.broadcast(this.cachedFrame);
  };

  private readonly onTerminated = (outcome: SimulationOutcome): void => {
    this.broadcast(encodeMsgPack(toTerminatedMessage(outcome)));
  };

  constructor(private readonly coordinator: RoundCoordinator) {
    this.wss = new WebSocketServer({ noServer: true });
    this.wss.on("connection", (ws) => this.handleConnection(ws));
    coordinator.on(SimulationEventType.SNAPSHOT_PUBLISHED, this.onFrame);
    coordinator.on(SimulationEventType.TERMINATED, this.onTerminated);
  }

  public handleUpgrade(
    request: IncomingMessage,
    socket: Duplex,
    head: Buffer,
  ): void {
    this.wss.handleUpgrade(request, socket, head, (ws) => {
      this.wss.emit("connection", ws, request);
    });
  }

  public getClientCount(): number {
    return this.wss.clients.size;
  }

  public close(): void {
    this.coordinator.off(SimulationEventType.SNAPSHOT_PUBLISHED, this.onFrame);
    this.coordinator.off(SimulationEventType.TERMINATED, this.onTerminated);
    for (const client of this.wss.clients) {
      client.close();
    }
    this.wss.close();
  }

  private handleConnection(ws: WebSocket): void {
    logger.info(
      `Client connected to snapshot stream (${this.wss.clients.size} open)`,
      LogCategory.NETWORK,
    );

    const latest = this.latestFrame();
    if (latest) ws.send(latest);

    ws.on("message", () => {
      ws.send(
        encodeMsgPack({
          type: WebSocketMessageType.ERROR,
          message: "Snapshot stream is read-only",
        }),
      );
    });
    ws.on("error", (error) => {
      logger.warn(
        `Snapshot stream client error: ${error.message}`,
        LogCategory.NETWORK,
      );
    });
    ws.on("close", () => {
      logger.debug("Client left snapshot stream", LogCategory.NETWORK);
    });
  }

  private latestFrame(): Buffer | null {
    const frame = this.coordinator.getLastFrame();
    if (!frame) return null;
    if (frame.generation !== this.cachedGeneration || !this.cachedFrame) {
      this.cachedFrame = encodeMsgPack(toSnapshotMessage(frame));
      this.cachedGeneration = frame.generation;
    }
    return this.cachedFrame;
  }

  private broadcast(buffer: Buffer): void {
    for (const client of this.wss.clients) {
      if (client.readyState === WebSocket.OPEN) {
        client.send(buffer);
      }
    }
  }
}
