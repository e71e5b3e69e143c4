import { createServer, type Server } from "node:http";
import { describe, it, expect, afterEach } from "vitest";
import { decode } from "@msgpack/msgpack";
import { WebSocket, type RawData } from "ws";
import {
  GroupType,
  TerminationReason,
} from "../../src/shared/constants/SimulationEnums";
import { WebSocketMessageType } from "../../src/shared/constants/WebSocketEnums";
import { createSimulationConfig } from "../../src/config/simulationConfig";
import { createCoordinator } from "../../src/config/container";
import type { RoundCoordinator } from "../../src/domain/simulation/core/RoundCoordinator";
import { SnapshotStreamServer } from "../../src/infrastructure/services/stream/SnapshotStreamServer";
import { gridFromRows } from "../setup";

/**
 * Client that decodes every binary frame and hands them out in arrival order.
 */
class StreamClient {
  readonly socket: WebSocket;
  private readonly received: unknown[] = [];
  private readonly waiters: Array<(message: unknown) => void> = [];

  constructor(url: string) {
    this.socket = new WebSocket(url);
    this.socket.on("message", (data: RawData) => {
      const bytes = Array.isArray(data)
        ? Buffer.concat(data)
        : data instanceof ArrayBuffer
          ? Buffer.from(data)
          : data;
      const message = decode(bytes);
      const waiter = this.waiters.shift();
      if (waiter) waiter(message);
      else this.received.push(message);
    });
  }

  opened(): Promise<void> {
    return new Promise((resolve, reject) => {
      this.socket.once("open", () => resolve());
      this.socket.once("error", reject);
    });
  }

  next(): Promise<unknown> {
    if (this.received.length > 0) {
      return Promise.resolve(this.received.shift());
    }
    return new Promise((resolve) => this.waiters.push(resolve));
  }

  close(): void {
    this.socket.close();
  }
}

describe("SnapshotStreamServer", () => {
  let coordinator: RoundCoordinator;
  let stream: SnapshotStreamServer;
  let server: Server;
  let client: StreamClient | undefined;

  const start = async (): Promise<StreamClient> => {
    coordinator = createCoordinator(
      createSimulationConfig({
        width: 2,
        height: 2,
        densities: { [GroupType.RED]: 0, [GroupType.BLUE]: 0 },
        similarityThreshold: 0.5,
      }),
      { grid: gridFromRows(["RR", "B."]) },
    );
    coordinator.initialize();
    stream = new SnapshotStreamServer(coordinator);

    server = createServer();
    server.on("upgrade", (request, socket, head) => {
      stream.handleUpgrade(request, socket, head);
    });
    await new Promise<void>((resolve) => server.listen(0, "127.0.0.1", resolve));
    const address = server.address();
    const port = typeof address === "object" && address ? address.port : 0;

    client = new StreamClient(`ws://127.0.0.1:${port}/ws/sim`);
    await client.opened();
    return client;
  };

  afterEach(async () => {
    client?.close();
    client = undefined;
    stream.close();
    server.closeAllConnections();
    await new Promise<void>((resolve) => server.close(() => resolve()));
    await coordinator.shutdown();
  });

  it("debe enviar el último snapshot al conectarse", async () => {
    const observer = await start();

    expect(await observer.next()).toEqual({
      type: WebSocketMessageType.SNAPSHOT,
      payload: {
        generation: 0,
        width: 2,
        height: 2,
        cells: [0, 0, 1, -1],
        satisfactionRatio: coordinator.getSatisfactionRatio(),
        moved: 0,
        requested: 0,
        degraded: 0,
      },
    });
    expect(stream.getClientCount()).toBe(1);
  });

  it("debe transmitir cada ronda publicada y el final de la ejecución", async () => {
    const observer = await start();
    await observer.next();

    const report = await coordinator.step();
    expect(await observer.next()).toMatchObject({
      type: WebSocketMessageType.SNAPSHOT,
      payload: { generation: 1, moved: report.moves.length },
    });

    coordinator.stop();
    expect(await observer.next()).toEqual({
      type: WebSocketMessageType.TERMINATED,
      payload: {
        reason: TerminationReason.CANCELLED,
        generation: 1,
        satisfactionRatio: coordinator.getSatisfactionRatio(),
      },
    });
  });

  it("debe responder con un error a los mensajes de los clientes", async () => {
    const observer = await start();
    await observer.next();

    observer.socket.send("pause");

    expect(await observer.next()).toEqual({
      type: WebSocketMessageType.ERROR,
      message: "Snapshot stream is read-only",
    });
  });
});
