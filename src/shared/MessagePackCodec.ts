/**
 * MessagePack encoding for the snapshot stream.
 */

import { encode } from "@msgpack/msgpack";
import { WebSocketMessageType } from "./constants/WebSocketEnums";
import type { PublishedFrame, SimulationOutcome } from "./types/simulation/rounds";
import type { TerminationReason } from "./constants/SimulationEnums";

/**
 * Snapshot payload streamed to observers. `cells` is row-major with one
 * group code per cell and -1 for empty.
 */
export interface SnapshotPayload {
  generation: number;
  width: number;
  height: number;
  cells: number[];
  satisfactionRatio: number;
  moved: number;
  requested: number;
  degraded: number;
}

export interface SnapshotMessage {
  type: WebSocketMessageType.SNAPSHOT;
  payload: SnapshotPayload;
}

export interface TerminatedMessage {
  type: WebSocketMessageType.TERMINATED;
  payload: {
    reason: TerminationReason;
    generation: number;
    satisfactionRatio: number;
  };
}

export type StreamMessage = SnapshotMessage | TerminatedMessage;

/**
 * Serializes data to MessagePack (binary format).
 */
export function encodeMsgPack<T>(data: T): Buffer {
  return Buffer.from(encode(data));
}

export function toSnapshotMessage(frame: PublishedFrame): SnapshotMessage {
  const wire = frame.snapshot.toWire();
  return {
    type: WebSocketMessageType.SNAPSHOT,
    payload: {
      generation: frame.generation,
      width: wire.width,
      height: wire.height,
      cells: Array.from(wire.cells),
      satisfactionRatio: frame.satisfactionRatio,
      moved: frame.moves.length,
      requested: frame.requested,
      degraded: frame.degraded,
    },
  };
}

export function toTerminatedMessage(
  outcome: SimulationOutcome,
): TerminatedMessage {
  return {
    type: WebSocketMessageType.TERMINATED,
    payload: {
      reason: outcome.reason,
      generation: outcome.generation,
      satisfactionRatio: outcome.satisfactionRatio,
    },
  };
}
