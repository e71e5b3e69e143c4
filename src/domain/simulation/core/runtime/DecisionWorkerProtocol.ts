import type { WorkerMessageType } from "../../../../shared/constants/WebSocketEnums";
import type {
  AgentState,
  DecisionSettings,
  RelocationIntent,
} from "../../../../shared/types/simulation/agents";
import type { SnapshotWire } from "../../../../shared/types/simulation/grid";

export interface EvaluateRequest {
  type: WorkerMessageType.EVALUATE;
  requestId: string;
  snapshot: SnapshotWire;
  agents: AgentState[];
  settings: DecisionSettings;
}

export interface ShutdownRequest {
  type: WorkerMessageType.SHUTDOWN;
}

export type DecisionWorkerRequest = EvaluateRequest | ShutdownRequest;

export interface DecisionWorkerResponse {
  type: WorkerMessageType.RESULT;
  requestId: string;
  ok: boolean;
  intents?: RelocationIntent[];
  error?: string;
}

export interface ReadyMessage {
  type: WorkerMessageType.READY;
}

export type DecisionWorkerMessage = DecisionWorkerResponse | ReadyMessage;
