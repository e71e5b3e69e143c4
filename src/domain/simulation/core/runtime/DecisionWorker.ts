import { parentPort } from "node:worker_threads";
import { WorkerMessageType } from "../../../../shared/constants/WebSocketEnums";
import type {
  DecisionWorkerRequest,
  DecisionWorkerResponse,
} from "./DecisionWorkerProtocol";
import { decideIntent } from "../../agents/AgentActor";
import { GridSnapshot } from "../../grid/GridSnapshot";

/**
 * Worker thread evaluating batches of agent decisions.
 *
 * Each request carries a wire copy of the round's snapshot and the agents of
 * one batch; the worker answers with one intent per agent.
 */

if (!parentPort) {
  throw new Error("DecisionWorker must be run as a worker thread");
}

const port = parentPort;

port.on("message", (message: DecisionWorkerRequest) => {
  if (message.type === WorkerMessageType.SHUTDOWN) {
    port.close();
    return;
  }
  if (message.type !== WorkerMessageType.EVALUATE) return;

  try {
    const snapshot = GridSnapshot.fromWire(message.snapshot);
    const intents = message.agents.map((agent) =>
      decideIntent(agent, snapshot, message.settings),
    );
    const response: DecisionWorkerResponse = {
      type: WorkerMessageType.RESULT,
      requestId: message.requestId,
      ok: true,
      intents,
    };
    port.postMessage(response);
  } catch (error) {
    const response: DecisionWorkerResponse = {
      type: WorkerMessageType.RESULT,
      requestId: message.requestId,
      ok: false,
      error: error instanceof Error ? error.message : String(error),
    };
    port.postMessage(response);
  }
});

port.postMessage({ type: WorkerMessageType.READY });
