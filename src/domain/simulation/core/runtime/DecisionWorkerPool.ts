import { Worker } from "node:worker_threads";
import { WorkerMessageType } from "../../../../shared/constants/WebSocketEnums";
import { AgentTimeout } from "../../../../shared/errors/SimulationErrors";
import type {
  AgentState,
  DecisionSettings,
  RelocationIntent,
} from "../../../../shared/types/simulation/agents";
import type { SnapshotWire } from "../../../../shared/types/simulation/grid";
import { logger, LogCategory } from "../../../../infrastructure/utils/logger";
import type {
  DecisionWorkerMessage,
  EvaluateRequest,
} from "./DecisionWorkerProtocol";

interface DecisionJob {
  request: EvaluateRequest;
  resolve: (intents: RelocationIntent[]) => void;
  reject: (error: Error) => void;
  timer?: ReturnType<typeof setTimeout>;
  settled: boolean;
  workerId?: number;
}

interface WorkerEnvelope {
  id: number;
  worker: Worker;
  ready: boolean;
  busy: boolean;
  currentJob?: DecisionJob;
}

export interface DecisionWorkerPoolOptions {
  /** Worker entry module. Defaults to `DecisionWorker.ts` beside this file. */
  script?: URL;
}

const DEFAULT_WORKER_SCRIPT = new URL("./DecisionWorker.ts", import.meta.url);

/**
 * Worker source that registers the tsx loader inside the thread before
 * importing the `.ts` entry. `execArgv: ["--import", "tsx"]` does not reach
 * a worker's entry module on Node 20.
 */
const bootstrapSource = (script: URL): string =>
  `import("tsx/esm/api")` +
  `.then(({ register }) => { register(); return import(${JSON.stringify(script.href)}); })` +
  `.catch((error) => { setImmediate(() => { throw error; }); });`;

/**
 * Fixed-size pool of decision workers.
 *
 * Jobs are dispatched in FIFO order to workers that have announced READY.
 * A job that misses its deadline is rejected with `AgentTimeout` and the
 * worker holding it is terminated and replaced.
 *
 * @see DecisionWorker for the worker side
 */
export class DecisionWorkerPool {
  private readonly workers: Map<number, WorkerEnvelope> = new Map();
  private readonly queue: DecisionJob[] = [];
  private readonly script: URL;
  private readonly readyWaiters: Array<() => void> = [];
  private disposed = false;
  private nextWorkerId = 0;
  private nextRequestId = 0;

  constructor(
    private readonly size: number,
    options: DecisionWorkerPoolOptions = {},
  ) {
    this.script = options.script ?? DEFAULT_WORKER_SCRIPT;

    for (let i = 0; i < this.size; i++) {
      this.spawnWorker();
    }

    logger.info(
      `🧵 Decision worker pool initialized with ${this.size} worker(s)`,
      LogCategory.WORKERS,
    );
  }

  /**
   * Resolves once every worker slot holds a worker that answered READY.
   *
   * @throws {Error} when the workers are not up within `timeoutMs`
   */
  public whenReady(timeoutMs: number): Promise<void> {
    if (this.disposed) {
      return Promise.reject(new Error("DecisionWorkerPool disposed"));
    }
    if (this.isReady()) return Promise.resolve();

    return new Promise<void>((resolve, reject) => {
      const timer = setTimeout(() => {
        const idx = this.readyWaiters.indexOf(onReady);
        if (idx !== -1) this.readyWaiters.splice(idx, 1);
        reject(
          new Error(`Decision workers not ready after ${timeoutMs}ms`),
        );
      }, timeoutMs);
      const onReady = (): void => {
        clearTimeout(timer);
        resolve();
      };
      this.readyWaiters.push(onReady);
    });
  }

  /**
   * Evaluates one batch of agents against a snapshot.
   *
   * @throws {AgentTimeout} when the batch is not answered within `timeoutMs`
   */
  public evaluate(
    snapshot: SnapshotWire,
    agents: AgentState[],
    settings: DecisionSettings,
    timeoutMs: number,
  ): Promise<RelocationIntent[]> {
    if (this.disposed) {
      return Promise.reject(new Error("DecisionWorkerPool disposed"));
    }

    return new Promise<RelocationIntent[]>((resolve, reject) => {
      const job: DecisionJob = {
        request: {
          type: WorkerMessageType.EVALUATE,
          requestId: `batch-${snapshot.generation}-${this.nextRequestId++}`,
          snapshot,
          agents,
          settings,
        },
        resolve,
        reject,
        settled: false,
      };

      job.timer = setTimeout(() => this.expireJob(job, timeoutMs), timeoutMs);

      this.queue.push(job);
      this.dispatch();
    });
  }

  /**
   * Shuts down all workers and rejects queued jobs.
   */
  public async destroy(): Promise<void> {
    this.disposed = true;
    const terminations: Array<Promise<number>> = [];
    for (const envelope of this.workers.values()) {
      envelope.worker.removeAllListeners();
      envelope.worker.postMessage({ type: WorkerMessageType.SHUTDOWN });
      terminations.push(envelope.worker.terminate());
      if (envelope.currentJob) {
        this.settle(envelope.currentJob, new Error("DecisionWorkerPool disposed"));
      }
    }
    this.workers.clear();
    for (const job of this.queue.splice(0)) {
      this.settle(job, new Error("DecisionWorkerPool disposed"));
    }
    await Promise.allSettled(terminations);
  }

  private isReady(): boolean {
    if (this.workers.size < this.size) return false;
    for (const envelope of this.workers.values()) {
      if (!envelope.ready) return false;
    }
    return true;
  }

  private spawnWorker(): void {
    if (this.disposed) return;

    const id = this.nextWorkerId++;
    const worker = new Worker(bootstrapSource(this.script), {
      eval: true,
      name: `decision-worker-${id}`,
    });

    const envelope: WorkerEnvelope = { id, worker, ready: false, busy: false };

    worker.on("message", (message: DecisionWorkerMessage) =>
      this.handleWorkerMessage(envelope, message),
    );
    worker.on("error", (error) => {
      logger.error(
        `Decision worker ${envelope.id} crashed`,
        LogCategory.WORKERS,
        error.message,
      );
      this.replaceWorker(envelope, error);
    });
    worker.on("exit", (code) => {
      this.replaceWorker(
        envelope,
        new Error(`Decision worker ${envelope.id} exited with code ${code}`),
      );
    });

    this.workers.set(id, envelope);
  }

  private replaceWorker(envelope: WorkerEnvelope, error: Error): void {
    if (!this.workers.has(envelope.id)) return;
    this.workers.delete(envelope.id);
    if (envelope.currentJob) {
      this.settle(envelope.currentJob, error);
      envelope.currentJob = undefined;
    }
    if (!this.disposed) {
      this.spawnWorker();
      this.dispatch();
    }
  }

  private dispatch(): void {
    if (this.disposed) return;

    for (const envelope of this.workers.values()) {
      if (!envelope.ready || envelope.busy) continue;
      const job = this.dequeueNext();
      if (!job) return;
      this.assignJob(envelope, job);
    }
  }

  private dequeueNext(): DecisionJob | undefined {
    while (this.queue.length > 0) {
      const job = this.queue.shift();
      if (!job) break;
      if (job.settled) continue;
      return job;
    }
    return undefined;
  }

  private assignJob(envelope: WorkerEnvelope, job: DecisionJob): void {
    envelope.busy = true;
    envelope.currentJob = job;
    job.workerId = envelope.id;
    envelope.worker.postMessage(job.request);
  }

  private expireJob(job: DecisionJob, timeoutMs: number): void {
    if (job.settled) return;
    const agentIds = job.request.agents.map((agent) => agent.id);
    this.settle(job, new AgentTimeout(agentIds, timeoutMs));

    if (job.workerId === undefined) return;
    const envelope = this.workers.get(job.workerId);
    if (!envelope || envelope.currentJob !== job) return;

    logger.warn(
      `Decision worker ${envelope.id} missed the ${timeoutMs}ms deadline; replacing it`,
      LogCategory.WORKERS,
    );
    envelope.worker.removeAllListeners();
    envelope.currentJob = undefined;
    this.workers.delete(envelope.id);
    envelope.worker.terminate().catch((error: unknown) => {
      logger.warn(
        `Failed to terminate decision worker ${envelope.id}`,
        LogCategory.WORKERS,
        error instanceof Error ? error.message : String(error),
      );
    });
    this.spawnWorker();
    this.dispatch();
  }

  private settle(
    job: DecisionJob,
    outcome: Error | RelocationIntent[],
  ): void {
    if (job.settled) return;
    job.settled = true;
    if (job.timer) clearTimeout(job.timer);
    if (outcome instanceof Error) {
      job.reject(outcome);
    } else {
      job.resolve(outcome);
    }
  }

  private handleWorkerMessage(
    envelope: WorkerEnvelope,
    message: DecisionWorkerMessage,
  ): void {
    if (message.type === WorkerMessageType.READY) {
      envelope.ready = true;
      logger.debug(`Decision worker ${envelope.id} ready`, LogCategory.WORKERS);
      if (this.isReady()) {
        for (const notify of this.readyWaiters.splice(0)) notify();
      }
      this.dispatch();
      return;
    }
    if (message.type !== WorkerMessageType.RESULT) return;

    const job = envelope.currentJob;
    envelope.currentJob = undefined;
    envelope.busy = false;
    this.dispatch();

    if (!job || job.request.requestId !== message.requestId) return;

    if (message.ok && message.intents) {
      this.settle(job, message.intents);
    } else {
      this.settle(
        job,
        new Error(
          message.error ??
            `Decision worker ${envelope.id} failed for request ${message.requestId}`,
        ),
      );
    }
  }
}
