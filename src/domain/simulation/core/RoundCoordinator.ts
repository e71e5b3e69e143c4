import { EventEmitter } from "node:events";
import { setTimeout as delay } from "node:timers/promises";
import { injectable, inject } from "inversify";
import { TYPES } from "../../../config/Types";
import type { SimulationConfig } from "../../../config/simulationConfig";
import {
  CoordinatorPhase,
  IntentKind,
  SimulationEventType,
  StayReason,
  TerminationReason,
} from "../../../shared/constants/SimulationEnums";
import {
  AgentTimeout,
  InvariantViolation,
} from "../../../shared/errors/SimulationErrors";
import type {
  AgentState,
  DecisionSettings,
  IntentCollection,
  RelocationIntent,
} from "../../../shared/types/simulation/agents";
import type { AgentId } from "../../../shared/types/simulation/grid";
import type {
  PublishedFrame,
  RoundReport,
  SimulationOutcome,
} from "../../../shared/types/simulation/rounds";
import { logger, LogCategory } from "../../../infrastructure/utils/logger";
import { AgentRegistry } from "../agents/AgentRegistry";
import { measureSatisfaction } from "../agents/SatisfactionSurvey";
import { Grid } from "../grid/Grid";
import type { GridSnapshot } from "../grid/GridSnapshot";
import { ConflictResolver } from "../systems/ConflictResolver";
import { TerminationPolicy } from "../systems/TerminationPolicy";
import type { AgentRuntime } from "./runtime/AgentRuntime";

/**
 * Payload of each coordinator event.
 */
export interface CoordinatorEvents {
  [SimulationEventType.SNAPSHOT_PUBLISHED]: PublishedFrame;
  [SimulationEventType.TERMINATED]: SimulationOutcome;
  [SimulationEventType.AGENT_TIMEOUT]: AgentTimeout;
  [SimulationEventType.PHASE_CHANGED]: CoordinatorPhase;
}

export interface RunOptions {
  /** Aborting stops the run at the next round boundary. */
  signal?: AbortSignal;
}

/**
 * Drives the simulation round by round.
 *
 * Each round walks BROADCASTING → COLLECTING_INTENTS → RESOLVING →
 * PUBLISHING: every agent gets the same snapshot, resolution waits until
 * every agent has an intent (missing ones become Stay), the resolver assigns
 * destinations, the grid applies them and the new snapshot is published.
 * The termination policy then decides between another round and TERMINATED.
 *
 * The coordinator is the only writer of grid state. Cancellation is honoured
 * only between rounds.
 *
 * @see ConflictResolver for destination assignment
 * @see TerminationPolicy for stopping conditions
 */
@injectable()
export class RoundCoordinator {
  private readonly emitter = new EventEmitter();
  private readonly registry: AgentRegistry;
  private readonly settings: DecisionSettings;
  private phase = CoordinatorPhase.IDLE;
  private initialized = false;
  private stepping = false;
  private stopRequested = false;
  private readonly stopController = new AbortController();
  private terminationReason?: TerminationReason;
  private satisfactionRatio = 1;
  private lastFrame?: PublishedFrame;

  constructor(
    @inject(TYPES.SimulationConfig) private readonly config: SimulationConfig,
    @inject(TYPES.Grid) private readonly grid: Grid,
    @inject(TYPES.AgentRuntime) private readonly runtime: AgentRuntime,
    @inject(TYPES.ConflictResolver) private readonly resolver: ConflictResolver,
    @inject(TYPES.TerminationPolicy)
    private readonly termination: TerminationPolicy,
  ) {
    this.registry = AgentRegistry.fromSnapshot(grid.snapshot());
    this.settings = {
      similarityThreshold: config.similarityThreshold,
      neighborhoodRadius: config.neighborhoodRadius,
      boundary: config.boundary,
    };
    this.emitter.setMaxListeners(50);
  }

  public on<E extends keyof CoordinatorEvents>(
    event: E,
    listener: (payload: CoordinatorEvents[E]) => void,
  ): void {
    this.emitter.on(event, listener);
  }

  public off<E extends keyof CoordinatorEvents>(
    event: E,
    listener: (payload: CoordinatorEvents[E]) => void,
  ): void {
    this.emitter.off(event, listener);
  }

  private emit<E extends keyof CoordinatorEvents>(
    event: E,
    payload: CoordinatorEvents[E],
  ): void {
    this.emitter.emit(event, payload);
  }

  public getPhase(): CoordinatorPhase {
    return this.phase;
  }

  public getSnapshot(): GridSnapshot {
    return this.grid.snapshot();
  }

  public getGeneration(): number {
    return this.grid.generation;
  }

  public getSatisfactionRatio(): number {
    return this.satisfactionRatio;
  }

  public getLastFrame(): PublishedFrame | undefined {
    return this.lastFrame;
  }

  public getPopulation(): number {
    return this.registry.size;
  }

  public getAgents(): AgentState[] {
    return this.registry.list();
  }

  public getSettings(): Readonly<DecisionSettings> {
    return this.settings;
  }

  public isTerminated(): boolean {
    return this.phase === CoordinatorPhase.TERMINATED;
  }

  public getTerminationReason(): TerminationReason | undefined {
    return this.terminationReason;
  }

  /**
   * Spawns the agents and publishes generation 0. Idempotent.
   */
  public initialize(): void {
    if (this.initialized) return;
    this.initialized = true;

    const snapshot = this.grid.snapshot();
    this.runtime.spawn(this.registry.list());
    this.satisfactionRatio = measureSatisfaction(
      snapshot,
      this.registry.list(),
      this.settings,
    );

    logger.info(
      `🚀 Simulation initialized: ${this.registry.size} agents on ${snapshot.width}x${snapshot.height}, ${this.runtime.mode} runtime`,
      LogCategory.SIMULATION,
    );
    this.publish({
      snapshot,
      generation: snapshot.generation,
      satisfactionRatio: this.satisfactionRatio,
      moves: [],
      requested: 0,
      degraded: 0,
    });
  }

  /**
   * Requests a stop at the next round boundary. A round already in flight
   * completes and is published first.
   */
  public stop(): void {
    if (this.isTerminated()) return;
    this.stopRequested = true;
    this.stopController.abort();
    if (!this.stepping) {
      this.finish(TerminationReason.CANCELLED);
    }
  }

  /**
   * Runs a single round and publishes its snapshot.
   *
   * @throws {InvariantViolation} when the grid rejects the resolved moves;
   * the run is terminated and the error carries the last published generation
   */
  public async step(): Promise<RoundReport> {
    if (this.stepping) {
      throw new Error("A round is already in progress");
    }
    this.initialize();
    if (this.isTerminated()) {
      throw new Error(
        `Simulation already terminated (${this.terminationReason ?? "unknown"})`,
      );
    }

    const snapshot = this.grid.snapshot();
    const lastPublished = snapshot.generation;
    this.stepping = true;

    try {
      this.setPhase(CoordinatorPhase.BROADCASTING);
      const pending = this.runtime.collectIntents(
        snapshot,
        this.config.agentTimeoutMs,
      );

      this.setPhase(CoordinatorPhase.COLLECTING_INTENTS);
      const collection = await pending;
      const { intents, timedOut } = this.closeBarrier(
        collection,
        lastPublished,
      );

      this.setPhase(CoordinatorPhase.RESOLVING);
      const resolution = this.resolver.resolve(intents.values(), snapshot);

      this.setPhase(CoordinatorPhase.PUBLISHING);
      const next = this.grid.apply(resolution.moves);
      this.registry.applyMoves(resolution.moves);
      this.runtime.relocate(resolution.moves);

      let requested = 0;
      for (const intent of intents.values()) {
        if (intent.kind === IntentKind.REQUEST_MOVE) requested++;
      }
      this.satisfactionRatio = measureSatisfaction(
        next,
        this.registry.list(),
        this.settings,
      );

      this.publish({
        snapshot: next,
        generation: next.generation,
        satisfactionRatio: this.satisfactionRatio,
        moves: resolution.moves,
        requested,
        degraded: resolution.degraded.length,
      });

      const termination = this.termination.evaluate({
        generation: next.generation,
        requestedMoves: requested,
        timedOut: timedOut.length,
      });

      logger.debug(
        `Round ${next.generation}: ${requested} requested, ${resolution.moves.length} moved, ${resolution.degraded.length} degraded`,
        LogCategory.SIMULATION,
      );

      if (termination.stop && termination.reason) {
        this.finish(termination.reason);
      } else if (this.stopRequested) {
        this.finish(TerminationReason.CANCELLED);
      }

      return {
        generation: next.generation,
        moves: resolution.moves,
        requested,
        degraded: resolution.degraded,
        timedOut,
        satisfactionRatio: this.satisfactionRatio,
        termination,
      };
    } catch (error) {
      if (error instanceof InvariantViolation) {
        const stamped = error.atGeneration(lastPublished);
        this.fail(stamped);
        throw stamped;
      }
      throw error;
    } finally {
      this.stepping = false;
    }
  }

  /**
   * Runs rounds until the termination policy stops the run or a stop is
   * requested.
   */
  public async run(options: RunOptions = {}): Promise<SimulationOutcome> {
    this.initialize();
    const { signal } = options;
    const onAbort = (): void => this.stop();
    if (signal?.aborted) this.stop();
    signal?.addEventListener("abort", onAbort, { once: true });

    try {
      while (!this.isTerminated()) {
        await this.step();
        if (
          !this.isTerminated() &&
          this.config.roundDelayMs > 0 &&
          !this.stopRequested
        ) {
          await this.pause(this.config.roundDelayMs);
        }
        if (!this.isTerminated() && this.stopRequested) {
          this.finish(TerminationReason.CANCELLED);
        }
      }
    } finally {
      signal?.removeEventListener("abort", onAbort);
    }

    return this.outcome();
  }

  /**
   * Releases the agent runtime (worker threads included).
   */
  public async shutdown(): Promise<void> {
    await this.runtime.destroy();
  }

  /**
   * Waits between rounds; a stop request ends the wait early.
   */
  private async pause(ms: number): Promise<void> {
    try {
      await delay(ms, undefined, { signal: this.stopController.signal });
    } catch (error) {
      if (!(error instanceof Error && error.name === "AbortError")) throw error;
    }
  }

  private outcome(): SimulationOutcome {
    return {
      reason: this.terminationReason ?? TerminationReason.CANCELLED,
      generation: this.grid.generation,
      satisfactionRatio: this.satisfactionRatio,
      snapshot: this.grid.snapshot(),
    };
  }

  /**
   * Completes the round's intents: every registered agent gets exactly one.
   * Agents that did not answer stay in place.
   */
  private closeBarrier(
    collection: IntentCollection,
    lastPublished: number,
  ): { intents: Map<AgentId, RelocationIntent>; timedOut: AgentId[] } {
    const intents = new Map<AgentId, RelocationIntent>();
    const missing: AgentId[] = [];

    for (const agentId of this.registry.ids()) {
      const intent = collection.intents.get(agentId);
      if (intent) {
        intents.set(agentId, intent);
      } else {
        missing.push(agentId);
        intents.set(agentId, {
          kind: IntentKind.STAY,
          agentId,
          reason: StayReason.TIMEOUT,
        });
      }
    }

    if (missing.length > 0) {
      const timeout = new AgentTimeout(
        missing,
        this.config.agentTimeoutMs,
        lastPublished,
      );
      logger.warn(timeout.message, LogCategory.AGENTS, {
        agentIds: missing.slice(0, 20),
        generation: lastPublished,
      });
      this.emit(SimulationEventType.AGENT_TIMEOUT, timeout);
    }

    return { intents, timedOut: missing };
  }

  private publish(frame: PublishedFrame): void {
    this.lastFrame = Object.freeze({
      ...frame,
      moves: Object.freeze(frame.moves.map((move) => Object.freeze({ ...move }))),
    });
    logger.setTick(frame.generation);
    this.emit(SimulationEventType.SNAPSHOT_PUBLISHED, this.lastFrame);
  }

  private setPhase(phase: CoordinatorPhase): void {
    if (this.phase === phase) return;
    this.phase = phase;
    this.emit(SimulationEventType.PHASE_CHANGED, phase);
  }

  private finish(reason: TerminationReason): void {
    if (this.isTerminated()) return;
    this.terminationReason = reason;
    this.setPhase(CoordinatorPhase.TERMINATED);
    logger.info(
      `🏁 Simulation terminated at generation ${this.grid.generation} (${reason}), satisfaction ${(this.satisfactionRatio * 100).toFixed(1)}%`,
      LogCategory.SIMULATION,
    );
    this.emit(SimulationEventType.TERMINATED, this.outcome());
  }

  private fail(error: InvariantViolation): void {
    this.terminationReason = TerminationReason.FAILED;
    this.setPhase(CoordinatorPhase.TERMINATED);
    logger.error(error.message, LogCategory.SIMULATION, error.toJSON());
    this.emit(SimulationEventType.TERMINATED, this.outcome());
  }
}
