/**
 * Error classes for the segregation engine.
 *
 * - `ConfigurationError`: invalid parameters, raised before a run starts.
 * - `InvariantViolation`: internal consistency failure, always fatal.
 * - `AgentTimeout`: agents that missed the round deadline; absorbed by the
 *   coordinator, which substitutes a Stay intent.
 *
 * @module shared/errors/SimulationErrors
 */

import type { AgentId } from "../types/simulation/grid";

export type SimulationErrorCode =
  | "CONFIGURATION_ERROR"
  | "INVARIANT_VIOLATION"
  | "AGENT_TIMEOUT";

/**
 * Base error for the simulation. Carries the last generation that was
 * successfully published when the error surfaced, if known.
 */
export abstract class SimulationError extends Error {
  public readonly timestamp: Date;

  constructor(
    message: string,
    public readonly code: SimulationErrorCode,
    public readonly lastPublishedGeneration?: number,
    options?: { cause?: unknown },
  ) {
    super(message, options);
    this.name = this.constructor.name;
    this.timestamp = new Date();

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, this.constructor);
    }
  }

  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      message: this.message,
      code: this.code,
      lastPublishedGeneration: this.lastPublishedGeneration,
      timestamp: this.timestamp.toISOString(),
    };
  }

  static isSimulationError(error: unknown): error is SimulationError {
    return error instanceof SimulationError;
  }
}

/**
 * Invalid simulation parameters. The run does not start.
 */
export class ConfigurationError extends SimulationError {
  constructor(
    public readonly parameter: string,
    message: string,
  ) {
    super(`Invalid ${parameter}: ${message}`, "CONFIGURATION_ERROR");
  }
}

/**
 * Names of the invariants the grid and the coordinator enforce.
 */
export type InvariantName =
  | "duplicate-target"
  | "duplicate-mover"
  | "stale-position"
  | "target-occupied"
  | "out-of-bounds"
  | "unknown-agent"
  | "empty-cell";

/**
 * Internal consistency failure in the resolver or the grid. Never recoverable.
 */
export class InvariantViolation extends SimulationError {
  constructor(
    public readonly invariant: InvariantName,
    message: string,
    lastPublishedGeneration?: number,
    options?: { cause?: unknown },
  ) {
    super(
      `Invariant violated (${invariant}): ${message}`,
      "INVARIANT_VIOLATION",
      lastPublishedGeneration,
      options,
    );
  }

  /**
   * Copy of this violation stamped with the last published generation.
   */
  atGeneration(generation: number): InvariantViolation {
    const detail = this.message.replace(
      `Invariant violated (${this.invariant}): `,
      "",
    );
    return new InvariantViolation(this.invariant, detail, generation, {
      cause: this,
    });
  }
}

/**
 * One or more agents produced no intent within the collection window.
 */
export class AgentTimeout extends SimulationError {
  constructor(
    public readonly agentIds: readonly AgentId[],
    public readonly deadlineMs: number,
    lastPublishedGeneration?: number,
  ) {
    super(
      `${agentIds.length} agent(s) missed the ${deadlineMs}ms intent deadline`,
      "AGENT_TIMEOUT",
      lastPublishedGeneration,
    );
  }
}
