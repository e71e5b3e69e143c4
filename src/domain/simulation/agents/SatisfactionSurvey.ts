import type {
  AgentState,
  DecisionSettings,
} from "../../../shared/types/simulation/agents";
import type { GridSnapshot } from "../grid/GridSnapshot";
import { countNeighbors } from "../grid/NeighborhoodOracle";
import { isSatisfied } from "./AgentActor";

/**
 * Share of agents satisfied with their neighbourhood in a snapshot.
 * An empty population counts as fully satisfied.
 */
export function measureSatisfaction(
  snapshot: GridSnapshot,
  agents: readonly AgentState[],
  settings: DecisionSettings,
): number {
  if (agents.length === 0) return 1;
  const options = {
    radius: settings.neighborhoodRadius,
    boundary: settings.boundary,
  };
  let satisfied = 0;
  for (const agent of agents) {
    const counts = countNeighbors(snapshot, agent.position, options, agent.group);
    if (isSatisfied(counts, settings.similarityThreshold)) satisfied++;
  }
  return satisfied / agents.length;
}

/**
 * Agents that would ask to move if evaluated against `snapshot`.
 */
export function findUnsatisfied(
  snapshot: GridSnapshot,
  agents: readonly AgentState[],
  settings: DecisionSettings,
): AgentState[] {
  const options = {
    radius: settings.neighborhoodRadius,
    boundary: settings.boundary,
  };
  return agents.filter(
    (agent) =>
      !isSatisfied(
        countNeighbors(snapshot, agent.position, options, agent.group),
        settings.similarityThreshold,
      ),
  );
}
