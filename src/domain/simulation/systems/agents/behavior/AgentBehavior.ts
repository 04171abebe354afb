import type { Agent } from "@/domain/types/simulation/agents";

/**
 * One per-species turn step. May move the agent by at most one cell, except
 * for a queued dash, and may eat, hunt, hide or deposit.
 */
export interface AgentBehavior {
  takeTurn(agent: Agent): Promise<void>;
}
