import type { AgentProfile } from "@swapdesk/types";
import type { AgentDirectory } from "../src/recommendation.js";

export const LILONGWE = { lat: -13.9626, lng: 33.7741 };

export function makeAgent(id: string, overrides: Partial<AgentProfile> = {}): AgentProfile {
  return {
    id,
    displayName: `Agent ${id}`,
    phone: "0991000000",
    paymentDetails: { mpambaNumber: "0881000000" },
    verified: true,
    online: true,
    dailyCapacity: 20,
    swapsToday: 0,
    capacityDay: "2026-03-01",
    responseTimeSumSeconds: 0,
    responseTimeCount: 0,
    swapAttempts: 0,
    completedSwaps: 0,
    disputeCount: 0,
    ratingSum: 0,
    ratingCount: 0,
    joinedAt: "2026-01-01T00:00:00.000Z",
    version: 1,
    ...overrides,
  };
}

export function makeDirectory(
  agents: readonly AgentProfile[],
  active: Readonly<Record<string, number>> = {},
): AgentDirectory {
  return {
    listAgents: () => agents,
    countActiveSwaps: (agentId) => active[agentId] ?? 0,
  };
}
