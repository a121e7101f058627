/**
 * Swap persistence.
 *
 * Every record carries a `version`. A commit carries the next version of
 * each record it writes; a record is accepted only when the stored
 * version is exactly one behind (absent counts as 0). One stale record
 * rejects the whole commit.
 */

import type {
  AgentProfile,
  ClientProfile,
  Dispute,
  ProofSubmission,
  SwapRequest,
  SwapStatus,
} from "@swapdesk/types";
import { isTerminalStatus } from "@swapdesk/types";
import type { AgentDirectory } from "@swapdesk/matching";
import { SwapError } from "./errors.js";

export interface ChangeSet {
  readonly swaps?: readonly SwapRequest[];
  readonly agents?: readonly AgentProfile[];
  readonly clients?: readonly ClientProfile[];
  readonly proofs?: readonly ProofSubmission[];
  readonly disputes?: readonly Dispute[];
}

export interface SwapFilter {
  readonly clientId?: string;
  readonly agentId?: string;
  readonly status?: SwapStatus;
}

export interface SwapStore {
  getSwap(id: string): SwapRequest | undefined;
  getSwapByReference(reference: string): SwapRequest | undefined;
  listSwaps(filter?: SwapFilter): readonly SwapRequest[];

  getAgent(id: string): AgentProfile | undefined;
  listAgents(): readonly AgentProfile[];

  getClient(id: string): ClientProfile | undefined;
  listClients(): readonly ClientProfile[];

  getProof(id: string): ProofSubmission | undefined;
  listProofs(swapId: string): readonly ProofSubmission[];

  getDispute(id: string): Dispute | undefined;
  listDisputes(swapId?: string): readonly Dispute[];

  /**
   * Apply a change set atomically.
   *
   * 1. Check every record's version; on mismatch throw INVALID_TRANSITION.
   * 2. Run `inCommit`; if it throws, rethrow.
   * 3. Write every record.
   *
   * Nothing is written unless all three steps get that far.
   */
  commit(changes: ChangeSet, inCommit?: () => void): void;
}

type Versioned = { readonly id: string; readonly version: number };

function checkVersions<T extends Versioned>(
  kind: string,
  table: ReadonlyMap<string, T>,
  records: readonly T[] | undefined,
): void {
  for (const record of records ?? []) {
    const stored = table.get(record.id)?.version ?? 0;
    if (stored !== record.version - 1) {
      throw new SwapError(
        "INVALID_TRANSITION",
        `Stale ${kind} '${record.id}': stored version ${stored}, write expects ${record.version - 1}`,
        { kind, id: record.id, storedVersion: stored },
      );
    }
  }
}

function apply<T extends Versioned>(table: Map<string, T>, records: readonly T[] | undefined): void {
  for (const record of records ?? []) {
    table.set(record.id, record);
  }
}

/**
 * Map-backed store. Iteration follows insertion order.
 */
export class InMemorySwapStore implements SwapStore {
  private readonly swaps = new Map<string, SwapRequest>();
  private readonly agents = new Map<string, AgentProfile>();
  private readonly clients = new Map<string, ClientProfile>();
  private readonly proofs = new Map<string, ProofSubmission>();
  private readonly disputes = new Map<string, Dispute>();

  getSwap(id: string): SwapRequest | undefined {
    return this.swaps.get(id);
  }

  getSwapByReference(reference: string): SwapRequest | undefined {
    for (const swap of this.swaps.values()) {
      if (swap.reference === reference) return swap;
    }
    return undefined;
  }

  listSwaps(filter: SwapFilter = {}): readonly SwapRequest[] {
    return [...this.swaps.values()].filter(
      (s) =>
        (filter.clientId === undefined || s.clientId === filter.clientId) &&
        (filter.agentId === undefined || s.agentId === filter.agentId) &&
        (filter.status === undefined || s.status === filter.status),
    );
  }

  getAgent(id: string): AgentProfile | undefined {
    return this.agents.get(id);
  }

  listAgents(): readonly AgentProfile[] {
    return [...this.agents.values()];
  }

  getClient(id: string): ClientProfile | undefined {
    return this.clients.get(id);
  }

  listClients(): readonly ClientProfile[] {
    return [...this.clients.values()];
  }

  getProof(id: string): ProofSubmission | undefined {
    return this.proofs.get(id);
  }

  listProofs(swapId: string): readonly ProofSubmission[] {
    return [...this.proofs.values()].filter((p) => p.swapId === swapId);
  }

  getDispute(id: string): Dispute | undefined {
    return this.disputes.get(id);
  }

  listDisputes(swapId?: string): readonly Dispute[] {
    const all = [...this.disputes.values()];
    return swapId === undefined ? all : all.filter((d) => d.swapId === swapId);
  }

  commit(changes: ChangeSet, inCommit?: () => void): void {
    checkVersions("swap", this.swaps, changes.swaps);
    checkVersions("agent", this.agents, changes.agents);
    checkVersions("client", this.clients, changes.clients);
    checkVersions("proof", this.proofs, changes.proofs);
    checkVersions("dispute", this.disputes, changes.disputes);

    inCommit?.();

    apply(this.swaps, changes.swaps);
    apply(this.agents, changes.agents);
    apply(this.clients, changes.clients);
    apply(this.proofs, changes.proofs);
    apply(this.disputes, changes.disputes);
  }
}

/**
 * AgentDirectory over a SwapStore. Active swaps are those not yet in a
 * terminal state.
 */
export class StoreAgentDirectory implements AgentDirectory {
  constructor(private readonly store: SwapStore) {}

  listAgents(): readonly AgentProfile[] {
    return this.store.listAgents();
  }

  countActiveSwaps(agentId: string): number {
    return this.store
      .listSwaps({ agentId })
      .filter((s) => !isTerminalStatus(s.status)).length;
  }
}
