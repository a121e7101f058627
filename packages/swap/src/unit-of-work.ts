/**
 * Staging area for one swap operation.
 *
 * Records are staged with their next version, ledger events are prepared
 * but not appended, and notifications are queued. The lifecycle commits
 * everything at once at the end of the operation.
 */

import type {
  AgentProfile,
  ClientProfile,
  Dispute,
  ProofSubmission,
  SwapRequest,
} from "@swapdesk/types";
import type { PreparedEvent } from "@swapdesk/event-ledger";
import type { Notification } from "./notifications.js";
import type { ChangeSet } from "./store.js";

type Versioned = { readonly id: string; readonly version: number };

export type SwapAction =
  | "create"
  | "accept"
  | "reject"
  | "cancel"
  | "client_proof"
  | "agent_proof"
  | "complete"
  | "dispute"
  | "resolve"
  | "expire"
  | "timeout";

/**
 * One state change of one swap within an operation.
 */
export interface SwapTransition {
  readonly action: SwapAction;
  readonly actor: string;
  readonly previous: SwapRequest | undefined;
  readonly next: SwapRequest;
}

/**
 * Records of one kind touched by an operation. Every record is written
 * at most one version ahead of what the store holds, however many times
 * the operation updates it.
 */
export class Staged<T extends Versioned> {
  private readonly records = new Map<string, T>();

  insert(record: T): T {
    const created = { ...record, version: 1 };
    this.records.set(created.id, created);
    return created;
  }

  update(stored: T, change: (current: T) => Partial<T>): T {
    const staged = this.records.get(stored.id);
    const current = staged ?? stored;
    const next = {
      ...current,
      ...change(current),
      version: staged !== undefined ? staged.version : stored.version + 1,
    };
    this.records.set(next.id, next);
    return next;
  }

  /** The staged record, or the stored one when untouched */
  current(stored: T): T {
    return this.records.get(stored.id) ?? stored;
  }

  values(): T[] {
    return [...this.records.values()];
  }
}

export class UnitOfWork {
  readonly swaps = new Staged<SwapRequest>();
  readonly agents = new Staged<AgentProfile>();
  readonly clients = new Staged<ClientProfile>();
  readonly proofs = new Staged<ProofSubmission>();
  readonly disputes = new Staged<Dispute>();

  readonly events: PreparedEvent[] = [];
  readonly notifications: Notification[] = [];
  readonly transitions: SwapTransition[] = [];

  notify(...notifications: Array<Notification | undefined>): void {
    for (const n of notifications) {
      if (n !== undefined) this.notifications.push(n);
    }
  }

  toChangeSet(): ChangeSet {
    return {
      swaps: this.swaps.values(),
      agents: this.agents.values(),
      clients: this.clients.values(),
      proofs: this.proofs.values(),
      disputes: this.disputes.values(),
    };
  }
}
