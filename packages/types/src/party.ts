/**
 * Party Types
 *
 * Clients request swaps; agents fulfil them with their own funds.
 * Agent profiles carry the raw performance counters that trust
 * scoring and recommendation read. Derived values (average response
 * time, completion rate, trust score) are computed, never stored.
 */

/**
 * A geographic position with the free-text address it was taken from.
 */
export interface GeoLocation {
  readonly lat: number;
  readonly lng: number;
  readonly address: string;
}

/**
 * Where a client should send money when paying an agent.
 */
export interface PaymentDetails {
  readonly bankName?: string;
  readonly bankAccount?: string;
  readonly mpambaNumber?: string;
  readonly airtelNumber?: string;
}

export interface ClientProfile {
  readonly id: string;
  readonly displayName: string;
  readonly phone: string;
  readonly email?: string;
  readonly location?: GeoLocation;

  /** Optimistic concurrency version (1 on creation) */
  readonly version: number;
}

export interface AgentProfile {
  readonly id: string;
  readonly displayName: string;
  readonly phone: string;
  readonly email?: string;
  readonly location?: GeoLocation;
  readonly paymentDetails: PaymentDetails;

  /** KYC verification flag */
  readonly verified: boolean;

  /** Whether the agent is currently taking swaps */
  readonly online: boolean;

  /** Maximum swaps the agent accepts per UTC day */
  readonly dailyCapacity: number;

  /** Swaps accepted on `capacityDay` */
  readonly swapsToday: number;

  /** UTC day (YYYY-MM-DD) that `swapsToday` counts */
  readonly capacityDay: string;

  /** Sum of accept latencies in seconds */
  readonly responseTimeSumSeconds: number;
  readonly responseTimeCount: number;

  /** Swaps the agent accepted (denominator of completion rate) */
  readonly swapAttempts: number;
  readonly completedSwaps: number;
  readonly disputeCount: number;

  readonly ratingSum: number;
  readonly ratingCount: number;

  /** ISO 8601 timestamp */
  readonly joinedAt: string;

  /** Optimistic concurrency version (1 on creation) */
  readonly version: number;
}
