/**
 * @swapdesk/event-ledger: In-memory LedgerStore.
 *
 * Used by tests and short-lived processes. Nothing survives a restart.
 */

import type { LedgerBlock, LedgerEvent, LedgerStore } from "./types.js";
import { LedgerError } from "./types.js";

export class InMemoryLedgerStore implements LedgerStore {
  private readonly _blocks: LedgerBlock[];

  /**
   * @param seedBlocks - Pre-existing chain, e.g. a tampered copy under test
   */
  constructor(seedBlocks: readonly LedgerBlock[] = []) {
    this._blocks = [...seedBlocks];
  }

  loadBlocks(): readonly LedgerBlock[] {
    return [...this._blocks];
  }

  appendBlock(block: LedgerBlock): void {
    this._blocks.push(block);
  }

  appendEvents(blockIndex: number, events: readonly LedgerEvent[]): void {
    const block = this._openBlock(blockIndex);
    this._blocks[blockIndex] = {
      ...block,
      events: [...block.events, ...events],
    };
  }

  sealBlock(blockIndex: number, sealedAt: string, hash: string): void {
    const block = this._openBlock(blockIndex);
    this._blocks[blockIndex] = { ...block, sealedAt, hash };
  }

  private _openBlock(blockIndex: number): LedgerBlock {
    const block = this._blocks[blockIndex];
    if (block === undefined || block.hash !== null) {
      throw new LedgerError(
        "BLOCK_NOT_OPEN",
        `Block ${blockIndex} is not an open block`,
      );
    }
    return block;
  }
}
