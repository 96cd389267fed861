export type LedgerTransaction = {
  hash: string;
  from: string;
  to: string | null; // null for contract creation
  input: string;
  value: bigint;
};

export type LedgerBlock = {
  number: number;
  timestamp: number; // unix seconds
  transactions: LedgerTransaction[];
};

/**
 * Read-only view of a chain. Implementations own transport, retries and
 * timeouts; callers treat a rejected or null block as an empty block.
 */
export interface LedgerPort {
  latestBlockNumber(): Promise<number>;
  blockByNumber(n: number): Promise<LedgerBlock | null>;
  contractRead(contract: string, data: string): Promise<string | null>;
}
