/**
 * Margin ledger client backed by an ethers contract.
 *
 * Reads are idempotent, so transient RPC failures are retried.
 */

import { ethers } from "ethers";
import { MARGIN_LEDGER_ABI } from "./contracts.js";
import { withRetry } from "../utils/retry.js";
import type { Logger } from "../utils/logger.js";
import type { MarginLedger } from "../types/ledger.js";
import type { AccountInfo } from "../types/order.js";

export interface LedgerClientOptions {
  runner: ethers.ContractRunner;
  ledgerAddress: string;
  logger: Logger;
  maxRetries?: number;
  baseDelayMs?: number;
}

export class LedgerClient implements MarginLedger {
  private contract: ethers.Contract;
  private logger: Logger;
  private maxRetries: number;
  private baseDelayMs: number;

  constructor(opts: LedgerClientOptions) {
    this.contract = new ethers.Contract(opts.ledgerAddress, MARGIN_LEDGER_ABI, opts.runner);
    this.logger = opts.logger;
    this.maxRetries = opts.maxRetries ?? 2;
    this.baseDelayMs = opts.baseDelayMs ?? 500;
  }

  async getMarketPrice(marketId: bigint): Promise<bigint> {
    const price: ethers.Result = await this.read("getMarketPrice", () =>
      this.contract.getMarketPrice(marketId)
    );
    return ethers.getBigInt(price[0]);
  }

  /**
   * The ledger returns (sign, magnitude); fold it into a signed bigint.
   */
  async getAccountWei(account: AccountInfo, marketId: bigint): Promise<bigint> {
    const wei: ethers.Result = await this.read("getAccountWei", () =>
      this.contract.getAccountWei([account.owner, account.number], marketId)
    );
    const value = ethers.getBigInt(wei[1]);
    return wei[0] ? value : -value;
  }

  private read<T>(label: string, fn: () => Promise<T>): Promise<T> {
    this.logger.debug({ label }, "Ledger read");
    return withRetry(fn, {
      maxRetries: this.maxRetries,
      baseDelayMs: this.baseDelayMs,
      logger: this.logger,
      label,
    });
  }
}
