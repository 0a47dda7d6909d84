import type { AccountInfo } from "./order.js";

/**
 * The margin ledger the engine prices against. Balances are signed Wei
 * amounts; prices are the ledger's oracle values for one unit of a market.
 */
export interface MarginLedger {
  getMarketPrice(marketId: bigint): Promise<bigint>;
  getAccountWei(account: AccountInfo, marketId: bigint): Promise<bigint>;
}
