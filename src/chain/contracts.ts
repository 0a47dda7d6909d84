/**
 * ABI fragments of the margin ledger the engine reads from.
 */

export const MARGIN_LEDGER_ABI = [
  "function getMarketPrice(uint256 marketId) external view returns (tuple(uint256 value))",
  "function getAccountWei(tuple(address owner, uint256 number) account, uint256 marketId) external view returns (tuple(bool sign, uint256 value))",
] as const;
