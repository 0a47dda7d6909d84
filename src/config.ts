import "dotenv/config";
import { isAddress } from "ethers";
import type { EngineConfig } from "./types/config.js";

function requireEnv(name: string): string {
  const value = process.env[name];
  if (!value) {
    throw new Error(`Missing required environment variable: ${name}`);
  }
  return value;
}

function parseChainId(raw: string): bigint {
  if (!/^[0-9]+$/.test(raw)) {
    throw new Error(`CHAIN_ID must be a decimal integer, got "${raw}"`);
  }
  return BigInt(raw);
}

function checkAddress(value: string, name: string): string {
  if (value && !isAddress(value)) {
    throw new Error(`${name} is not an address: ${value}`);
  }
  return value;
}

export function loadConfig(): EngineConfig {
  return {
    chainId: parseChainId(requireEnv("CHAIN_ID")),
    verifyingContract: checkAddress(requireEnv("VERIFYING_CONTRACT"), "VERIFYING_CONTRACT"),
    ledgerAddress: checkAddress(process.env.LEDGER_ADDRESS ?? "", "LEDGER_ADDRESS"),
    rpcUrl: process.env.RPC_URL ?? "",
    signerPrivateKey: process.env.SIGNER_PRIVATE_KEY ?? "",
    logLevel: process.env.LOG_LEVEL ?? "info",
  };
}

/**
 * Pick a setting the CLI needs only for some commands.
 */
export function requireSetting(value: string, name: string): string {
  if (!value) {
    throw new Error(`Missing required environment variable: ${name}`);
  }
  return value;
}
