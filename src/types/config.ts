export interface EngineConfig {
  chainId: bigint;
  verifyingContract: string;
  ledgerAddress: string;
  rpcUrl: string;
  signerPrivateKey: string;
  logLevel: string;
}
