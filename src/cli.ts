#!/usr/bin/env node
/**
 * canonical-orders CLI
 *
 * Operator tooling around canonical orders:
 * - hash / sign / verify orders against the configured EIP-712 domain
 * - encode and decode fill payloads
 * - quote a fill at given trade args
 * - read the current trigger price from the margin ledger
 *
 * Orders and trade args are given as JSON, inline or as a file path.
 * Put `--` before a negative inputWei so it is not read as an option.
 *
 * Usage:
 *   canonical-orders hash <order>
 *   canonical-orders sign <order> [--type 0|1|2] [--trade-args <json>]
 *   canonical-orders verify <order> <signature>
 *   canonical-orders encode <order> <tradeArgs> [--signature <hex>]
 *   canonical-orders decode <data>
 *   canonical-orders quote <order> <tradeArgs> <inputMarket> <inputWei>
 *   canonical-orders current-price <baseMarket> <quoteMarket>
 */

import { Command } from "commander";
import * as fs from "node:fs";
import { pathToFileURL } from "node:url";
import { ethers } from "ethers";
import { loadConfig, requireSetting } from "./config.js";
import { OrderHasher } from "./engine/typedHash.js";
import { decodeTradeData, encodeTradeData } from "./engine/calldata.js";
import { recoverSigner, sameAddress, SignatureType } from "./engine/signature.js";
import { signOrder } from "./engine/signer.js";
import { getCurrentPrice, quoteFill } from "./engine/pricing.js";
import {
  orderFromJson,
  orderToJson,
  tradeArgsFromJson,
  tradeArgsToJson,
} from "./engine/orderJson.js";
import { LedgerClient } from "./chain/ledger.js";
import { createLogger } from "./utils/logger.js";

export interface CliIo {
  out: (line: string) => void;
}

type GlobalOptions = {
  chainId?: string;
  verifyingContract?: string;
};

function readJson(arg: string): unknown {
  const text = arg.trimStart().startsWith("{") ? arg : fs.readFileSync(arg, "utf8");
  return JSON.parse(text);
}

function printJson(io: CliIo, value: unknown): void {
  io.out(JSON.stringify(value, null, 2));
}

export function buildProgram(io: CliIo = { out: (line) => console.log(line) }): Command {
  const program = new Command();

  program
    .name("canonical-orders")
    .description("Hash, sign, encode and quote canonical orders")
    .version("0.1.0")
    .option("--chain-id <id>", "EIP-712 chain id (defaults to CHAIN_ID)")
    .option("--verifying-contract <address>", "EIP-712 verifying contract (defaults to VERIFYING_CONTRACT)");

  const hasher = (): OrderHasher => {
    const opts = program.opts<GlobalOptions>();
    if (opts.chainId && opts.verifyingContract) {
      return new OrderHasher(BigInt(opts.chainId), opts.verifyingContract);
    }
    const config = loadConfig();
    return new OrderHasher(
      opts.chainId ? BigInt(opts.chainId) : config.chainId,
      opts.verifyingContract ?? config.verifyingContract
    );
  };

  program
    .command("hash")
    .description("Print the EIP-712 hash of an order")
    .argument("<order>", "order JSON or path")
    .action((orderArg: string) => {
      io.out(hasher().hash(orderFromJson(readJson(orderArg))));
    });

  program
    .command("sign")
    .description("Sign an order with SIGNER_PRIVATE_KEY")
    .argument("<order>", "order JSON or path")
    .option("-t, --type <type>", "signature type: 0 none, 1 decimal, 2 hexadecimal", "0")
    .option("--trade-args <tradeArgs>", "also print the full fill payload for these trade args")
    .action(async (orderArg: string, options: { type: string; tradeArgs?: string }) => {
      const config = loadConfig();
      const wallet = new ethers.Wallet(requireSetting(config.signerPrivateKey, "SIGNER_PRIVATE_KEY"));
      const order = orderFromJson(readJson(orderArg));
      const type = Number(options.type);
      if (!(type in SignatureType)) {
        throw new Error(`Unknown signature type: ${options.type}`);
      }
      const signature = await signOrder(order, hasher(), wallet, type);
      if (options.tradeArgs) {
        io.out(encodeTradeData(order, tradeArgsFromJson(readJson(options.tradeArgs)), signature));
      } else {
        io.out(signature);
      }
    });

  program
    .command("verify")
    .description("Check that a typed signature was made by the order's maker")
    .argument("<order>", "order JSON or path")
    .argument("<signature>", "66-byte typed signature (hex)")
    .action((orderArg: string, signature: string) => {
      const order = orderFromJson(readJson(orderArg));
      const signer = recoverSigner(hasher().hash(order), signature);
      printJson(io, { signer, valid: sameAddress(signer, order.makerAccountOwner) });
    });

  program
    .command("encode")
    .description("Encode an order and trade args into a fill payload")
    .argument("<order>", "order JSON or path")
    .argument("<tradeArgs>", "trade args JSON or path")
    .option("-s, --signature <hex>", "typed signature to append")
    .action((orderArg: string, tradeArgsArg: string, options: { signature?: string }) => {
      io.out(
        encodeTradeData(
          orderFromJson(readJson(orderArg)),
          tradeArgsFromJson(readJson(tradeArgsArg)),
          options.signature ?? null
        )
      );
    });

  program
    .command("decode")
    .description("Decode a fill payload")
    .argument("<data>", "hex payload")
    .action((data: string) => {
      const decoded = decodeTradeData(data);
      printJson(io, {
        order: orderToJson(decoded.order),
        tradeArgs: tradeArgsToJson(decoded.tradeArgs),
        signature: decoded.signature,
      });
    });

  program
    .command("quote")
    .description("Price a fill: maker's output amount and the amount counted against the order")
    .argument("<order>", "order JSON or path")
    .argument("<tradeArgs>", "trade args JSON or path")
    .argument("<inputMarket>", "input market id")
    .argument("<inputWei>", "maker's signed change on the input market")
    .action((orderArg: string, tradeArgsArg: string, inputMarket: string, inputWei: string) => {
      const order = orderFromJson(readJson(orderArg));
      const wei = BigInt(inputWei);
      const { outputAmount, fillAmount } = quoteFill(
        order,
        tradeArgsFromJson(readJson(tradeArgsArg)),
        BigInt(inputMarket),
        wei
      );
      printJson(io, {
        outputWei: (wei > 0n ? -outputAmount : outputAmount).toString(),
        fillAmount: fillAmount.toString(),
      });
    });

  program
    .command("current-price")
    .description("Read base/quote price (scaled by 1e18) from the margin ledger")
    .argument("<baseMarket>", "base market id")
    .argument("<quoteMarket>", "quote market id")
    .action(async (baseMarket: string, quoteMarket: string) => {
      const config = loadConfig();
      const provider = new ethers.JsonRpcProvider(requireSetting(config.rpcUrl, "RPC_URL"));
      const ledger = new LedgerClient({
        runner: provider,
        ledgerAddress: requireSetting(config.ledgerAddress, "LEDGER_ADDRESS"),
        logger: createLogger(config.logLevel),
      });
      try {
        const [basePrice, quotePrice] = await Promise.all([
          ledger.getMarketPrice(BigInt(baseMarket)),
          ledger.getMarketPrice(BigInt(quoteMarket)),
        ]);
        io.out(getCurrentPrice(basePrice, quotePrice).toString());
      } finally {
        provider.destroy();
      }
    });

  return program;
}

function isMain(): boolean {
  const entry = process.argv[1];
  if (!entry) return false;
  return import.meta.url === pathToFileURL(fs.realpathSync(entry)).href;
}

if (isMain()) {
  buildProgram()
    .parseAsync(process.argv)
    .catch((err: unknown) => {
      console.error("Error:", err instanceof Error ? err.message : err);
      process.exit(1);
    });
}
