import { abs } from "./pricing.js";
import { requireThat } from "../utils/errors.js";

function isPositive(value: bigint): boolean {
  return value > 0n;
}

/**
 * Both legs of a decrease-only fill must move the maker's position toward
 * zero. `oldOutputWei` is the ledger balance read before this fill applies;
 * `outputWei` is the signed delta the fill produces.
 */
export function verifyDecreaseOnly(params: {
  orderHash: string;
  oldInputPar: bigint;
  newInputPar: bigint;
  oldOutputWei: bigint;
  outputWei: bigint;
}): void {
  const { orderHash, oldInputPar, newInputPar, oldOutputWei, outputWei } = params;

  requireThat(
    newInputPar === 0n ||
      (abs(newInputPar) <= abs(oldInputPar) &&
        isPositive(newInputPar) === isPositive(oldInputPar)),
    "DecreaseViolation",
    "inputMarket not decreased",
    {
      orderHash,
      details: { oldInputPar: oldInputPar.toString(), newInputPar: newInputPar.toString() },
    }
  );

  requireThat(
    outputWei === 0n ||
      (abs(outputWei) <= abs(oldOutputWei) &&
        isPositive(outputWei) !== isPositive(oldOutputWei)),
    "DecreaseViolation",
    "outputMarket not decreased",
    {
      orderHash,
      details: { oldOutputWei: oldOutputWei.toString(), outputWei: outputWei.toString() },
    }
  );
}
