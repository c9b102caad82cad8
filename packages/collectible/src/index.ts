/**
 * @proofpass/collectible — Transferable collectibles paired from
 * attendance tokens.
 *
 * Provides:
 * - CollectibleTokenRegistry (pairing, transfers, administration)
 * - Fee split computation and payouts
 */

export { CollectibleTokenRegistry } from "./registry.js";

export {
  DEFAULT_FEE_SPLIT,
  FeeDistributor,
  computeFeeDistribution,
  validateFeeSplit,
} from "./fee-distributor.js";
export type { PayoutRecipients } from "./fee-distributor.js";

export type {
  CollectibleToken,
  UpgradeVariant,
  AttendanceRegistryPort,
  FeeSplit,
  FeeDistribution,
  PayoutPurpose,
  PairRequest,
  PairReceipt,
  CanPairReason,
  CanPairResult,
  CollectibleRegistryConfig,
  CollectibleErrorCode,
  CollectibleErrorOptions,
} from "./types.js";
export { CollectibleError } from "./types.js";
