export { ChainNode } from "./core/node";
export type { NodeEvents, NodeOptions, FeeEstimate, MempoolInfo, NetworkInfo } from "./core/node";
export { ChainValidator, replayConsensus } from "./core/validator";
export type { AcceptedCandidate, ValidatorRules } from "./core/validator";
export { Ledger, makeGenesis, settleBlock } from "./core/ledger";
export { Mempool } from "./core/mempool";
export { DifficultyController, nextTarget, averageInterval, clampTarget } from "./core/difficulty";
export type { DifficultyParams } from "./core/difficulty";
export { GuardPenalty } from "./core/guard";
export type { GuardParams } from "./core/guard";
export { computeFee, feeAtRate, feeRatePermille, feeSchedule, isValidFee } from "./core/fee";
export type { FeePolicy, FeeStep } from "./core/fee";
export {
  computeBlockHash,
  computeTxId,
  meetsTarget,
  rehashBlock,
  sealBlock,
  withTxId,
  ZERO_HASH,
} from "./core/hash";
export { formatAddress, isValidAddress, readWordlist, Wordlist } from "./core/address";
export { ChainStore, MemoryStore } from "./store/store";
export type { KeyValueStore } from "./store/store";
export { defaultConfig, loadConfig, mergeConfig, UNITS_PER_ZED } from "./config";
export type { ChainConfig, ConfigPatch } from "./config";
export { ConsistencyFault, ConfigError } from "./errors";
export type { ErrorKind, Outcome, Rejection, RejectCode } from "./errors";
export { blockToWire, decodeBlock, decodeTransactionRequest, transactionToWire } from "./schema";
export { makeLogger } from "./logging";
export type * from "./core/types";
export type { Address, BlockHash, TxId, Hex } from "./types/brands";
