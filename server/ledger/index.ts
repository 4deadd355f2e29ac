export {
  AccountNotFoundError,
  ExecutionError,
  ExecutionRejectedError,
  InsufficientFundsError,
  SimError,
  ValidationError,
} from './errors';
export { hashObject, hashTx, sha256Hex, stableStringify } from './hash';
export { addCoins, formatCoins, isAllLte, normalizeCoins, safeSubCoins } from './coins';
export { Ledger } from './ledger';
export type { LedgerEventDraft, LedgerIntegrityReport } from './ledger';
export { LedgerKernel, formatDeliverLog } from './kernel';
export type { BlockHeader, LedgerKernelOptions } from './kernel';
export {
  msgSigner,
  newMsgBurnNft,
  newMsgEditNftMetadata,
  newMsgMintNft,
  newMsgTransferNft,
  validateBasic,
} from './messages';
export { LedgerRuntime } from './runtime';
export type { LedgerRuntimeOptions } from './runtime';
export { LedgerState, lockedCoins } from './state';
export type { AccountKeeper, NftKeeper, StateSnapshot } from './state';
export { SimulationFileStore, SIMULATION_CHECKPOINT_VERSION } from './store';
export type { SimulationCheckpoint } from './store';
export {
  addressFromPublicKey,
  buildAndSign,
  keyPairFromSeed,
  signBytes,
  verifySignature,
} from './signing';
export type { SignDoc, SignerKeyPair } from './signing';
export { ADDRESS_PREFIX, DEFAULT_GEN_TX_GAS, FEE_COLLECTOR_ADDRESS, GENESIS_HASH } from './constants';
