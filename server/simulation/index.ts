export { findAccount, randomAcc, randomAccounts, signerKeyOf, simAccountFromKeyPair } from './accounts';
export {
  DEFAULT_OPERATION_WEIGHTS,
  DEFAULT_SIMULATION_CONFIG,
  loadSimulationConfig,
  parseSimulationConfig,
  validateSimulationConfig,
} from './config-loader';
export type { OperationWeights, RawSimulationConfig, SimulationConfig } from './config-loader';
export { randomFees, resolveAccount } from './fees';
export type { ResolvedAccount } from './fees';
export { randomGenesis } from './genesis';
export type { GenesisResult } from './genesis';
export { describeOutcome, emptyStats, runSimulation, selectOperation, weightedOperations } from './harness';
export type {
  FailureRecord,
  OperationStats,
  OperationTally,
  OutcomeSummary,
  SimulationOptions,
  SimulationReport,
  WeightedOperation,
} from './harness';
export {
  buildBurnMsg,
  buildEditMetadataMsg,
  buildMintMsg,
  buildTransferMsg,
  DENOM_LENGTH,
  NFT_ID_LENGTH,
  TOKEN_URI_LENGTH,
} from './messages';
export {
  createOperation,
  MODULE_ROUTE,
  noOp,
  simulateMsgBurnNft,
  simulateMsgEditNftMetadata,
  simulateMsgMintNft,
  simulateMsgTransferNft,
} from './operations';
export type { Operation, OperationOutcome, OperationStrategy } from './operations';
export { perm, pick, randBytes, randIntBetween, randPositiveInt, randStringOfLength, SeededRand } from './rand';
export type { Rand } from './rand';
export { randomMintParties, randomNftFromOwner } from './sampler';
export type { MintParties } from './sampler';
export { deliverMsg } from './submit';
export type { SimApp, Submission } from './submit';
