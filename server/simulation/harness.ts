import { MsgType, OutcomeStatus, SimAccount } from '../../shared/schema';
import { ValidationError } from '../ledger/errors';
import { LedgerRuntime } from '../ledger/runtime';
import { AccountKeeper, NftKeeper } from '../ledger/state';
import { OperationWeights } from './config-loader';
import {
  Operation,
  OperationOutcome,
  simulateMsgBurnNft,
  simulateMsgEditNftMetadata,
  simulateMsgMintNft,
  simulateMsgTransferNft,
} from './operations';
import { Rand } from './rand';

export interface WeightedOperation {
  weight: number;
  msg_type: MsgType;
  op: Operation;
}

export interface OperationTally {
  ok: number;
  failed: number;
  noop: number;
}

export type OperationStats = Record<MsgType, OperationTally>;

export interface FailureRecord {
  height: number;
  msg_type: MsgType;
  code: string;
  message: string;
}

export interface SimulationOptions {
  num_blocks: number;
  block_size: number;
  block_interval_seconds: number;
  stop_on_failure?: boolean;
  onOutcome?: (outcome: OperationOutcome, height: number) => void;
}

export interface SimulationReport {
  chain_id: string;
  blocks_run: number;
  operations_run: number;
  final_height: number;
  final_time: string;
  stats: OperationStats;
  failures: FailureRecord[];
  halted: boolean;
}

export function weightedOperations(
  weights: OperationWeights,
  ak: AccountKeeper,
  k: NftKeeper,
): WeightedOperation[] {
  return [
    { weight: weights[MsgType.MINT_NFT], msg_type: MsgType.MINT_NFT, op: simulateMsgMintNft(ak) },
    { weight: weights[MsgType.TRANSFER_NFT], msg_type: MsgType.TRANSFER_NFT, op: simulateMsgTransferNft(ak, k) },
    {
      weight: weights[MsgType.EDIT_NFT_METADATA],
      msg_type: MsgType.EDIT_NFT_METADATA,
      op: simulateMsgEditNftMetadata(ak, k),
    },
    { weight: weights[MsgType.BURN_NFT], msg_type: MsgType.BURN_NFT, op: simulateMsgBurnNft(ak, k) },
  ];
}

export function emptyStats(): OperationStats {
  return {
    [MsgType.MINT_NFT]: { ok: 0, failed: 0, noop: 0 },
    [MsgType.TRANSFER_NFT]: { ok: 0, failed: 0, noop: 0 },
    [MsgType.EDIT_NFT_METADATA]: { ok: 0, failed: 0, noop: 0 },
    [MsgType.BURN_NFT]: { ok: 0, failed: 0, noop: 0 },
  };
}

/** Picks an operation with probability proportional to its weight. */
export function selectOperation(r: Rand, ops: WeightedOperation[]): WeightedOperation {
  const total = ops.reduce((sum, entry) => sum + entry.weight, 0);
  if (total <= 0) {
    throw new ValidationError('no operation has a positive weight');
  }

  let target = r.intn(total);
  for (const entry of ops) {
    if (target < entry.weight) {
      return entry;
    }
    target -= entry.weight;
  }
  return ops[ops.length - 1];
}

function tally(stats: OperationStats, outcome: OperationOutcome): void {
  const entry = stats[outcome.msg_type];
  switch (outcome.status) {
    case OutcomeStatus.SUCCESS:
      entry.ok += 1;
      return;
    case OutcomeStatus.FAILURE:
      entry.failed += 1;
      return;
    case OutcomeStatus.NOOP:
      entry.noop += 1;
      return;
  }
}

/**
 * Runs `num_blocks` blocks of `block_size` weighted operations against one
 * runtime, one operation at a time. Failures are recorded; they halt the run
 * only with `stop_on_failure`.
 */
export function runSimulation(
  r: Rand,
  runtime: LedgerRuntime,
  accounts: readonly SimAccount[],
  ops: WeightedOperation[],
  options: SimulationOptions,
): SimulationReport {
  const stats = emptyStats();
  const failures: FailureRecord[] = [];
  let blocksRun = 0;
  let operationsRun = 0;
  let halted = false;

  for (let block = 0; block < options.num_blocks && !halted; block += 1) {
    const nextTime = Date.parse(runtime.blockTime()) + options.block_interval_seconds * 1000;
    const header = runtime.beginBlock(new Date(nextTime).toISOString());
    blocksRun += 1;

    for (let i = 0; i < options.block_size; i += 1) {
      const selected = selectOperation(r, ops);
      const outcome = selected.op(r, runtime, accounts, runtime.chainId);
      operationsRun += 1;
      tally(stats, outcome);
      options.onOutcome?.(outcome, header.height);

      if (outcome.status === OutcomeStatus.FAILURE) {
        failures.push({
          height: header.height,
          msg_type: outcome.msg_type,
          code: outcome.error.code,
          message: outcome.error.message,
        });
        if (options.stop_on_failure) {
          halted = true;
          break;
        }
      }
    }
  }

  return {
    chain_id: runtime.chainId,
    blocks_run: blocksRun,
    operations_run: operationsRun,
    final_height: runtime.blockHeight(),
    final_time: runtime.blockTime(),
    stats,
    failures,
    halted,
  };
}

export interface OutcomeSummary {
  height: number;
  status: OutcomeStatus;
  route: string;
  msg_type: MsgType;
  tx_hash?: string;
  code?: string;
  log?: string;
}

/** A JSON-safe view of an outcome for logs and reports. */
export function describeOutcome(outcome: OperationOutcome, height: number): OutcomeSummary {
  const base = { height, status: outcome.status, route: outcome.route, msg_type: outcome.msg_type };
  switch (outcome.status) {
    case OutcomeStatus.SUCCESS:
      return { ...base, tx_hash: outcome.tx_hash };
    case OutcomeStatus.FAILURE:
      return { ...base, code: outcome.error.code, log: outcome.error.message };
    case OutcomeStatus.NOOP:
      return base;
  }
}
