import { readFile } from 'fs/promises';
import { MsgType } from '../../shared/schema';
import { ValidationError } from '../ledger/errors';

export type OperationWeights = Record<MsgType, number>;

export interface SimulationConfig {
  chain_id: string;
  seed: number;
  num_blocks: number;
  block_size: number;
  block_interval_seconds: number;
  genesis_time: string;
  num_accounts: number;
  fee_denom: string;
  min_balance: number;
  max_balance: number;
  vesting_fraction: number;
  genesis_nfts: number;
  weights: OperationWeights;
  stop_on_failure: boolean;
}

export const DEFAULT_OPERATION_WEIGHTS: OperationWeights = {
  [MsgType.MINT_NFT]: 100,
  [MsgType.TRANSFER_NFT]: 100,
  [MsgType.EDIT_NFT_METADATA]: 100,
  [MsgType.BURN_NFT]: 10,
};

export const DEFAULT_SIMULATION_CONFIG: SimulationConfig = {
  chain_id: 'nft-sim',
  seed: 42,
  num_blocks: 50,
  block_size: 20,
  block_interval_seconds: 5,
  genesis_time: '2026-01-01T00:00:00.000Z',
  num_accounts: 10,
  fee_denom: 'stake',
  min_balance: 0,
  max_balance: 1_000_000,
  vesting_fraction: 0.2,
  genesis_nfts: 5,
  weights: { ...DEFAULT_OPERATION_WEIGHTS },
  stop_on_failure: false,
};

export interface RawSimulationConfig {
  chain_id?: string;
  seed?: number;
  num_blocks?: number;
  block_size?: number;
  block_interval_seconds?: number;
  genesis_time?: string;
  num_accounts?: number;
  fee_denom?: string;
  balances?: {
    min?: number;
    max?: number;
  };
  vesting_fraction?: number;
  genesis_nfts?: number;
  weights?: Record<string, number>;
  stop_on_failure?: boolean;
}

const WEIGHT_KEYS = new Map<string, MsgType>([
  ['mint', MsgType.MINT_NFT],
  ['transfer', MsgType.TRANSFER_NFT],
  ['edit_metadata', MsgType.EDIT_NFT_METADATA],
  ['burn', MsgType.BURN_NFT],
]);

function assertNonNegativeInteger(value: number, field: string): void {
  if (!Number.isSafeInteger(value) || value < 0) {
    throw new ValidationError(`${field} must be a non-negative integer`);
  }
}

function mapWeights(source?: Record<string, number>): OperationWeights {
  const weights: OperationWeights = { ...DEFAULT_OPERATION_WEIGHTS };
  if (!source) {
    return weights;
  }

  for (const [key, value] of Object.entries(source)) {
    const msgType = WEIGHT_KEYS.get(key);
    if (!msgType) {
      throw new ValidationError(`unknown operation weight: ${key}`);
    }
    if (typeof value !== 'number') {
      throw new ValidationError(`invalid weight value for ${key}`);
    }
    assertNonNegativeInteger(value, `weights.${key}`);
    weights[msgType] = value;
  }
  return weights;
}

export function validateSimulationConfig(config: SimulationConfig): SimulationConfig {
  if (!config.chain_id) {
    throw new ValidationError('chain_id is required');
  }
  if (!config.fee_denom || !/^[a-z][a-z0-9/]{1,127}$/.test(config.fee_denom)) {
    throw new ValidationError(`invalid fee_denom: ${config.fee_denom}`);
  }
  if (!Number.isSafeInteger(config.seed)) {
    throw new ValidationError('seed must be an integer');
  }
  assertNonNegativeInteger(config.num_blocks, 'num_blocks');
  assertNonNegativeInteger(config.block_size, 'block_size');
  assertNonNegativeInteger(config.block_interval_seconds, 'block_interval_seconds');
  assertNonNegativeInteger(config.num_accounts, 'num_accounts');
  assertNonNegativeInteger(config.min_balance, 'balances.min');
  assertNonNegativeInteger(config.max_balance, 'balances.max');
  assertNonNegativeInteger(config.genesis_nfts, 'genesis_nfts');
  if (config.num_accounts < 1) {
    throw new ValidationError('num_accounts must be at least 1');
  }
  if (config.max_balance < config.min_balance) {
    throw new ValidationError('balances.max must be >= balances.min');
  }
  if (!Number.isFinite(config.vesting_fraction) || config.vesting_fraction < 0 || config.vesting_fraction > 1) {
    throw new ValidationError('vesting_fraction must be between 0 and 1');
  }
  if (Number.isNaN(Date.parse(config.genesis_time))) {
    throw new ValidationError(`invalid genesis_time: ${config.genesis_time}`);
  }
  const totalWeight = Object.values(config.weights).reduce((sum, weight) => sum + weight, 0);
  if (config.block_size > 0 && config.num_blocks > 0 && totalWeight === 0) {
    throw new ValidationError('at least one operation weight must be positive');
  }
  return config;
}

export function parseSimulationConfig(parsed: RawSimulationConfig): SimulationConfig {
  const defaults = DEFAULT_SIMULATION_CONFIG;
  return validateSimulationConfig({
    chain_id: parsed.chain_id ?? defaults.chain_id,
    seed: parsed.seed ?? defaults.seed,
    num_blocks: parsed.num_blocks ?? defaults.num_blocks,
    block_size: parsed.block_size ?? defaults.block_size,
    block_interval_seconds: parsed.block_interval_seconds ?? defaults.block_interval_seconds,
    genesis_time: parsed.genesis_time ?? defaults.genesis_time,
    num_accounts: parsed.num_accounts ?? defaults.num_accounts,
    fee_denom: parsed.fee_denom ?? defaults.fee_denom,
    min_balance: parsed.balances?.min ?? defaults.min_balance,
    max_balance: parsed.balances?.max ?? defaults.max_balance,
    vesting_fraction: parsed.vesting_fraction ?? defaults.vesting_fraction,
    genesis_nfts: parsed.genesis_nfts ?? defaults.genesis_nfts,
    weights: mapWeights(parsed.weights),
    stop_on_failure: parsed.stop_on_failure ?? defaults.stop_on_failure,
  });
}

export async function loadSimulationConfig(filePath: string): Promise<SimulationConfig> {
  let parsed: RawSimulationConfig = {};
  try {
    const raw = await readFile(filePath, 'utf8');
    parsed = JSON.parse(raw) as RawSimulationConfig;
  } catch (error) {
    if (error && typeof error === 'object' && 'code' in error && error.code === 'ENOENT') {
      return { ...DEFAULT_SIMULATION_CONFIG, weights: { ...DEFAULT_OPERATION_WEIGHTS } };
    }
    throw error;
  }

  return parseSimulationConfig(parsed);
}
