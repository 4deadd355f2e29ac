import { CoinChange, SimAccount, VestingSchedule } from '../../shared/schema';
import { LedgerRuntime } from '../ledger/runtime';
import { randomAcc, randomAccounts } from './accounts';
import { SimulationConfig } from './config-loader';
import { DENOM_LENGTH, NFT_ID_LENGTH, TOKEN_URI_LENGTH } from './messages';
import { Rand, randStringOfLength } from './rand';

export interface GenesisResult {
  runtime: LedgerRuntime;
  accounts: SimAccount[];
}

type GenesisParams = Pick<
  SimulationConfig,
  | 'chain_id'
  | 'genesis_time'
  | 'num_accounts'
  | 'fee_denom'
  | 'min_balance'
  | 'max_balance'
  | 'vesting_fraction'
  | 'genesis_nfts'
  | 'num_blocks'
  | 'block_interval_seconds'
>;

function randomVesting(r: Rand, params: GenesisParams, balance: number): VestingSchedule {
  const horizon = Math.max(1, params.num_blocks * params.block_interval_seconds);
  const start = Date.parse(params.genesis_time);
  const end = start + (1 + r.intn(horizon)) * 1000;
  return {
    original_vesting: [{ denom: params.fee_denom, amount: 1 + r.intn(balance) }],
    start_time: new Date(start).toISOString(),
    end_time: new Date(end).toISOString(),
  };
}

/**
 * A fresh runtime populated from `r`: funded accounts (some vesting) and a
 * handful of pre-minted NFTs, recorded as one GENESIS ledger event.
 */
export function randomGenesis(r: Rand, params: GenesisParams): GenesisResult {
  const runtime = new LedgerRuntime(undefined, undefined, {
    chainId: params.chain_id,
    genesisTime: params.genesis_time,
  });
  const accounts = randomAccounts(r, params.num_accounts);
  const coinChanges: CoinChange[] = [];

  for (const account of accounts) {
    const balance = params.min_balance + r.intn(params.max_balance - params.min_balance + 1);
    const vesting = balance > 0 && r.next() < params.vesting_fraction
      ? randomVesting(r, params, balance)
      : undefined;
    runtime.state.createAccount(
      account.address,
      balance > 0 ? [{ denom: params.fee_denom, amount: balance }] : [],
      vesting,
    );
    if (balance > 0) {
      coinChanges.push({ address: account.address, denom: params.fee_denom, delta: balance, reason: 'GENESIS' });
    }
  }

  const minted: { denom: string; id: string; owner: string }[] = [];
  for (let i = 0; i < params.genesis_nfts; i += 1) {
    const owner = randomAcc(r, accounts).account.address;
    const denom = randStringOfLength(r, DENOM_LENGTH);
    const id = randStringOfLength(r, NFT_ID_LENGTH);
    const tokenUri = randStringOfLength(r, TOKEN_URI_LENGTH);
    if (runtime.state.getNft(denom, id)) {
      continue;
    }
    runtime.state.mintNft({ denom, id, owner, token_uri: tokenUri });
    minted.push({ denom, id, owner });
  }

  runtime.ledger.append({
    type: 'GENESIS',
    timestamp: runtime.blockTime(),
    height: runtime.blockHeight(),
    actor_id: 'genesis',
    ...(minted.length > 0 ? { nfts_minted: minted } : {}),
    ...(coinChanges.length > 0 ? { coin_changes: coinChanges } : {}),
  });

  return { runtime, accounts };
}
