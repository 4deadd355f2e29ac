import { AccountState, Coin, SimAccount } from '../../shared/schema';
import { normalizeCoins } from '../ledger/coins';
import { AccountNotFoundError, InsufficientFundsError } from '../ledger/errors';
import { AccountKeeper } from '../ledger/state';
import { findAccount } from './accounts';
import { perm, Rand, randPositiveInt } from './rand';

export interface ResolvedAccount {
  simAccount: SimAccount;
  account: AccountState;
  spendable: Coin[];
}

/**
 * Looks up the acting address among the harness accounts (for its key) and
 * in the keeper (for number, sequence and balance at `blockTime`).
 */
export function resolveAccount(
  ak: AccountKeeper,
  accs: readonly SimAccount[],
  address: string,
  blockTime: string,
): ResolvedAccount {
  const simAccount = findAccount(accs, address);
  if (!simAccount) {
    throw new AccountNotFoundError(address);
  }
  const account = ak.getAccount(address);
  if (!account) {
    throw new AccountNotFoundError(address);
  }
  return { simAccount, account, spendable: ak.spendableCoins(address, blockTime) };
}

/**
 * A single-denom fee in [1, balance] drawn from a randomly ordered pass over
 * the spendable coins; the first non-zero coin is used.
 */
export function randomFees(r: Rand, spendable: Coin[]): Coin[] {
  const coins = normalizeCoins(spendable);
  if (coins.length === 0) {
    throw new InsufficientFundsError('no coins found for random fees');
  }

  let chosen: Coin | undefined;
  for (const index of perm(r, coins.length)) {
    if (coins[index].amount > 0) {
      chosen = coins[index];
      break;
    }
  }
  if (!chosen) {
    throw new InsufficientFundsError('no coins found for random fees');
  }

  return [{ denom: chosen.denom, amount: randPositiveInt(r, chosen.amount) }];
}
