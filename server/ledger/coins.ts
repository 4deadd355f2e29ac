import { Coin } from '../../shared/schema';
import { ValidationError } from './errors';

function assertAmount(coin: Coin): void {
  if (!Number.isSafeInteger(coin.amount) || coin.amount < 0) {
    throw new ValidationError(`invalid coin amount: ${coin.amount}${coin.denom}`);
  }
  if (!coin.denom) {
    throw new ValidationError('coin denom is required');
  }
}

/**
 * Merges duplicate denoms, drops zero amounts and sorts by denom.
 */
export function normalizeCoins(coins: Coin[]): Coin[] {
  const totals = new Map<string, number>();
  for (const coin of coins) {
    assertAmount(coin);
    totals.set(coin.denom, (totals.get(coin.denom) ?? 0) + coin.amount);
  }
  return [...totals.entries()]
    .filter(([, amount]) => amount > 0)
    .sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0))
    .map(([denom, amount]) => ({ denom, amount }));
}

export function addCoins(a: Coin[], b: Coin[]): Coin[] {
  return normalizeCoins([...a, ...b]);
}

/**
 * Returns `a - b`, or `undefined` when any denom would go negative.
 */
export function safeSubCoins(a: Coin[], b: Coin[]): Coin[] | undefined {
  const result = new Map(normalizeCoins(a).map((coin) => [coin.denom, coin.amount]));
  for (const coin of normalizeCoins(b)) {
    const next = (result.get(coin.denom) ?? 0) - coin.amount;
    if (next < 0) {
      return undefined;
    }
    result.set(coin.denom, next);
  }
  return normalizeCoins([...result.entries()].map(([denom, amount]) => ({ denom, amount })));
}

export function isAllLte(a: Coin[], b: Coin[]): boolean {
  return safeSubCoins(b, a) !== undefined;
}

export function formatCoins(coins: Coin[]): string {
  const normalized = normalizeCoins(coins);
  if (normalized.length === 0) {
    return '0';
  }
  return normalized.map((coin) => `${coin.amount}${coin.denom}`).join(',');
}
