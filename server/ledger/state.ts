import { AccountState, Coin, Nft, Owner } from '../../shared/schema';
import { addCoins, isAllLte, normalizeCoins, safeSubCoins } from './coins';
import { ExecutionError, InsufficientFundsError, ValidationError } from './errors';

export interface StateSnapshot {
  accounts: Record<string, AccountState>;
  nfts: Nft[];
  next_account_number: number;
}

/** Read access to accounts and their spendable balances. */
export interface AccountKeeper {
  getAccount(address: string): AccountState | undefined;
  spendableCoins(address: string, at: string): Coin[];
}

/** Read access to NFT ownership. */
export interface NftKeeper {
  getOwners(): Owner[];
  getNft(denom: string, id: string): Nft | undefined;
}

function clone<T>(value: T): T {
  return JSON.parse(JSON.stringify(value)) as T;
}

function compareStrings(a: string, b: string): number {
  return a < b ? -1 : a > b ? 1 : 0;
}

function parseTime(value: string, field: string): number {
  const ms = Date.parse(value);
  if (Number.isNaN(ms)) {
    throw new ValidationError(`invalid ${field}: ${value}`);
  }
  return ms;
}

/**
 * Coins still locked by a continuous vesting schedule at `at`.
 */
export function lockedCoins(account: AccountState, at: string): Coin[] {
  const vesting = account.vesting;
  if (!vesting) {
    return [];
  }

  const now = parseTime(at, 'block time');
  const start = parseTime(vesting.start_time, 'vesting start_time');
  const end = parseTime(vesting.end_time, 'vesting end_time');
  if (now >= end) {
    return [];
  }
  if (now < start || end <= start) {
    return normalizeCoins(vesting.original_vesting);
  }

  const remaining = (end - now) / (end - start);
  return normalizeCoins(
    vesting.original_vesting.map((coin) => ({
      denom: coin.denom,
      amount: Math.ceil(coin.amount * remaining),
    })),
  );
}

export class LedgerState implements AccountKeeper, NftKeeper {
  private accounts: Map<string, AccountState> = new Map();
  private collections: Map<string, Map<string, Nft>> = new Map();
  private nextAccountNumber = 0;

  constructor(snapshot?: StateSnapshot) {
    if (snapshot) {
      this.restore(snapshot);
    }
  }

  // ---------------------------------------------------------------------------
  // Accounts
  // ---------------------------------------------------------------------------

  getAccount(address: string): AccountState | undefined {
    const account = this.accounts.get(address);
    return account ? clone(account) : undefined;
  }

  listAccounts(): AccountState[] {
    return [...this.accounts.values()]
      .sort((a, b) => a.account_number - b.account_number)
      .map((account) => clone(account));
  }

  createAccount(address: string, coins: Coin[] = [], vesting?: AccountState['vesting']): AccountState {
    if (this.accounts.has(address)) {
      throw new ExecutionError(`account already exists: ${address}`);
    }
    const account: AccountState = {
      address,
      account_number: this.nextAccountNumber,
      sequence: 0,
      coins: normalizeCoins(coins),
      ...(vesting ? { vesting: clone(vesting) } : {}),
    };
    this.nextAccountNumber += 1;
    this.accounts.set(address, account);
    return clone(account);
  }

  setPublicKey(address: string, publicKey: string): void {
    const account = this.requireAccount(address);
    if (account.public_key && account.public_key !== publicKey) {
      throw new ExecutionError(`public key mismatch for ${address}`);
    }
    this.accounts.set(address, { ...account, public_key: publicKey });
  }

  incrementSequence(address: string): number {
    const account = this.requireAccount(address);
    const sequence = account.sequence + 1;
    this.accounts.set(address, { ...account, sequence });
    return sequence;
  }

  spendableCoins(address: string, at: string): Coin[] {
    const account = this.accounts.get(address);
    if (!account) {
      return [];
    }
    const locked = lockedCoins(account, at);
    const spendable = new Map(account.coins.map((coin) => [coin.denom, coin.amount]));
    for (const coin of locked) {
      spendable.set(coin.denom, Math.max(0, (spendable.get(coin.denom) ?? 0) - coin.amount));
    }
    return normalizeCoins([...spendable.entries()].map(([denom, amount]) => ({ denom, amount })));
  }

  addCoins(address: string, coins: Coin[], createIfMissing = false): void {
    const existing = this.accounts.get(address);
    if (!existing) {
      if (!createIfMissing) {
        throw new ExecutionError(`account not found: ${address}`);
      }
      this.createAccount(address, coins);
      return;
    }
    this.accounts.set(address, { ...existing, coins: addCoins(existing.coins, coins) });
  }

  /**
   * Debits `coins` from what the account may spend at `at`; vesting-locked
   * coins are not available.
   */
  subtractCoins(address: string, coins: Coin[], at: string): void {
    const account = this.requireAccount(address);
    if (!isAllLte(coins, this.spendableCoins(address, at))) {
      throw new InsufficientFundsError(`insufficient spendable funds for ${address}`, { coins });
    }
    const remaining = safeSubCoins(account.coins, coins);
    if (!remaining) {
      throw new InsufficientFundsError(`insufficient funds for ${address}`, { coins });
    }
    this.accounts.set(address, { ...account, coins: remaining });
  }

  // ---------------------------------------------------------------------------
  // NFTs
  // ---------------------------------------------------------------------------

  getNft(denom: string, id: string): Nft | undefined {
    const nft = this.collections.get(denom)?.get(id);
    return nft ? { ...nft } : undefined;
  }

  listNfts(): Nft[] {
    const nfts: Nft[] = [];
    for (const denom of [...this.collections.keys()].sort(compareStrings)) {
      const collection = this.collections.get(denom);
      if (!collection) {
        continue;
      }
      for (const id of [...collection.keys()].sort(compareStrings)) {
        const nft = collection.get(id);
        if (nft) {
          nfts.push({ ...nft });
        }
      }
    }
    return nfts;
  }

  listDenoms(): string[] {
    return [...this.collections.keys()].sort(compareStrings);
  }

  /**
   * Owners ordered by address, each with collections ordered by denom and
   * ids ordered within a collection.
   */
  getOwners(): Owner[] {
    const byOwner = new Map<string, Map<string, string[]>>();
    for (const nft of this.listNfts()) {
      const collections = byOwner.get(nft.owner) ?? new Map<string, string[]>();
      const ids = collections.get(nft.denom) ?? [];
      ids.push(nft.id);
      collections.set(nft.denom, ids);
      byOwner.set(nft.owner, collections);
    }

    return [...byOwner.keys()].sort(compareStrings).map((address) => ({
      address,
      id_collections: [...(byOwner.get(address) ?? new Map<string, string[]>()).entries()].map(
        ([denom, ids]) => ({ denom, ids }),
      ),
    }));
  }

  getOwner(address: string): Owner {
    const found = this.getOwners().find((owner) => owner.address === address);
    return found ?? { address, id_collections: [] };
  }

  mintNft(nft: Nft): void {
    const collection = this.collections.get(nft.denom) ?? new Map<string, Nft>();
    if (collection.has(nft.id)) {
      throw new ExecutionError(`nft ${nft.denom}/${nft.id} already exists`);
    }
    collection.set(nft.id, { ...nft });
    this.collections.set(nft.denom, collection);
  }

  transferNft(denom: string, id: string, from: string, to: string): Nft {
    const nft = this.requireOwnedNft(denom, id, from);
    const updated = { ...nft, owner: to };
    this.setNft(updated);
    return updated;
  }

  editNftMetadata(denom: string, id: string, owner: string, tokenUri: string): Nft {
    const nft = this.requireOwnedNft(denom, id, owner);
    const updated = { ...nft, token_uri: tokenUri };
    this.setNft(updated);
    return updated;
  }

  burnNft(denom: string, id: string, owner: string): Nft {
    const nft = this.requireOwnedNft(denom, id, owner);
    const collection = this.collections.get(denom);
    collection?.delete(id);
    if (collection && collection.size === 0) {
      this.collections.delete(denom);
    }
    return nft;
  }

  // ---------------------------------------------------------------------------
  // Snapshots
  // ---------------------------------------------------------------------------

  snapshot(): StateSnapshot {
    const accounts: Record<string, AccountState> = {};
    for (const [address, account] of this.accounts.entries()) {
      accounts[address] = clone(account);
    }
    return {
      accounts,
      nfts: this.listNfts(),
      next_account_number: this.nextAccountNumber,
    };
  }

  restore(snapshot: StateSnapshot): void {
    this.accounts = new Map(Object.entries(clone(snapshot.accounts)));
    this.collections = new Map();
    for (const nft of snapshot.nfts ?? []) {
      this.mintNft(nft);
    }
    this.nextAccountNumber = snapshot.next_account_number ?? this.accounts.size;
  }

  private requireAccount(address: string): AccountState {
    const account = this.accounts.get(address);
    if (!account) {
      throw new ExecutionError(`account not found: ${address}`);
    }
    return account;
  }

  private requireOwnedNft(denom: string, id: string, owner: string): Nft {
    const nft = this.collections.get(denom)?.get(id);
    if (!nft) {
      throw new ExecutionError(`nft ${denom}/${id} not found`);
    }
    if (nft.owner !== owner) {
      throw new ExecutionError(`nft ${denom}/${id} is not owned by ${owner}`);
    }
    return { ...nft };
  }

  private setNft(nft: Nft): void {
    const collection = this.collections.get(nft.denom) ?? new Map<string, Nft>();
    collection.set(nft.id, nft);
    this.collections.set(nft.denom, collection);
  }
}
