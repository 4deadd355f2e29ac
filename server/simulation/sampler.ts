import { NftRef, SimAccount } from '../../shared/schema';
import { NftKeeper } from '../ledger/state';
import { Rand } from './rand';

/**
 * Picks an owner uniformly among those holding at least one NFT, then one of
 * that owner's NFTs uniformly. NFTs with a blank owner are not eligible.
 * `undefined` means no eligible NFT exists.
 */
export function randomNftFromOwner(k: NftKeeper, r: Rand): NftRef | undefined {
  const owners = k.getOwners().filter(
    (owner) =>
      owner.address.trim() !== '' &&
      owner.id_collections.some((collection) => collection.ids.length > 0),
  );
  if (owners.length === 0) {
    return undefined;
  }

  const owner = owners[r.intn(owners.length)];
  const held = owner.id_collections.flatMap((collection) =>
    collection.ids.map((id) => ({ denom: collection.denom, id })),
  );
  const nft = held[r.intn(held.length)];
  return { owner: owner.address, denom: nft.denom, id: nft.id };
}

export interface MintParties {
  sender: SimAccount;
  recipient: SimAccount;
}

/** Sender and recipient drawn independently; they may be the same account. */
export function randomMintParties(r: Rand, accs: readonly SimAccount[]): MintParties | undefined {
  if (accs.length === 0) {
    return undefined;
  }
  const sender = accs[r.intn(accs.length)];
  const recipient = accs[r.intn(accs.length)];
  return { sender, recipient };
}
