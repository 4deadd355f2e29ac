import { MsgBurnNft, MsgEditNftMetadata, MsgMintNft, MsgTransferNft, NftRef } from '../../shared/schema';
import {
  newMsgBurnNft,
  newMsgEditNftMetadata,
  newMsgMintNft,
  newMsgTransferNft,
} from '../ledger/messages';
import { MintParties } from './sampler';
import { Rand, randStringOfLength } from './rand';

export const NFT_ID_LENGTH = 10;
export const DENOM_LENGTH = 10;
export const TOKEN_URI_LENGTH = 45;

export function buildTransferMsg(nft: NftRef, recipient: string): MsgTransferNft {
  return newMsgTransferNft(nft.owner, recipient, nft.denom, nft.id);
}

export function buildEditMetadataMsg(r: Rand, nft: NftRef): MsgEditNftMetadata {
  return newMsgEditNftMetadata(nft.owner, nft.id, nft.denom, randStringOfLength(r, TOKEN_URI_LENGTH));
}

// Field order matters: id, then denom, then token URI off the same stream.
export function buildMintMsg(r: Rand, parties: MintParties): MsgMintNft {
  const id = randStringOfLength(r, NFT_ID_LENGTH);
  const denom = randStringOfLength(r, DENOM_LENGTH);
  const tokenUri = randStringOfLength(r, TOKEN_URI_LENGTH);
  return newMsgMintNft(parties.sender.address, parties.recipient.address, id, denom, tokenUri);
}

export function buildBurnMsg(nft: NftRef): MsgBurnNft {
  return newMsgBurnNft(nft.owner, nft.id, nft.denom);
}
