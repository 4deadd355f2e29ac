import {
  MsgBurnNft,
  MsgEditNftMetadata,
  MsgMintNft,
  MsgTransferNft,
  MsgType,
  NftMsg,
} from '../../shared/schema';
import { ValidationError } from './errors';

export function newMsgTransferNft(sender: string, recipient: string, denom: string, id: string): MsgTransferNft {
  return { type: MsgType.TRANSFER_NFT, sender, recipient, denom, id };
}

export function newMsgEditNftMetadata(owner: string, id: string, denom: string, tokenUri: string): MsgEditNftMetadata {
  return { type: MsgType.EDIT_NFT_METADATA, owner, id, denom, token_uri: tokenUri };
}

export function newMsgMintNft(
  sender: string,
  recipient: string,
  id: string,
  denom: string,
  tokenUri: string,
): MsgMintNft {
  return { type: MsgType.MINT_NFT, sender, recipient, id, denom, token_uri: tokenUri };
}

export function newMsgBurnNft(owner: string, id: string, denom: string): MsgBurnNft {
  return { type: MsgType.BURN_NFT, owner, id, denom };
}

/** The address whose signature authorizes the message. */
export function msgSigner(msg: NftMsg): string {
  switch (msg.type) {
    case MsgType.TRANSFER_NFT:
    case MsgType.MINT_NFT:
      return msg.sender;
    case MsgType.EDIT_NFT_METADATA:
    case MsgType.BURN_NFT:
      return msg.owner;
  }
}

function assertPresent(value: string, field: string): void {
  if (!value || value.trim().length === 0) {
    throw new ValidationError(`${field} cannot be blank`);
  }
}

/**
 * Stateless structural checks. Ownership and uniqueness are enforced by the
 * kernel against current state.
 */
export function validateBasic(msg: NftMsg): void {
  switch (msg.type) {
    case MsgType.TRANSFER_NFT:
      assertPresent(msg.sender, 'sender');
      assertPresent(msg.recipient, 'recipient');
      break;
    case MsgType.MINT_NFT:
      assertPresent(msg.sender, 'sender');
      assertPresent(msg.recipient, 'recipient');
      break;
    case MsgType.EDIT_NFT_METADATA:
    case MsgType.BURN_NFT:
      assertPresent(msg.owner, 'owner');
      break;
    default:
      throw new ValidationError('unsupported message type');
  }
  assertPresent(msg.denom, 'denom');
  assertPresent(msg.id, 'id');
}
