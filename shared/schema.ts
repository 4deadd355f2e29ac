/**
 * NFT Simulation: Core Type Definitions
 *
 * These types define the fundamental data structures for:
 * - Coins and accounts (balances, sequences, vesting)
 * - NFTs and their owners
 * - Messages and signed transactions
 * - Ledger (immutable transaction history)
 * - Operation outcomes reported to the simulation harness
 */

// =============================================================================
// ENUMS
// =============================================================================

export enum MsgType {
  TRANSFER_NFT = 'nft/transfer',
  EDIT_NFT_METADATA = 'nft/edit_metadata',
  MINT_NFT = 'nft/mint',
  BURN_NFT = 'nft/burn',
}

export enum OutcomeStatus {
  NOOP = 'NOOP',
  SUCCESS = 'SUCCESS',
  FAILURE = 'FAILURE',
}

// =============================================================================
// ACCOUNTS
// =============================================================================

export interface Coin {
  denom: string;
  amount: number; // non-negative integer
}

/**
 * SimAccount: A key-holding participant known to the harness
 */
export interface SimAccount {
  address: string;
  public_key: string; // base64 spki DER
  private_key: string; // base64 pkcs8 DER
}

export interface VestingSchedule {
  original_vesting: Coin[];
  start_time: string; // ISO8601
  end_time: string;
}

/**
 * AccountState: The ledger-side view of an account
 */
export interface AccountState {
  address: string;
  account_number: number;
  sequence: number;
  coins: Coin[];
  public_key?: string; // set on first signed tx
  vesting?: VestingSchedule;
}

// =============================================================================
// NFTS
// =============================================================================

export interface Nft {
  denom: string;
  id: string;
  owner: string;
  token_uri: string;
}

export interface IdCollection {
  denom: string;
  ids: string[];
}

export interface Owner {
  address: string;
  id_collections: IdCollection[];
}

/**
 * NftRef: A sampled NFT and its owner at sampling time. Never cached.
 */
export interface NftRef {
  owner: string;
  denom: string;
  id: string;
}

// =============================================================================
// MESSAGES
// =============================================================================

export interface MsgTransferNft {
  type: MsgType.TRANSFER_NFT;
  sender: string;
  recipient: string;
  denom: string;
  id: string;
}

export interface MsgEditNftMetadata {
  type: MsgType.EDIT_NFT_METADATA;
  owner: string;
  id: string;
  denom: string;
  token_uri: string;
}

export interface MsgMintNft {
  type: MsgType.MINT_NFT;
  sender: string;
  recipient: string;
  id: string;
  denom: string;
  token_uri: string;
}

export interface MsgBurnNft {
  type: MsgType.BURN_NFT;
  owner: string;
  id: string;
  denom: string;
}

export type NftMsg = MsgTransferNft | MsgEditNftMetadata | MsgMintNft | MsgBurnNft;

// =============================================================================
// TRANSACTIONS
// =============================================================================

export interface StdFee {
  amount: Coin[];
  gas: number;
}

export interface TxSignature {
  public_key: string;
  account_number: number;
  sequence: number;
  signature: string; // base64 ed25519
}

export interface SignedTx {
  msgs: NftMsg[];
  fee: StdFee;
  memo: string;
  chain_id: string;
  signatures: TxSignature[];
}

export interface DeliverResult {
  ok: boolean;
  log: string;
  event?: LedgerEvent;
}

// =============================================================================
// LEDGER
// =============================================================================

export interface LedgerEvent {
  id: string;
  type: 'NFT_MINT' | 'NFT_TRANSFER' | 'NFT_EDIT' | 'NFT_BURN' | 'NFT_TX' | 'GENESIS';
  timestamp: string;
  height: number;

  // What happened
  actor_id: string;
  tx_hash?: string;
  msg_types?: MsgType[];

  // NFT changes
  nfts_minted?: { denom: string; id: string; owner: string }[];
  nfts_burned?: { denom: string; id: string }[];
  nfts_transferred?: { denom: string; id: string; from: string; to: string }[];
  nfts_edited?: { denom: string; id: string }[];

  // Coin changes
  coin_changes?: CoinChange[];

  // Integrity
  prev_hash: string;
  event_hash: string;
}

export interface CoinChange {
  address: string;
  denom: string;
  delta: number;
  reason: string;
}
