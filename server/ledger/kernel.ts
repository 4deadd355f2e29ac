import {
  CoinChange,
  DeliverResult,
  LedgerEvent,
  MsgType,
  NftMsg,
  SignedTx,
  TxSignature,
} from '../../shared/schema';
import { normalizeCoins } from './coins';
import { FEE_COLLECTOR_ADDRESS } from './constants';
import { AccountNotFoundError, ExecutionError, SimError, ValidationError } from './errors';
import { hashTx } from './hash';
import { Ledger, LedgerEventDraft } from './ledger';
import { msgSigner, validateBasic } from './messages';
import { addressFromPublicKey, SignDoc, verifySignature } from './signing';
import { LedgerState } from './state';

export interface BlockHeader {
  height: number;
  time: string;
}

export interface LedgerKernelOptions {
  chainId: string;
  block?: () => BlockHeader;
}

type EventChanges = Pick<
  LedgerEventDraft,
  'nfts_minted' | 'nfts_burned' | 'nfts_transferred' | 'nfts_edited'
>;

function eventTypeFor(msgs: NftMsg[]): LedgerEvent['type'] {
  if (msgs.length !== 1) {
    return 'NFT_TX';
  }
  switch (msgs[0].type) {
    case MsgType.MINT_NFT:
      return 'NFT_MINT';
    case MsgType.TRANSFER_NFT:
      return 'NFT_TRANSFER';
    case MsgType.EDIT_NFT_METADATA:
      return 'NFT_EDIT';
    case MsgType.BURN_NFT:
      return 'NFT_BURN';
  }
}

export function formatDeliverLog(error: SimError): string {
  return `${error.code}: ${error.message}`;
}

/**
 * Applies signed transactions to `LedgerState`. A transaction either commits
 * in full (fees, messages, sequences, one ledger event) or leaves state as it
 * found it.
 */
export class LedgerKernel {
  readonly chainId: string;
  private block: () => BlockHeader;

  constructor(
    private ledger: Ledger,
    private state: LedgerState,
    options: LedgerKernelOptions,
  ) {
    this.chainId = options.chainId;
    this.block = options.block ?? (() => ({ height: 0, time: new Date().toISOString() }));
  }

  deliver(tx: SignedTx): DeliverResult {
    const snapshot = this.state.snapshot();

    try {
      const event = this.apply(tx);
      return { ok: true, log: '', event };
    } catch (error) {
      this.state.restore(snapshot);
      if (error instanceof SimError) {
        return { ok: false, log: formatDeliverLog(error) };
      }
      const message = error instanceof Error ? error.message : String(error);
      const wrapped = new ExecutionError(`ledger execution failed: ${message}`, { cause: message });
      return { ok: false, log: formatDeliverLog(wrapped) };
    }
  }

  private apply(tx: SignedTx): LedgerEvent {
    const header = this.block();

    if (tx.chain_id !== this.chainId) {
      throw new ValidationError(`invalid chain-id: expected ${this.chainId}, got ${tx.chain_id}`);
    }
    if (tx.msgs.length === 0) {
      throw new ValidationError('transaction must contain at least one message');
    }
    tx.msgs.forEach((msg) => validateBasic(msg));

    const signers = [...new Set(tx.msgs.map((msg) => msgSigner(msg)))];
    if (tx.signatures.length !== signers.length) {
      throw new ValidationError(
        `wrong number of signatures: expected ${signers.length}, got ${tx.signatures.length}`,
      );
    }
    if (!Number.isSafeInteger(tx.fee.gas) || tx.fee.gas <= 0) {
      throw new ValidationError('gas must be a positive integer');
    }
    const fees = normalizeCoins(tx.fee.amount);

    signers.forEach((signer, index) => this.assertSignature(tx, signer, tx.signatures[index]));

    const coinChanges: CoinChange[] = [];
    if (fees.length > 0) {
      const payer = signers[0];
      this.state.subtractCoins(payer, fees, header.time);
      this.state.addCoins(FEE_COLLECTOR_ADDRESS, fees, true);
      for (const coin of fees) {
        coinChanges.push({ address: payer, denom: coin.denom, delta: -coin.amount, reason: 'FEE' });
        coinChanges.push({ address: FEE_COLLECTOR_ADDRESS, denom: coin.denom, delta: coin.amount, reason: 'FEE' });
      }
    }

    const changes: Required<EventChanges> = {
      nfts_minted: [],
      nfts_burned: [],
      nfts_transferred: [],
      nfts_edited: [],
    };
    for (const msg of tx.msgs) {
      this.applyMsg(msg, changes);
    }

    signers.forEach((signer, index) => {
      this.state.setPublicKey(signer, tx.signatures[index].public_key);
      this.state.incrementSequence(signer);
    });

    return this.ledger.append({
      type: eventTypeFor(tx.msgs),
      timestamp: header.time,
      height: header.height,
      actor_id: signers[0],
      tx_hash: hashTx(tx),
      msg_types: tx.msgs.map((msg) => msg.type),
      ...(changes.nfts_minted.length > 0 ? { nfts_minted: changes.nfts_minted } : {}),
      ...(changes.nfts_burned.length > 0 ? { nfts_burned: changes.nfts_burned } : {}),
      ...(changes.nfts_transferred.length > 0 ? { nfts_transferred: changes.nfts_transferred } : {}),
      ...(changes.nfts_edited.length > 0 ? { nfts_edited: changes.nfts_edited } : {}),
      ...(coinChanges.length > 0 ? { coin_changes: coinChanges } : {}),
    });
  }

  private assertSignature(tx: SignedTx, signer: string, signature: TxSignature): void {
    const account = this.state.getAccount(signer);
    if (!account) {
      throw new AccountNotFoundError(signer);
    }
    if (addressFromPublicKey(signature.public_key) !== signer) {
      throw new ValidationError(`public key does not match signer ${signer}`);
    }
    if (account.public_key && account.public_key !== signature.public_key) {
      throw new ValidationError(`public key mismatch for ${signer}`);
    }
    if (signature.account_number !== account.account_number) {
      throw new ValidationError(
        `invalid account number for ${signer}: expected ${account.account_number}, got ${signature.account_number}`,
      );
    }
    if (signature.sequence !== account.sequence) {
      throw new ValidationError(
        `invalid sequence for ${signer}: expected ${account.sequence}, got ${signature.sequence}`,
      );
    }

    const doc: SignDoc = {
      account_number: signature.account_number,
      chain_id: tx.chain_id,
      fee: tx.fee,
      memo: tx.memo,
      msgs: tx.msgs,
      sequence: signature.sequence,
    };
    if (!verifySignature(doc, signature)) {
      throw new ValidationError(`signature verification failed for ${signer}`);
    }
  }

  private applyMsg(msg: NftMsg, changes: Required<EventChanges>): void {
    switch (msg.type) {
      case MsgType.MINT_NFT: {
        if (this.state.getNft(msg.denom, msg.id)) {
          throw new ExecutionError(`nft ${msg.denom}/${msg.id} already exists`);
        }
        this.state.mintNft({ denom: msg.denom, id: msg.id, owner: msg.recipient, token_uri: msg.token_uri });
        changes.nfts_minted.push({ denom: msg.denom, id: msg.id, owner: msg.recipient });
        return;
      }
      case MsgType.TRANSFER_NFT: {
        this.state.transferNft(msg.denom, msg.id, msg.sender, msg.recipient);
        changes.nfts_transferred.push({ denom: msg.denom, id: msg.id, from: msg.sender, to: msg.recipient });
        return;
      }
      case MsgType.EDIT_NFT_METADATA: {
        this.state.editNftMetadata(msg.denom, msg.id, msg.owner, msg.token_uri);
        changes.nfts_edited.push({ denom: msg.denom, id: msg.id });
        return;
      }
      case MsgType.BURN_NFT: {
        this.state.burnNft(msg.denom, msg.id, msg.owner);
        changes.nfts_burned.push({ denom: msg.denom, id: msg.id });
        return;
      }
    }
  }
}
