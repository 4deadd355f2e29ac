import { Coin, MsgType, NftMsg, NftRef, OutcomeStatus, SimAccount } from '../../shared/schema';
import { SimError } from '../ledger/errors';
import { hashTx } from '../ledger/hash';
import { AccountKeeper, NftKeeper } from '../ledger/state';
import { randomAcc } from './accounts';
import { randomFees, ResolvedAccount, resolveAccount } from './fees';
import { buildBurnMsg, buildEditMetadataMsg, buildMintMsg, buildTransferMsg } from './messages';
import { Rand } from './rand';
import { MintParties, randomMintParties, randomNftFromOwner } from './sampler';
import { deliverMsg, SimApp } from './submit';

export const MODULE_ROUTE = 'nft';

export type OperationOutcome =
  | { status: OutcomeStatus.NOOP; route: string; msg_type: MsgType }
  | { status: OutcomeStatus.SUCCESS; route: string; msg_type: MsgType; msg: NftMsg; tx_hash: string }
  | { status: OutcomeStatus.FAILURE; route: string; msg_type: MsgType; error: SimError; msg?: NftMsg };

export type Operation = (
  r: Rand,
  app: SimApp,
  accs: readonly SimAccount[],
  chainId: string,
) => OperationOutcome;

/**
 * What varies between operation kinds. `sample` may consume randomness for
 * every subject-selecting choice; `build` consumes it for free-form fields
 * only and runs after the fee has been drawn.
 */
export interface OperationStrategy<S> {
  msgType: MsgType;
  sample(r: Rand, accs: readonly SimAccount[]): S | undefined;
  actor(subject: S): string;
  build(r: Rand, subject: S): NftMsg;
}

export function noOp(msgType: MsgType): OperationOutcome {
  return { status: OutcomeStatus.NOOP, route: MODULE_ROUTE, msg_type: msgType };
}

function failure(msgType: MsgType, error: SimError, msg?: NftMsg): OperationOutcome {
  return {
    status: OutcomeStatus.FAILURE,
    route: MODULE_ROUTE,
    msg_type: msgType,
    error,
    ...(msg ? { msg } : {}),
  };
}

function prepareFees(
  r: Rand,
  ak: AccountKeeper,
  accs: readonly SimAccount[],
  actor: string,
  blockTime: string,
): { resolved: ResolvedAccount; fees: Coin[] } | SimError {
  try {
    const resolved = resolveAccount(ak, accs, actor, blockTime);
    return { resolved, fees: randomFees(r, resolved.spendable) };
  } catch (error) {
    if (error instanceof SimError) {
      return error;
    }
    throw error;
  }
}

/**
 * Sample → resolve account and fee → build → submit. One pass, no retry.
 * Collaborator errors become FAILURE outcomes; anything that is not a
 * `SimError` is a defect and propagates.
 */
export function createOperation<S>(strategy: OperationStrategy<S>, ak: AccountKeeper): Operation {
  return (r, app, accs, chainId) => {
    const subject = strategy.sample(r, accs);
    if (subject === undefined) {
      return noOp(strategy.msgType);
    }

    const prepared = prepareFees(r, ak, accs, strategy.actor(subject), app.blockTime());
    if (prepared instanceof SimError) {
      return failure(strategy.msgType, prepared);
    }

    const msg = strategy.build(r, subject);
    const { resolved, fees } = prepared;
    const submission = deliverMsg(app, msg, fees, chainId, resolved.account, resolved.simAccount);
    if (!submission.ok) {
      return failure(strategy.msgType, submission.error, msg);
    }

    return {
      status: OutcomeStatus.SUCCESS,
      route: MODULE_ROUTE,
      msg_type: strategy.msgType,
      msg,
      tx_hash: hashTx(submission.tx),
    };
  };
}

interface TransferSubject {
  nft: NftRef;
  recipient: SimAccount;
}

export function simulateMsgTransferNft(ak: AccountKeeper, k: NftKeeper): Operation {
  return createOperation<TransferSubject>(
    {
      msgType: MsgType.TRANSFER_NFT,
      sample: (r, accs) => {
        const nft = randomNftFromOwner(k, r);
        if (!nft || accs.length === 0) {
          return undefined;
        }
        return { nft, recipient: randomAcc(r, accs).account };
      },
      actor: (subject) => subject.nft.owner,
      build: (_r, subject) => buildTransferMsg(subject.nft, subject.recipient.address),
    },
    ak,
  );
}

export function simulateMsgEditNftMetadata(ak: AccountKeeper, k: NftKeeper): Operation {
  return createOperation<NftRef>(
    {
      msgType: MsgType.EDIT_NFT_METADATA,
      sample: (r) => randomNftFromOwner(k, r),
      actor: (nft) => nft.owner,
      build: (r, nft) => buildEditMetadataMsg(r, nft),
    },
    ak,
  );
}

export function simulateMsgMintNft(ak: AccountKeeper): Operation {
  return createOperation<MintParties>(
    {
      msgType: MsgType.MINT_NFT,
      sample: (r, accs) => randomMintParties(r, accs),
      actor: (parties) => parties.sender.address,
      build: (r, parties) => buildMintMsg(r, parties),
    },
    ak,
  );
}

export function simulateMsgBurnNft(ak: AccountKeeper, k: NftKeeper): Operation {
  return createOperation<NftRef>(
    {
      msgType: MsgType.BURN_NFT,
      sample: (r) => randomNftFromOwner(k, r),
      actor: (nft) => nft.owner,
      build: (_r, nft) => buildBurnMsg(nft),
    },
    ak,
  );
}
