import { AccountState, Coin, DeliverResult, NftMsg, SignedTx, SimAccount } from '../../shared/schema';
import { ExecutionRejectedError } from '../ledger/errors';
import { buildAndSign } from '../ledger/signing';
import { signerKeyOf } from './accounts';

/** The application handle an operation submits into. */
export interface SimApp {
  deliver(tx: SignedTx): DeliverResult;
  blockTime(): string;
}

export type Submission =
  | { ok: true; tx: SignedTx; result: DeliverResult }
  | { ok: false; tx: SignedTx; error: ExecutionRejectedError };

/**
 * Signs `msg` with the acting account's current number and sequence, delivers
 * it and classifies the result. The engine's log is carried verbatim.
 */
export function deliverMsg(
  app: SimApp,
  msg: NftMsg,
  fees: Coin[],
  chainId: string,
  account: AccountState,
  simAccount: SimAccount,
): Submission {
  const tx = buildAndSign(
    [msg],
    fees,
    chainId,
    [account.account_number],
    [account.sequence],
    [signerKeyOf(simAccount)],
  );

  const result = app.deliver(tx);
  if (!result.ok) {
    return { ok: false, tx, error: new ExecutionRejectedError(result.log) };
  }
  return { ok: true, tx, result };
}
