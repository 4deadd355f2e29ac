import { SimAccount } from '../../shared/schema';
import { ValidationError } from '../ledger/errors';
import { addressFromPublicKey, keyPairFromSeed, SignerKeyPair } from '../ledger/signing';
import { Rand, randBytes } from './rand';

export function simAccountFromKeyPair(keyPair: SignerKeyPair): SimAccount {
  return {
    address: addressFromPublicKey(keyPair.publicKeyBase64),
    public_key: keyPair.publicKeyBase64,
    private_key: keyPair.privateKeyBase64,
  };
}

export function signerKeyOf(account: SimAccount): SignerKeyPair {
  return { publicKeyBase64: account.public_key, privateKeyBase64: account.private_key };
}

/** `n` accounts whose keys derive from `r`, so a seed reproduces them. */
export function randomAccounts(r: Rand, n: number): SimAccount[] {
  const accounts: SimAccount[] = [];
  for (let i = 0; i < n; i += 1) {
    accounts.push(simAccountFromKeyPair(keyPairFromSeed(randBytes(r, 32))));
  }
  return accounts;
}

export function randomAcc(r: Rand, accs: readonly SimAccount[]): { account: SimAccount; index: number } {
  if (accs.length === 0) {
    throw new ValidationError('no simulation accounts to choose from');
  }
  const index = r.intn(accs.length);
  return { account: accs[index], index };
}

export function findAccount(accs: readonly SimAccount[], address: string): SimAccount | undefined {
  return accs.find((account) => account.address === address);
}
