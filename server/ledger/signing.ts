import { createPrivateKey, createPublicKey, KeyObject, sign, verify } from 'crypto';
import { Coin, NftMsg, SignedTx, StdFee, TxSignature } from '../../shared/schema';
import { ADDRESS_PREFIX, DEFAULT_GEN_TX_GAS } from './constants';
import { ValidationError } from './errors';
import { sha256Hex, stableStringify } from './hash';

// ASN.1 header of an ed25519 PKCS#8 private key; the 32-byte seed follows.
const ED25519_PKCS8_PREFIX = Buffer.from('302e020100300506032b657004220420', 'hex');

export interface SignerKeyPair {
  publicKeyBase64: string;
  privateKeyBase64: string;
}

function exportKeyPair(privateKey: KeyObject, publicKey: KeyObject): SignerKeyPair {
  const publicDer = publicKey.export({ format: 'der', type: 'spki' });
  const privateDer = privateKey.export({ format: 'der', type: 'pkcs8' });
  return {
    publicKeyBase64: Buffer.from(publicDer).toString('base64'),
    privateKeyBase64: Buffer.from(privateDer).toString('base64'),
  };
}

export function keyPairFromSeed(seed: Uint8Array): SignerKeyPair {
  if (seed.length !== 32) {
    throw new ValidationError('ed25519 seed must be 32 bytes');
  }
  const privateKey = createPrivateKey({
    key: Buffer.concat([ED25519_PKCS8_PREFIX, Buffer.from(seed)]),
    format: 'der',
    type: 'pkcs8',
  });
  return exportKeyPair(privateKey, createPublicKey(privateKey));
}

export function addressFromPublicKey(publicKeyBase64: string): string {
  const digest = sha256Hex(Buffer.from(publicKeyBase64, 'base64'));
  return `${ADDRESS_PREFIX}${digest.slice(0, 40)}`;
}

export interface SignDoc {
  account_number: number;
  chain_id: string;
  fee: StdFee;
  memo: string;
  msgs: NftMsg[];
  sequence: number;
}

export function signBytes(doc: SignDoc): Buffer {
  return Buffer.from(stableStringify(doc));
}

export function verifySignature(doc: SignDoc, signature: TxSignature): boolean {
  const key = createPublicKey({
    key: Buffer.from(signature.public_key, 'base64'),
    format: 'der',
    type: 'spki',
  });
  return verify(null, signBytes(doc), key, Buffer.from(signature.signature, 'base64'));
}

/**
 * Builds a transaction carrying `msgs` and signs it once per key. Every
 * signer signs the same body with its own account number and sequence.
 */
export function buildAndSign(
  msgs: NftMsg[],
  fees: Coin[],
  chainId: string,
  accountNumbers: number[],
  sequences: number[],
  keys: SignerKeyPair[],
): SignedTx {
  if (keys.length !== accountNumbers.length || keys.length !== sequences.length) {
    throw new ValidationError('keys, account numbers and sequences must align');
  }

  const fee: StdFee = { amount: fees, gas: DEFAULT_GEN_TX_GAS };
  const memo = '';

  const signatures = keys.map((key, index): TxSignature => {
    const doc: SignDoc = {
      account_number: accountNumbers[index],
      chain_id: chainId,
      fee,
      memo,
      msgs,
      sequence: sequences[index],
    };
    const privateKey = createPrivateKey({
      key: Buffer.from(key.privateKeyBase64, 'base64'),
      format: 'der',
      type: 'pkcs8',
    });
    return {
      public_key: key.publicKeyBase64,
      account_number: doc.account_number,
      sequence: doc.sequence,
      signature: sign(null, signBytes(doc), privateKey).toString('base64'),
    };
  });

  return { msgs, fee, memo, chain_id: chainId, signatures };
}
