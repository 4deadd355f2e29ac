import { mkdtemp, rm, writeFile } from 'fs/promises';
import { tmpdir } from 'os';
import { join } from 'path';
import { SignedTx } from '../../shared/schema';
import { assert, assertEqual, expectRejects, expectThrows } from '../test-support';
import {
  addressFromPublicKey,
  buildAndSign,
  FEE_COLLECTOR_ADDRESS,
  formatCoins,
  isAllLte,
  keyPairFromSeed,
  Ledger,
  LedgerRuntime,
  lockedCoins,
  newMsgMintNft,
  newMsgTransferNft,
  normalizeCoins,
  safeSubCoins,
  SignerKeyPair,
  SimulationFileStore,
  stableStringify,
} from './index';

const GENESIS_TIME = '2026-01-01T00:00:00.000Z';
const CHAIN_ID = 'sim-chain';

interface TestSigner {
  address: string;
  keys: SignerKeyPair;
}

function makeSigner(fill: number): TestSigner {
  const keys = keyPairFromSeed(new Uint8Array(32).fill(fill));
  return { address: addressFromPublicKey(keys.publicKeyBase64), keys };
}

function makeRuntime(): { runtime: LedgerRuntime; alice: TestSigner; bob: TestSigner } {
  const runtime = new LedgerRuntime(undefined, undefined, { chainId: CHAIN_ID, genesisTime: GENESIS_TIME });
  const alice = makeSigner(1);
  const bob = makeSigner(2);
  runtime.state.createAccount(alice.address, [{ denom: 'stake', amount: 100 }]);
  runtime.state.createAccount(bob.address, [{ denom: 'stake', amount: 100 }]);
  runtime.beginBlock('2026-01-01T00:00:05.000Z');
  return { runtime, alice, bob };
}

function signAs(
  runtime: LedgerRuntime,
  signer: TestSigner,
  msg: SignedTx['msgs'][number],
  fee: number,
  chainId = CHAIN_ID,
): SignedTx {
  const account = runtime.state.getAccount(signer.address);
  assert(account !== undefined, `missing account ${signer.address}`);
  return buildAndSign(
    [msg],
    fee > 0 ? [{ denom: 'stake', amount: fee }] : [],
    chainId,
    [account.account_number],
    [account.sequence],
    [signer.keys],
  );
}

function testCoins() {
  assertEqual(
    normalizeCoins([
      { denom: 'stake', amount: 3 },
      { denom: 'atom', amount: 0 },
      { denom: 'stake', amount: 2 },
    ]),
    [{ denom: 'stake', amount: 5 }],
    'normalizeCoins merges denoms and drops zeros',
  );
  assert(
    safeSubCoins([{ denom: 'stake', amount: 5 }], [{ denom: 'stake', amount: 6 }]) === undefined,
    'safeSubCoins refuses to go negative',
  );
  assertEqual(
    safeSubCoins([{ denom: 'stake', amount: 5 }], [{ denom: 'stake', amount: 5 }]),
    [],
    'safeSubCoins removes exhausted denoms',
  );
  expectThrows(() => normalizeCoins([{ denom: 'stake', amount: 1.5 }]), 'fractional amounts are invalid', 'VALIDATION_ERROR');

  const wallet = [
    { denom: 'stake', amount: 7 },
    { denom: 'atom', amount: 2 },
  ];
  assert(isAllLte([{ denom: 'atom', amount: 2 }], wallet), 'a subset should fit');
  assert(!isAllLte([{ denom: 'photon', amount: 1 }], wallet), 'a missing denom should not fit');
  assert(formatCoins(wallet) === '2atom,7stake', `unexpected format ${formatCoins(wallet)}`);
  assert(formatCoins([]) === '0', 'empty coins format as 0');
  assert(formatCoins([{ denom: 'atom', amount: 0 }]) === '0', 'zero amounts format as 0');
}

function testSignerKeys() {
  const address = makeSigner(9).address;
  assert(address.startsWith('nft1') && address.length === 44, `unexpected address ${address}`);
  assert(
    makeSigner(1).address === makeSigner(1).address && makeSigner(1).address !== makeSigner(2).address,
    'seeded keys should be stable per seed',
  );
  expectThrows(() => keyPairFromSeed(new Uint8Array(16)), 'short seeds should be rejected', 'VALIDATION_ERROR');
}

function testLedgerIntegrity() {
  const ledger = new Ledger();
  ledger.append({ type: 'GENESIS', timestamp: GENESIS_TIME, height: 0, actor_id: 'genesis' });
  ledger.append({ type: 'NFT_TX', timestamp: GENESIS_TIME, height: 1, actor_id: 'someone' });
  assert(ledger.verifyIntegrity().ok, 'fresh ledger should verify');

  const events = ledger.getEvents();
  assert(events[1].prev_hash === events[0].event_hash, 'events should be chained');

  const tampered = new Ledger([events[0], { ...events[1], actor_id: 'mallory' }]);
  const report = tampered.verifyIntegrity();
  assert(!report.ok, 'tampered ledger should fail verification');
  assertEqual(report.errors, [`event ${events[1].id} has invalid event_hash`], 'tamper report should name the event');
}

function testMintAndReplay() {
  const { runtime, alice, bob } = makeRuntime();
  const msg = newMsgMintNft(alice.address, bob.address, 'card001', 'collectible', 'ipfs://card');
  const tx = signAs(runtime, alice, msg, 10);

  const result = runtime.deliver(tx);
  assert(result.ok, `mint should succeed: ${result.log}`);
  assert(result.event?.type === 'NFT_MINT', 'mint should append an NFT_MINT event');
  assertEqual(
    result.event?.nfts_minted,
    [{ denom: 'collectible', id: 'card001', owner: bob.address }],
    'event should record minted nft',
  );
  assertEqual(
    runtime.state.getNft('collectible', 'card001'),
    { denom: 'collectible', id: 'card001', owner: bob.address, token_uri: 'ipfs://card' },
    'minted nft should be owned by recipient',
  );
  assertEqual(runtime.state.getAccount(alice.address)?.coins, [{ denom: 'stake', amount: 90 }], 'fee should be debited');
  assertEqual(
    runtime.state.getAccount(FEE_COLLECTOR_ADDRESS)?.coins,
    [{ denom: 'stake', amount: 10 }],
    'fee should reach the collector',
  );
  assert(runtime.state.getAccount(alice.address)?.sequence === 1, 'sequence should advance');
  assert(
    runtime.state.getAccount(alice.address)?.public_key === alice.keys.publicKeyBase64,
    'public key should be recorded on first tx',
  );

  const replay = runtime.deliver(tx);
  assert(!replay.ok, 'replayed tx should be rejected');
  assert(
    replay.log === `VALIDATION_ERROR: invalid sequence for ${alice.address}: expected 1, got 0`,
    `unexpected replay log: ${replay.log}`,
  );
  assertEqual(runtime.state.getAccount(alice.address)?.coins, [{ denom: 'stake', amount: 90 }], 'replay charges nothing');
  assert(runtime.ledger.size() === 1, 'replay appends no event');

  const duplicate = runtime.deliver(signAs(runtime, alice, msg, 1));
  assert(
    duplicate.log === 'EXECUTION_ERROR: nft collectible/card001 already exists',
    `unexpected duplicate log: ${duplicate.log}`,
  );
  assert(runtime.state.getAccount(alice.address)?.sequence === 1, 'rejected tx leaves sequence alone');
}

function testRejections() {
  const { runtime, alice, bob } = makeRuntime();
  runtime.state.mintNft({ denom: 'collectible', id: '001', owner: alice.address, token_uri: '' });
  const before = stableStringify(runtime.state.snapshot());

  const wrongChain = runtime.deliver(
    signAs(runtime, alice, newMsgTransferNft(alice.address, bob.address, 'collectible', '001'), 1, 'other-chain'),
  );
  assert(
    wrongChain.log === `VALIDATION_ERROR: invalid chain-id: expected ${CHAIN_ID}, got other-chain`,
    `unexpected chain log: ${wrongChain.log}`,
  );

  const signed = signAs(runtime, alice, newMsgTransferNft(alice.address, bob.address, 'collectible', '001'), 1);
  const forged: SignedTx = { ...signed, msgs: [newMsgTransferNft(alice.address, alice.address, 'collectible', '001')] };
  const badSig = runtime.deliver(forged);
  assert(
    badSig.log === `VALIDATION_ERROR: signature verification failed for ${alice.address}`,
    `unexpected signature log: ${badSig.log}`,
  );

  const stolen = runtime.deliver(
    signAs(runtime, bob, newMsgTransferNft(bob.address, bob.address, 'collectible', '001'), 5),
  );
  assert(
    stolen.log === `EXECUTION_ERROR: nft collectible/001 is not owned by ${bob.address}`,
    `unexpected ownership log: ${stolen.log}`,
  );

  const tooRich = runtime.deliver(
    signAs(runtime, alice, newMsgTransferNft(alice.address, bob.address, 'collectible', '001'), 101),
  );
  assert(
    tooRich.log === `INSUFFICIENT_FUNDS: insufficient spendable funds for ${alice.address}`,
    `unexpected fee log: ${tooRich.log}`,
  );

  const blank = runtime.deliver(
    signAs(runtime, alice, newMsgTransferNft(alice.address, bob.address, ' ', '001'), 1),
  );
  assert(blank.log === 'VALIDATION_ERROR: denom cannot be blank', `unexpected validate log: ${blank.log}`);

  assert(stableStringify(runtime.state.snapshot()) === before, 'rejected txs must not change state');
  assert(runtime.ledger.size() === 0, 'rejected txs must not append events');

  const moved = runtime.deliver(
    signAs(runtime, alice, newMsgTransferNft(alice.address, bob.address, 'collectible', '001'), 1),
  );
  assert(moved.ok, `transfer should succeed: ${moved.log}`);
  assert(runtime.state.getNft('collectible', '001')?.owner === bob.address, 'transfer should move ownership');
  assertEqual(
    runtime.state.getOwners().map((owner) => owner.address),
    [bob.address],
    'owner index should follow the transfer',
  );
}

function testVesting() {
  const { runtime } = makeRuntime();
  const vester = makeSigner(3);
  runtime.state.createAccount(vester.address, [{ denom: 'stake', amount: 100 }], {
    original_vesting: [{ denom: 'stake', amount: 100 }],
    start_time: GENESIS_TIME,
    end_time: '2026-01-01T00:01:40.000Z',
  });
  const account = runtime.state.getAccount(vester.address);
  assert(account !== undefined, 'vesting account should exist');

  assertEqual(lockedCoins(account, '2025-12-31T00:00:00.000Z'), [{ denom: 'stake', amount: 100 }], 'all locked before start');
  assertEqual(lockedCoins(account, '2026-01-01T00:00:25.000Z'), [{ denom: 'stake', amount: 75 }], 'linear unlock');
  assertEqual(lockedCoins(account, '2026-01-01T00:01:40.000Z'), [], 'nothing locked at end');
  assertEqual(
    runtime.state.spendableCoins(vester.address, '2026-01-01T00:00:25.000Z'),
    [{ denom: 'stake', amount: 25 }],
    'spendable excludes locked coins',
  );

  runtime.beginBlock('2026-01-01T00:00:25.000Z');
  const over = runtime.deliver(
    signAs(runtime, vester, newMsgMintNft(vester.address, vester.address, 'v1', 'vested', ''), 26),
  );
  assert(!over.ok, 'fee above spendable balance should be rejected');
  const within = runtime.deliver(
    signAs(runtime, vester, newMsgMintNft(vester.address, vester.address, 'v1', 'vested', ''), 25),
  );
  assert(within.ok, `fee within spendable balance should pass: ${within.log}`);
  expectThrows(() => runtime.beginBlock('2026-01-01T00:00:00.000Z'), 'block time cannot go backwards', 'VALIDATION_ERROR');
}

async function testCheckpointStore() {
  const { runtime, alice, bob } = makeRuntime();
  const result = runtime.deliver(
    signAs(runtime, alice, newMsgMintNft(alice.address, bob.address, 'x1', 'stored', 'uri'), 3),
  );
  assert(result.ok, `mint should succeed: ${result.log}`);

  const dir = await mkdtemp(join(tmpdir(), 'nft-sim-'));
  try {
    const store = new SimulationFileStore(join(dir, 'nested', 'checkpoint.json'));
    assert((await store.load()) === null, 'missing checkpoint should load as null');

    await runtime.saveToStore(store);
    const restored = await LedgerRuntime.loadFromStore(store);
    assert(restored !== null, 'checkpoint should load');
    assert(restored.blockHeight() === runtime.blockHeight(), 'height should survive a round trip');
    assert(restored.chainId === CHAIN_ID, 'chain id should survive a round trip');
    assert(
      stableStringify(restored.state.snapshot()) === stableStringify(runtime.state.snapshot()),
      'state should survive a round trip',
    );
    assert(restored.ledger.getLatestHash() === runtime.ledger.getLatestHash(), 'ledger should survive a round trip');

    const next = restored.deliver(
      signAs(restored, alice, newMsgTransferNft(alice.address, bob.address, 'stored', 'x1'), 1),
    );
    assert(
      next.log === `EXECUTION_ERROR: nft stored/x1 is not owned by ${alice.address}`,
      `restored runtime should keep ownership: ${next.log}`,
    );

    const withRun = new SimulationFileStore(join(dir, 'with-run.json'));
    await withRun.save({ ...runtime.createCheckpoint(), run: { seed: 7, report: { operations_run: 3 } } });
    assertEqual((await withRun.load())?.run, { seed: 7, report: { operations_run: 3 } }, 'run record should round trip');

    await expectRejects(
      () => withRun.save({ ...runtime.createCheckpoint(), saved_at: 'yesterday' }),
      'save should reject a bad saved_at',
    );
    await expectRejects(
      () => withRun.save({ ...runtime.createCheckpoint(), block: { height: 0, time: GENESIS_TIME } }),
      'save should reject a ledger that runs past the block height',
    );

    const good = runtime.createCheckpoint();
    const doubled = join(dir, 'doubled.json');
    await writeFile(
      doubled,
      JSON.stringify({ ...good, state: { ...good.state, nfts: [...good.state.nfts, ...good.state.nfts] } }),
      'utf8',
    );
    await expectRejects(() => new SimulationFileStore(doubled).load(), 'duplicate nfts should not load');

    const misfiled = join(dir, 'misfiled.json');
    const accounts = { ...good.state.accounts, nft1elsewhere: good.state.accounts[alice.address] };
    await writeFile(misfiled, JSON.stringify({ ...good, state: { ...good.state, accounts } }), 'utf8');
    await expectRejects(() => new SimulationFileStore(misfiled).load(), 'accounts keyed by another address should not load');

    const future = join(dir, 'future.json');
    await writeFile(future, JSON.stringify({ ...good, version: '9.9.9' }), 'utf8');
    await expectRejects(() => new SimulationFileStore(future).load(), 'unknown versions should not load');
  } finally {
    await rm(dir, { recursive: true, force: true });
  }
}

export async function runLedgerTests(): Promise<void> {
  testCoins();
  testSignerKeys();
  testLedgerIntegrity();
  testMintAndReplay();
  testRejections();
  testVesting();
  await testCheckpointStore();
}
