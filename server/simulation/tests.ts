import { mkdtemp, rm, writeFile } from 'fs/promises';
import { tmpdir } from 'os';
import { join } from 'path';
import { Coin, DeliverResult, MsgType, OutcomeStatus, SignedTx, SimAccount } from '../../shared/schema';
import { keyPairFromSeed } from '../ledger/signing';
import { LedgerRuntime } from '../ledger/runtime';
import { stableStringify } from '../ledger/hash';
import { assert, assertEqual, expectRejects, expectThrows } from '../test-support';
import {
  DEFAULT_SIMULATION_CONFIG,
  describeOutcome,
  loadSimulationConfig,
  OperationOutcome,
  parseSimulationConfig,
  perm,
  pick,
  Rand,
  randIntBetween,
  randomFees,
  randomGenesis,
  randStringOfLength,
  runSimulation,
  SeededRand,
  selectOperation,
  SimApp,
  simAccountFromKeyPair,
  SimulationConfig,
  simulateMsgBurnNft,
  simulateMsgEditNftMetadata,
  simulateMsgMintNft,
  simulateMsgTransferNft,
  WeightedOperation,
  weightedOperations,
} from './index';

const GENESIS_TIME = '2026-01-01T00:00:00.000Z';
const CHAIN_ID = 'sim-chain';

/** Replays a fixed list of draws; `intn` reduces each modulo its bound, 0 once exhausted. */
class ScriptedRand implements Rand {
  private queue: number[];

  constructor(draws: number[]) {
    this.queue = [...draws];
  }

  next(): number {
    return this.intn(1_000_000) / 1_000_000;
  }

  intn(n: number): number {
    const value = this.queue.shift() ?? 0;
    return value % n;
  }
}

class RecordingApp implements SimApp {
  delivered = 0;

  constructor(private runtime: LedgerRuntime) {}

  deliver(tx: SignedTx): DeliverResult {
    this.delivered += 1;
    return this.runtime.deliver(tx);
  }

  blockTime(): string {
    return this.runtime.blockTime();
  }
}

interface Fixture {
  runtime: LedgerRuntime;
  app: RecordingApp;
  alice: SimAccount;
  bob: SimAccount;
  accounts: SimAccount[];
}

function makeFixture(aliceCoins: Coin[], bobCoins: Coin[]): Fixture {
  const runtime = new LedgerRuntime(undefined, undefined, { chainId: CHAIN_ID, genesisTime: GENESIS_TIME });
  const alice = simAccountFromKeyPair(keyPairFromSeed(new Uint8Array(32).fill(1)));
  const bob = simAccountFromKeyPair(keyPairFromSeed(new Uint8Array(32).fill(2)));
  runtime.state.createAccount(alice.address, aliceCoins);
  runtime.state.createAccount(bob.address, bobCoins);
  runtime.beginBlock('2026-01-01T00:00:05.000Z');
  return { runtime, app: new RecordingApp(runtime), alice, bob, accounts: [alice, bob] };
}

function funded(): Fixture {
  return makeFixture([{ denom: 'stake', amount: 100 }], [{ denom: 'stake', amount: 100 }]);
}

function expectStatus<S extends OutcomeStatus>(
  outcome: OperationOutcome,
  status: S,
  message: string,
): asserts outcome is Extract<OperationOutcome, { status: S }> {
  const detail = outcome.status === OutcomeStatus.FAILURE ? ` (${outcome.error.code}: ${outcome.error.message})` : '';
  assert(outcome.status === status, `${message}: got ${outcome.status}${detail}`);
}

function testRandHelpers() {
  assert(randStringOfLength(new ScriptedRand([0, 25, 26, 51]), 4) === 'azAZ', 'letters should span both cases');
  assertEqual(perm(new ScriptedRand([0, 0, 1]), 3), [1, 2, 0], 'perm should follow the insertion shuffle');
  assert(randIntBetween(new ScriptedRand([3]), 10, 15) === 13, 'randIntBetween should offset from min');
  expectThrows(() => randIntBetween(new SeededRand(1), 5, 5), 'empty range should be rejected', 'VALIDATION_ERROR');
  assert(pick(new ScriptedRand([4]), ['x', 'y', 'z']) === 'y', 'pick should index modulo the length');
  assert(pick(new SeededRand(1), []) === undefined, 'pick on nothing is undefined');
  expectThrows(() => new SeededRand(1).intn(0), 'intn(0) should be rejected', 'VALIDATION_ERROR');
  expectThrows(() => new SeededRand(Number.NaN), 'NaN seed should be rejected', 'VALIDATION_ERROR');

  const a = new SeededRand(99);
  const b = new SeededRand(99);
  const drawsA = Array.from({ length: 20 }, () => a.intn(1000));
  const drawsB = Array.from({ length: 20 }, () => b.intn(1000));
  assertEqual(drawsA, drawsB, 'equal seeds should give equal streams');
  assert(drawsA.every((value) => value >= 0 && value < 1000), 'intn should stay in range');
}

function testRandomFees() {
  const r = new SeededRand(11);
  for (let i = 0; i < 200; i += 1) {
    const stake = 1 + r.intn(50);
    const spendable = [
      { denom: 'stake', amount: stake },
      { denom: 'atom', amount: r.intn(3) },
    ];
    const fees = randomFees(r, spendable);
    assert(fees.length === 1, 'fees should carry one denom');
    const available = spendable.find((coin) => coin.denom === fees[0].denom)?.amount ?? 0;
    assert(fees[0].amount >= 1 && fees[0].amount <= available, `fee ${fees[0].amount} exceeds ${available}`);
  }
  expectThrows(() => randomFees(r, []), 'empty balance should not yield fees', 'INSUFFICIENT_FUNDS');
}

function testTransferOperation() {
  const { runtime, app, alice, bob, accounts } = funded();
  runtime.state.mintNft({ denom: 'collectible', id: '001', owner: alice.address, token_uri: 'ipfs://one' });
  const op = simulateMsgTransferNft(runtime.state, runtime.state);

  // owner 0, nft 0, recipient 1, fee perm 0, fee amount 1 + 4
  const outcome = op(new ScriptedRand([0, 0, 1, 0, 4]), app, accounts, CHAIN_ID);
  expectStatus(outcome, OutcomeStatus.SUCCESS, 'transfer should succeed');
  assertEqual(
    outcome.msg,
    { type: MsgType.TRANSFER_NFT, sender: alice.address, recipient: bob.address, denom: 'collectible', id: '001' },
    'transfer message should move the sampled nft',
  );
  assert(outcome.route === 'nft', 'route should be the nft module');
  assert(runtime.state.getNft('collectible', '001')?.owner === bob.address, 'recipient should own the nft');
  assertEqual(runtime.state.getAccount(alice.address)?.coins, [{ denom: 'stake', amount: 95 }], 'fee should be 5');
  assert(runtime.ledger.getEvents()[0].tx_hash === outcome.tx_hash, 'outcome should carry the committed tx hash');
  assert(app.delivered === 1, 'transfer should be delivered once');
}

function testNoOpsWithoutNfts() {
  const { runtime, app, accounts } = funded();
  const ops = [
    simulateMsgTransferNft(runtime.state, runtime.state),
    simulateMsgEditNftMetadata(runtime.state, runtime.state),
    simulateMsgBurnNft(runtime.state, runtime.state),
  ];
  for (const op of ops) {
    const outcome = op(new SeededRand(1), app, accounts, CHAIN_ID);
    expectStatus(outcome, OutcomeStatus.NOOP, 'empty ledger should yield a no-op');
  }
  assert(app.delivered === 0, 'no-ops must not submit');

  const mint = simulateMsgMintNft(runtime.state)(new SeededRand(1), app, [], CHAIN_ID);
  expectStatus(mint, OutcomeStatus.NOOP, 'mint without accounts should be a no-op');
}

function testNoOpsForOwnerlessNfts() {
  const { runtime, app, accounts } = funded();
  runtime.state.mintNft({ denom: 'orphan', id: 'o1', owner: '', token_uri: '' });
  const ops = [
    simulateMsgTransferNft(runtime.state, runtime.state),
    simulateMsgEditNftMetadata(runtime.state, runtime.state),
    simulateMsgBurnNft(runtime.state, runtime.state),
  ];
  for (const op of ops) {
    const outcome = op(new SeededRand(1), app, accounts, CHAIN_ID);
    expectStatus(outcome, OutcomeStatus.NOOP, 'nft without an owner should yield a no-op');
  }
  assert(app.delivered === 0, 'ownerless nfts must not be submitted');
  assert(runtime.state.getNft('orphan', 'o1') !== undefined, 'ownerless nft should be left alone');
}

function testMintLifecycle() {
  const { runtime, app, alice, bob, accounts } = funded();
  const mint = simulateMsgMintNft(runtime.state);
  assert(runtime.state.getNft('aaaaaaaaaa', 'aaaaaaaaaa') === undefined, 'minted pair should not exist beforehand');

  // sender 0, recipient 1, fee perm 0, fee amount 1 + 9; strings draw letter 0
  const first = mint(new ScriptedRand([0, 1, 0, 9]), app, accounts, CHAIN_ID);
  expectStatus(first, OutcomeStatus.SUCCESS, 'mint should succeed');
  assertEqual(
    first.msg,
    {
      type: MsgType.MINT_NFT,
      sender: alice.address,
      recipient: bob.address,
      id: 'aaaaaaaaaa',
      denom: 'aaaaaaaaaa',
      token_uri: 'a'.repeat(45),
    },
    'mint message should draw id, denom and uri',
  );
  assert(runtime.state.getNft('aaaaaaaaaa', 'aaaaaaaaaa')?.owner === bob.address, 'recipient should own the mint');
  assertEqual(runtime.state.getAccount(alice.address)?.coins, [{ denom: 'stake', amount: 90 }], 'fee should be 10');

  const duplicate = mint(new ScriptedRand([0, 1, 0, 9]), app, accounts, CHAIN_ID);
  expectStatus(duplicate, OutcomeStatus.FAILURE, 'duplicate mint should fail');
  assert(duplicate.error.code === 'EXECUTION_REJECTED', `unexpected code ${duplicate.error.code}`);
  assert(
    duplicate.error.message === 'EXECUTION_ERROR: nft aaaaaaaaaa/aaaaaaaaaa already exists',
    `unexpected log ${duplicate.error.message}`,
  );
  assert(duplicate.msg?.type === MsgType.MINT_NFT, 'failure should carry the rejected message');
  assert(runtime.state.getAccount(alice.address)?.sequence === 1, 'rejected mint keeps the sequence');
  assertEqual(runtime.state.getAccount(alice.address)?.coins, [{ denom: 'stake', amount: 90 }], 'rejected mint is free');

  const burn = simulateMsgBurnNft(runtime.state, runtime.state)(new ScriptedRand([]), app, accounts, CHAIN_ID);
  expectStatus(burn, OutcomeStatus.SUCCESS, 'owner burn should succeed');
  assertEqual(
    burn.msg,
    { type: MsgType.BURN_NFT, owner: bob.address, id: 'aaaaaaaaaa', denom: 'aaaaaaaaaa' },
    'burn should target the only nft',
  );
  assert(runtime.state.getNft('aaaaaaaaaa', 'aaaaaaaaaa') === undefined, 'burned nft should be gone');
  assertEqual(runtime.state.getAccount(bob.address)?.coins, [{ denom: 'stake', amount: 99 }], 'burn fee should be 1');
  assert(app.delivered === 3, 'each non-noop attempt should submit once');
}

function testEditOperation() {
  const { runtime, app, alice, accounts } = funded();
  runtime.state.mintNft({ denom: 'collectible', id: '001', owner: alice.address, token_uri: 'ipfs://one' });

  const outcome = simulateMsgEditNftMetadata(runtime.state, runtime.state)(
    new ScriptedRand([]),
    app,
    accounts,
    CHAIN_ID,
  );
  expectStatus(outcome, OutcomeStatus.SUCCESS, 'edit should succeed');
  assert(
    runtime.state.getNft('collectible', '001')?.token_uri === 'a'.repeat(45),
    'edit should replace the token uri',
  );
  assert(runtime.state.getNft('collectible', '001')?.owner === alice.address, 'edit should keep the owner');
}

function testCollaboratorFailures() {
  const broke = makeFixture([{ denom: 'stake', amount: 100 }], []);
  const mint = simulateMsgMintNft(broke.runtime.state)(new ScriptedRand([1, 0]), broke.app, broke.accounts, CHAIN_ID);
  expectStatus(mint, OutcomeStatus.FAILURE, 'sender without coins should fail');
  assert(mint.error.code === 'INSUFFICIENT_FUNDS', `unexpected code ${mint.error.code}`);
  assert(mint.msg === undefined, 'fee failure happens before a message is built');
  assert(broke.app.delivered === 0, 'fee failure must not submit');

  const { runtime, app, accounts } = funded();
  runtime.state.mintNft({ denom: 'collectible', id: '007', owner: 'nft1stranger', token_uri: '' });
  const transfer = simulateMsgTransferNft(runtime.state, runtime.state)(new ScriptedRand([]), app, accounts, CHAIN_ID);
  expectStatus(transfer, OutcomeStatus.FAILURE, 'unknown owner should fail');
  assert(transfer.error.code === 'ACCOUNT_NOT_FOUND', `unexpected code ${transfer.error.code}`);
  assert(transfer.error.message === 'account nft1stranger not found', `unexpected message ${transfer.error.message}`);
  assert(app.delivered === 0, 'unknown owner must not submit');

  assertEqual(
    describeOutcome(transfer, 1),
    {
      height: 1,
      status: OutcomeStatus.FAILURE,
      route: 'nft',
      msg_type: MsgType.TRANSFER_NFT,
      code: 'ACCOUNT_NOT_FOUND',
      log: 'account nft1stranger not found',
    },
    'failure summary should carry code and log',
  );
}

function testSelectOperation() {
  const { runtime } = funded();
  const ops = weightedOperations(DEFAULT_SIMULATION_CONFIG.weights, runtime.state, runtime.state);
  assert(selectOperation(new ScriptedRand([0]), ops).msg_type === MsgType.MINT_NFT, 'draw 0 is mint');
  assert(selectOperation(new ScriptedRand([150]), ops).msg_type === MsgType.TRANSFER_NFT, 'draw 150 is transfer');
  assert(selectOperation(new ScriptedRand([305]), ops).msg_type === MsgType.BURN_NFT, 'draw 305 is burn');
  expectThrows(
    () => selectOperation(new ScriptedRand([]), ops.map((entry) => ({ ...entry, weight: 0 }))),
    'zero total weight should be rejected',
    'VALIDATION_ERROR',
  );
}

function smallConfig(overrides: Partial<SimulationConfig> = {}): SimulationConfig {
  return {
    ...DEFAULT_SIMULATION_CONFIG,
    num_accounts: 4,
    num_blocks: 5,
    block_size: 10,
    max_balance: 1000,
    ...overrides,
  };
}

function runSeeded(config: SimulationConfig) {
  const rng = new SeededRand(config.seed);
  const { runtime, accounts } = randomGenesis(rng, config);
  const violations: string[] = [];
  const ops = weightedOperations(config.weights, runtime.state, runtime.state).map(
    (entry): WeightedOperation => ({
      ...entry,
      op: (r, app, accs, chainId) => {
        const existing = new Set(runtime.state.listNfts().map((nft) => `${nft.denom}/${nft.id}`));
        const outcome = entry.op(r, app, accs, chainId);
        if (
          outcome.status === OutcomeStatus.SUCCESS &&
          outcome.msg.type === MsgType.MINT_NFT &&
          existing.has(`${outcome.msg.denom}/${outcome.msg.id}`)
        ) {
          violations.push(`mint ${outcome.msg.denom}/${outcome.msg.id} already existed`);
        }
        return outcome;
      },
    }),
  );
  const report = runSimulation(
    rng,
    runtime,
    accounts,
    ops,
    {
      num_blocks: config.num_blocks,
      block_size: config.block_size,
      block_interval_seconds: config.block_interval_seconds,
      stop_on_failure: config.stop_on_failure,
      onOutcome: (outcome) => {
        if (outcome.status !== OutcomeStatus.SUCCESS) {
          return;
        }
        const msg = outcome.msg;
        const nft = runtime.state.getNft(msg.denom, msg.id);
        switch (msg.type) {
          case MsgType.MINT_NFT:
          case MsgType.TRANSFER_NFT:
            if (nft?.owner !== msg.recipient) {
              violations.push(`${msg.type} ${msg.denom}/${msg.id} not owned by recipient`);
            }
            return;
          case MsgType.EDIT_NFT_METADATA:
            if (nft?.token_uri !== msg.token_uri) {
              violations.push(`edit ${msg.denom}/${msg.id} not applied`);
            }
            return;
          case MsgType.BURN_NFT:
            if (nft) {
              violations.push(`burn ${msg.denom}/${msg.id} left the nft behind`);
            }
            return;
        }
      },
    },
  );
  return { runtime, accounts, report, violations };
}

function testHarness() {
  const config = smallConfig({ seed: 7 });
  const { runtime, report, violations } = runSeeded(config);

  assert(report.operations_run === 50, `expected 50 operations, got ${report.operations_run}`);
  assert(report.blocks_run === 5 && report.final_height === 5, 'five blocks should run');
  assert(report.final_time === '2026-01-01T00:00:25.000Z', `unexpected final time ${report.final_time}`);
  assert(!report.halted, 'run without stop_on_failure never halts');

  const tallies = Object.values(report.stats);
  const total = tallies.reduce((sum, entry) => sum + entry.ok + entry.failed + entry.noop, 0);
  const committed = tallies.reduce((sum, entry) => sum + entry.ok, 0);
  const failed = tallies.reduce((sum, entry) => sum + entry.failed, 0);
  assert(total === 50, 'every operation should be tallied');
  assert(failed === report.failures.length, 'every failure should be recorded');
  assert(runtime.ledger.size() === 1 + committed, 'one genesis event plus one per committed tx');
  assert(runtime.ledger.verifyIntegrity().ok, 'ledger should verify after a run');
  assertEqual(violations, [], 'committed operations should be reflected in state');

  const again = runSeeded(config);
  assert(stableStringify(again.report) === stableStringify(report), 'equal seeds should give equal reports');
  assert(again.runtime.ledger.getLatestHash() === runtime.ledger.getLatestHash(), 'equal seeds should give equal ledgers');
  assertEqual(
    again.accounts.map((account) => account.address),
    runSeeded(config).accounts.map((account) => account.address),
    'equal seeds should derive equal accounts',
  );
}

function testStopOnFailure() {
  const { report } = runSeeded(smallConfig({ seed: 3, max_balance: 0, stop_on_failure: true }));
  assert(report.halted, 'unfunded accounts should halt the run');
  assert(report.operations_run === 1 && report.blocks_run === 1, 'halt should happen on the first operation');
  assert(report.failures.length === 1, 'one failure should be recorded');
  assert(report.failures[0].code === 'INSUFFICIENT_FUNDS', `unexpected code ${report.failures[0].code}`);
}

async function testConfigLoader() {
  const dir = await mkdtemp(join(tmpdir(), 'nft-sim-config-'));
  try {
    assertEqual(
      await loadSimulationConfig(join(dir, 'missing.json')),
      DEFAULT_SIMULATION_CONFIG,
      'missing config should fall back to defaults',
    );

    const custom = join(dir, 'custom.json');
    await writeFile(custom, JSON.stringify({ seed: 9, balances: { max: 50 }, weights: { burn: 0 } }), 'utf8');
    const loaded = await loadSimulationConfig(custom);
    assert(loaded.seed === 9 && loaded.max_balance === 50, 'overrides should apply');
    assertEqual(
      loaded.weights,
      {
        [MsgType.MINT_NFT]: 100,
        [MsgType.TRANSFER_NFT]: 100,
        [MsgType.EDIT_NFT_METADATA]: 100,
        [MsgType.BURN_NFT]: 0,
      },
      'weights should merge over defaults',
    );

    const unknown = join(dir, 'unknown.json');
    await writeFile(unknown, JSON.stringify({ weights: { swap: 1 } }), 'utf8');
    await expectRejects(() => loadSimulationConfig(unknown), 'unknown weight keys should be rejected');
  } finally {
    await rm(dir, { recursive: true, force: true });
  }

  expectThrows(
    () => parseSimulationConfig({ balances: { min: 10, max: 5 } }),
    'inverted balance range should be rejected',
    'VALIDATION_ERROR',
  );
  expectThrows(() => parseSimulationConfig({ num_accounts: 0 }), 'zero accounts should be rejected', 'VALIDATION_ERROR');
}

export async function runSimulationTests(): Promise<void> {
  testRandHelpers();
  testRandomFees();
  testTransferOperation();
  testNoOpsWithoutNfts();
  testNoOpsForOwnerlessNfts();
  testMintLifecycle();
  testEditOperation();
  testCollaboratorFailures();
  testSelectOperation();
  testHarness();
  testStopOnFailure();
  await testConfigLoader();
}
