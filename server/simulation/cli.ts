#!/usr/bin/env node
import { LedgerRuntime } from '../ledger/runtime';
import { formatCoins } from '../ledger/coins';
import { Ledger } from '../ledger/ledger';
import { SimulationFileStore } from '../ledger/store';
import { runAllTests } from '../tests';
import { loadSimulationConfig, SimulationConfig, validateSimulationConfig } from './config-loader';
import { randomGenesis } from './genesis';
import { describeOutcome, runSimulation, weightedOperations } from './harness';
import { SeededRand } from './rand';

const DEFAULT_CONFIG = 'config/simulation.json';
const DEFAULT_STORE = 'data/simulation-checkpoint.json';

function getFlagValue(args: string[], flag: string, fallback?: string): string | undefined {
  const index = args.indexOf(flag);
  if (index === -1) {
    return fallback;
  }
  return args[index + 1] ?? fallback;
}

function getIntegerFlag(args: string[], flag: string): number | undefined {
  const raw = getFlagValue(args, flag);
  if (raw === undefined) {
    return undefined;
  }
  const value = Number(raw);
  if (!Number.isSafeInteger(value)) {
    throw new Error(`${flag} requires an integer`);
  }
  return value;
}

async function resolveConfig(args: string[]): Promise<SimulationConfig> {
  const configPath = getFlagValue(args, '--config', DEFAULT_CONFIG) ?? DEFAULT_CONFIG;
  const config = await loadSimulationConfig(configPath);
  return validateSimulationConfig({
    ...config,
    seed: getIntegerFlag(args, '--seed') ?? config.seed,
    num_blocks: getIntegerFlag(args, '--blocks') ?? config.num_blocks,
    stop_on_failure: args.includes('--stop-on-failure') || config.stop_on_failure,
  });
}

async function loadRuntime(args: string[]): Promise<LedgerRuntime> {
  const storePath = getFlagValue(args, '--store', DEFAULT_STORE) ?? DEFAULT_STORE;
  const runtime = await LedgerRuntime.loadFromStore(new SimulationFileStore(storePath));
  if (!runtime) {
    throw new Error(`no checkpoint at ${storePath}; run a simulation first`);
  }
  return runtime;
}

async function commandRun(args: string[]) {
  const config = await resolveConfig(args);
  const storePath = getFlagValue(args, '--store', DEFAULT_STORE) ?? DEFAULT_STORE;
  const verbose = args.includes('--verbose');

  const rng = new SeededRand(config.seed);
  const { runtime, accounts } = randomGenesis(rng, config);
  const ops = weightedOperations(config.weights, runtime.state, runtime.state);
  const report = runSimulation(rng, runtime, accounts, ops, {
    num_blocks: config.num_blocks,
    block_size: config.block_size,
    block_interval_seconds: config.block_interval_seconds,
    stop_on_failure: config.stop_on_failure,
    onOutcome: verbose
      ? (outcome, height) => console.log(JSON.stringify(describeOutcome(outcome, height)))
      : undefined,
  });

  const store = new SimulationFileStore(storePath);
  await store.save({ ...runtime.createCheckpoint(), run: { seed: config.seed, report } });

  const { failures, ...summary } = report;
  console.log(JSON.stringify({ seed: config.seed, ...summary, failures: failures.length, store: storePath }, null, 2));
  if (report.halted) {
    process.exitCode = 1;
  }
}

async function commandState(args: string[]) {
  const runtime = await loadRuntime(args);
  const snapshot = runtime.state.snapshot();
  const summary = {
    height: runtime.blockHeight(),
    time: runtime.blockTime(),
    accounts: Object.keys(snapshot.accounts).length,
    nfts: snapshot.nfts.length,
    denoms: runtime.state.listDenoms().length,
    owners: runtime.state.getOwners().length,
  };
  const balances = runtime.state.listAccounts().map((account) => ({
    address: account.address,
    sequence: account.sequence,
    coins: formatCoins(account.coins),
    spendable: formatCoins(runtime.state.spendableCoins(account.address, runtime.blockTime())),
    nfts: runtime.state
      .getOwner(account.address)
      .id_collections.reduce((sum, collection) => sum + collection.ids.length, 0),
  }));
  console.log(JSON.stringify({ summary, balances, snapshot }, null, 2));
}

async function commandLedger(args: string[]) {
  const runtime = await loadRuntime(args);
  console.log(JSON.stringify(runtime.ledger.getEvents(), null, 2));
}

async function commandVerify(args: string[]) {
  const storePath = getFlagValue(args, '--store', DEFAULT_STORE) ?? DEFAULT_STORE;
  const checkpoint = await new SimulationFileStore(storePath).load();
  if (!checkpoint) {
    throw new Error(`no checkpoint at ${storePath}`);
  }
  const report = new Ledger(checkpoint.ledger).verifyIntegrity();
  console.log(JSON.stringify(report, null, 2));
  if (!report.ok) {
    process.exitCode = 1;
  }
}

async function commandTests() {
  await runAllTests();
  console.log('Simulation tests passed');
}

async function main() {
  const args = process.argv.slice(2);
  const command = args[0];

  switch (command) {
    case 'run':
      await commandRun(args);
      return;
    case 'state':
      await commandState(args);
      return;
    case 'ledger':
      await commandLedger(args);
      return;
    case 'verify':
      await commandVerify(args);
      return;
    case 'tests':
      await commandTests();
      return;
    default:
      throw new Error('unknown command');
  }
}

main().catch((error) => {
  console.error(error);
  process.exit(1);
});
