import { mkdir, readFile, rename, writeFile } from 'fs/promises';
import { dirname } from 'path';
import { LedgerEvent } from '../../shared/schema';
import { ValidationError } from './errors';
import { BlockHeader } from './kernel';
import { Ledger } from './ledger';
import { StateSnapshot } from './state';

export const SIMULATION_CHECKPOINT_VERSION = '0.1.0';

/** Seed and report of the run that produced a checkpoint. */
export interface CheckpointRun {
  seed: number;
  report: object;
}

export interface SimulationCheckpoint {
  version: string;
  saved_at: string;
  chain_id: string;
  block: BlockHeader;
  ledger: LedgerEvent[];
  state: StateSnapshot;
  run?: CheckpointRun;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function isTimestamp(value: unknown): value is string {
  return typeof value === 'string' && !Number.isNaN(Date.parse(value));
}

function isCount(value: unknown): value is number {
  return typeof value === 'number' && Number.isSafeInteger(value) && value >= 0;
}

function assertSnapshot(state: unknown): void {
  if (!isRecord(state) || !isRecord(state.accounts) || !Array.isArray(state.nfts)) {
    throw new ValidationError('checkpoint state must hold accounts and nfts');
  }
  if (!isCount(state.next_account_number)) {
    throw new ValidationError('checkpoint state next_account_number must be a non-negative integer');
  }

  const numbers = new Set<number>();
  for (const [address, account] of Object.entries(state.accounts)) {
    if (!isRecord(account) || account.address !== address) {
      throw new ValidationError(`checkpoint account ${address} is keyed under the wrong address`);
    }
    if (!isCount(account.account_number) || !isCount(account.sequence) || !Array.isArray(account.coins)) {
      throw new ValidationError(`checkpoint account ${address} is malformed`);
    }
    if (account.account_number >= state.next_account_number || numbers.has(account.account_number)) {
      throw new ValidationError(`checkpoint account ${address} reuses account number ${account.account_number}`);
    }
    numbers.add(account.account_number);
  }

  const nfts: unknown[] = state.nfts;
  const seen = new Set<string>();
  for (const nft of nfts) {
    if (!isRecord(nft) || typeof nft.denom !== 'string' || typeof nft.id !== 'string' || typeof nft.owner !== 'string') {
      throw new ValidationError('checkpoint nft is malformed');
    }
    const key = `${nft.denom}/${nft.id}`;
    if (seen.has(key)) {
      throw new ValidationError(`checkpoint holds nft ${key} twice`);
    }
    seen.add(key);
  }
}

function assertRun(run: unknown): void {
  if (run === undefined) {
    return;
  }
  if (!isRecord(run) || !Number.isSafeInteger(run.seed) || !isRecord(run.report)) {
    throw new ValidationError('checkpoint run must carry an integer seed and a report');
  }
}

/**
 * JSON checkpoints on disk. Writes land in a sibling temp file and are
 * renamed into place; loads and saves both check shape and hash chain.
 */
export class SimulationFileStore {
  constructor(private filePath: string) {}

  async load(): Promise<SimulationCheckpoint | null> {
    let raw: string;
    try {
      raw = await readFile(this.filePath, 'utf8');
    } catch (error) {
      if (error && typeof error === 'object' && 'code' in error && error.code === 'ENOENT') {
        return null;
      }
      throw error;
    }

    const parsed: unknown = JSON.parse(raw);
    this.assertValidCheckpoint(parsed);
    return parsed;
  }

  async save(checkpoint: SimulationCheckpoint): Promise<void> {
    this.assertValidCheckpoint(checkpoint);
    this.validateLedgerIntegrity(checkpoint);
    await mkdir(dirname(this.filePath), { recursive: true });

    const tempPath = `${this.filePath}.${process.pid}.tmp`;
    await writeFile(tempPath, `${JSON.stringify(checkpoint, null, 2)}\n`, 'utf8');
    await rename(tempPath, this.filePath);
  }

  validateLedgerIntegrity(checkpoint: SimulationCheckpoint): void {
    const report = new Ledger(checkpoint.ledger).verifyIntegrity();
    if (!report.ok) {
      throw new ValidationError('ledger integrity check failed', report.errors);
    }
    const last = checkpoint.ledger[checkpoint.ledger.length - 1];
    if (last && last.height > checkpoint.block.height) {
      throw new ValidationError(
        `ledger reaches height ${last.height} past checkpoint block ${checkpoint.block.height}`,
      );
    }
  }

  private assertValidCheckpoint(checkpoint: unknown): asserts checkpoint is SimulationCheckpoint {
    if (!isRecord(checkpoint)) {
      throw new ValidationError('checkpoint is required');
    }
    if (checkpoint.version !== SIMULATION_CHECKPOINT_VERSION) {
      throw new ValidationError(`unsupported checkpoint version: ${String(checkpoint.version)}`);
    }
    if (!isTimestamp(checkpoint.saved_at)) {
      throw new ValidationError('checkpoint saved_at must be a timestamp');
    }
    if (typeof checkpoint.chain_id !== 'string' || checkpoint.chain_id === '') {
      throw new ValidationError('checkpoint chain_id is required');
    }
    const block = checkpoint.block;
    if (!isRecord(block) || !isCount(block.height) || !isTimestamp(block.time)) {
      throw new ValidationError('checkpoint block header needs a height and a time');
    }
    if (!Array.isArray(checkpoint.ledger)) {
      throw new ValidationError('checkpoint ledger is required');
    }
    assertSnapshot(checkpoint.state);
    assertRun(checkpoint.run);
  }
}
