import { DeliverResult, SignedTx } from '../../shared/schema';
import { ValidationError } from './errors';
import { BlockHeader, LedgerKernel } from './kernel';
import { Ledger } from './ledger';
import { LedgerState } from './state';
import { SimulationCheckpoint, SimulationFileStore, SIMULATION_CHECKPOINT_VERSION } from './store';

export interface LedgerRuntimeOptions {
  chainId: string;
  genesisTime?: string;
  checkpointVersion?: string;
}

/**
 * The in-process application a simulation drives: ledger, state and kernel
 * plus the current block header. One instance per simulation run.
 */
export class LedgerRuntime {
  readonly ledger: Ledger;
  readonly state: LedgerState;
  readonly kernel: LedgerKernel;
  readonly chainId: string;
  private header: BlockHeader;
  private checkpointVersion: string;

  constructor(ledger?: Ledger, state?: LedgerState, options?: LedgerRuntimeOptions, header?: BlockHeader) {
    this.ledger = ledger ?? new Ledger();
    this.state = state ?? new LedgerState();
    this.chainId = options?.chainId ?? 'sim-chain';
    this.header = header ?? { height: 0, time: options?.genesisTime ?? new Date(0).toISOString() };
    this.kernel = new LedgerKernel(this.ledger, this.state, {
      chainId: this.chainId,
      block: () => ({ ...this.header }),
    });
    this.checkpointVersion = options?.checkpointVersion ?? SIMULATION_CHECKPOINT_VERSION;
  }

  deliver(tx: SignedTx): DeliverResult {
    return this.kernel.deliver(tx);
  }

  blockHeight(): number {
    return this.header.height;
  }

  blockTime(): string {
    return this.header.time;
  }

  beginBlock(time: string): BlockHeader {
    const next = Date.parse(time);
    if (Number.isNaN(next)) {
      throw new ValidationError(`invalid block time: ${time}`);
    }
    if (next < Date.parse(this.header.time)) {
      throw new ValidationError('block time must not go backwards');
    }
    this.header = { height: this.header.height + 1, time: new Date(next).toISOString() };
    return { ...this.header };
  }

  createCheckpoint(): SimulationCheckpoint {
    return {
      version: this.checkpointVersion,
      saved_at: new Date().toISOString(),
      chain_id: this.chainId,
      block: { ...this.header },
      ledger: this.ledger.getEvents(),
      state: this.state.snapshot(),
    };
  }

  async saveToStore(store: SimulationFileStore): Promise<void> {
    await store.save(this.createCheckpoint());
  }

  static async loadFromStore(store: SimulationFileStore): Promise<LedgerRuntime | null> {
    const checkpoint = await store.load();
    if (!checkpoint) {
      return null;
    }

    store.validateLedgerIntegrity(checkpoint);
    return LedgerRuntime.fromCheckpoint(checkpoint);
  }

  static fromCheckpoint(checkpoint: SimulationCheckpoint): LedgerRuntime {
    const ledger = new Ledger(checkpoint.ledger);
    const state = new LedgerState(checkpoint.state);
    return new LedgerRuntime(
      ledger,
      state,
      { chainId: checkpoint.chain_id, checkpointVersion: checkpoint.version },
      { ...checkpoint.block },
    );
  }
}
