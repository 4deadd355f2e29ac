import { runLedgerTests } from './ledger/tests';
import { runSimulationTests } from './simulation/tests';

export async function runAllTests(): Promise<void> {
  await runLedgerTests();
  await runSimulationTests();
}
