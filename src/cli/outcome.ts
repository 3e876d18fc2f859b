import 'dotenv/config';
import { Command } from 'commander';
import { openEngine } from '../core/engine';
import { parseNow } from '../core/time';
import { printJSON, readPayload } from './input';

const program = new Command();

program
  .description('Record a closed trade outcome in the risk ledger')
  .option('--file <path>', 'outcome JSON file')
  .option('--json <payload>', 'outcome JSON inline')
  .option('--now <dateTime>', 'report time (ISO, defaults to now)');

const run = () => {
  const opts = program.parse(process.argv).opts<{ file?: string; json?: string; now?: string }>();
  const engine = openEngine();
  try {
    const result = engine.gate.reportOutcome(readPayload(opts), parseNow(opts.now));
    printJSON(result);
    if (!result.ok) process.exitCode = 2;
  } finally {
    engine.close();
  }
};

if (require.main === module) {
  try {
    run();
  } catch (err) {
    console.error('engine:outcome failed', err);
    process.exitCode = 1;
  }
}
