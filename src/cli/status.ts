import 'dotenv/config';
import { Command } from 'commander';
import { openEngine } from '../core/engine';
import { parseNow } from '../core/time';
import { printJSON } from './input';

const program = new Command();

program
  .description('Print phase, ledger aggregates and limit usage')
  .option('--now <dateTime>', 'as-of time (ISO, defaults to now)')
  .option('--periods', 'include archived day/week summaries', false);

const run = () => {
  const opts = program.parse(process.argv).opts<{ now?: string; periods: boolean }>();
  const engine = openEngine();
  try {
    const status = engine.status(parseNow(opts.now));
    printJSON(opts.periods ? { ...status, periods: engine.ledger.getState().periods } : status);
  } finally {
    engine.close();
  }
};

if (require.main === module) {
  try {
    run();
  } catch (err) {
    console.error('engine:status failed', err);
    process.exitCode = 1;
  }
}
