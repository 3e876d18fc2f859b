import 'dotenv/config';
import { Command } from 'commander';
import { openEngine } from '../core/engine';
import { parseNow } from '../core/time';
import { printJSON, readPayload } from './input';

const program = new Command();

program
  .description('Evaluate a setup candidate against the risk gate')
  .option('--file <path>', 'candidate JSON file')
  .option('--json <payload>', 'candidate JSON inline')
  .option('--now <dateTime>', 'evaluation time (ISO, defaults to now)');

const run = () => {
  const opts = program.parse(process.argv).opts<{ file?: string; json?: string; now?: string }>();
  const engine = openEngine();
  try {
    const decision = engine.gate.evaluate(readPayload(opts), parseNow(opts.now));
    printJSON(decision);
    if (decision.status === 'REJECTED' && decision.category === 'MALFORMED') process.exitCode = 2;
  } finally {
    engine.close();
  }
};

if (require.main === module) {
  try {
    run();
  } catch (err) {
    console.error('engine:evaluate failed', err);
    process.exitCode = 1;
  }
}
