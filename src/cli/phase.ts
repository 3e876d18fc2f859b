import 'dotenv/config';
import { Command } from 'commander';
import { openEngine } from '../core/engine';
import { parseNow } from '../core/time';
import { OPERATING_PHASES, OperatingPhase } from '../core/types';
import { describeCriteria } from '../ui/approval';
import { printJSON } from './input';

const isPhase = (value: string): value is OperatingPhase => OPERATING_PHASES.some((p) => p === value);

const withEngine = (fn: (engine: ReturnType<typeof openEngine>) => void) => {
  const engine = openEngine();
  try {
    fn(engine);
  } finally {
    engine.close();
  }
};

const program = new Command();

program.description('Inspect and change the operating phase');

program
  .command('eligibility')
  .description('Report milestone progress for the current phase')
  .option('--now <dateTime>', 'as-of time (ISO)')
  .action((opts: { now?: string }) => {
    withEngine((engine) => {
      const report = engine.phases.evaluateAdvancement(parseNow(opts.now));
      printJSON({ ...report, unmetDescriptions: describeCriteria(report.unmetCriteria) });
    });
  });

program
  .command('advance')
  .description('Advance one phase (requires PHASE_AUTH_TOKEN)')
  .requiredOption('--token <token>', 'authorization token')
  .option('--now <dateTime>', 'as-of time (ISO)')
  .action((opts: { token: string; now?: string }) => {
    withEngine((engine) => {
      const result = engine.phases.advance(opts.token, parseNow(opts.now));
      printJSON(result);
      if (!result.ok) process.exitCode = 2;
    });
  });

program
  .command('downgrade')
  .description('Administrative downgrade to an earlier phase (requires ADMIN_OVERRIDE_TOKEN)')
  .requiredOption('--to <phase>', OPERATING_PHASES.join(' | '))
  .requiredOption('--reason <text>', 'why the downgrade is being forced')
  .requiredOption('--token <token>', 'admin override token')
  .option('--now <dateTime>', 'as-of time (ISO)')
  .action((opts: { to: string; reason: string; token: string; now?: string }) => {
    const target = opts.to.toUpperCase();
    if (!isPhase(target)) {
      console.error(`Unknown phase ${opts.to}; expected ${OPERATING_PHASES.join(', ')}`);
      process.exitCode = 2;
      return;
    }
    withEngine((engine) => {
      const result = engine.phases.forceDowngrade(target, opts.token, opts.reason, parseNow(opts.now));
      printJSON(result);
      if (!result.ok) process.exitCode = 2;
    });
  });

program
  .command('equity')
  .description('Record the current account equity used for sizing')
  .requiredOption('--set <amount>', 'account equity in account currency')
  .option('--now <dateTime>', 'as-of time (ISO)')
  .action((opts: { set: string; now?: string }) => {
    withEngine((engine) => {
      const result = engine.ledger.updateEquity(Number(opts.set), parseNow(opts.now));
      printJSON(result);
      if (!result.ok) process.exitCode = 2;
    });
  });

if (require.main === module) {
  try {
    program.parse(process.argv);
  } catch (err) {
    console.error('engine:phase failed', err);
    process.exitCode = 1;
  }
}
