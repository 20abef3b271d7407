/**
 * Run one grading and/or resolution cycle against Supabase
 * Run: npm run build && npm run cycle -- [--grade] [--resolve] [--since-hours N]
 */

import 'dotenv/config';
import { subHours } from 'date-fns';
import { config } from '../src/lib/config';
import { GradingEngine } from '../src/lib/grading';
import { Logger } from '../src/lib/logger';
import { OutcomeResolver } from '../src/lib/outcome-resolver';
import { runGradingCycle, runResolutionCycle } from '../src/lib/pipeline';
import { SupabaseOpportunityStore } from '../src/lib/store';
import { supabaseAdmin } from '../src/lib/supabase';
import { formatDateTime } from '../src/lib/utils';

interface CycleArgs {
  grade: boolean;
  resolve: boolean;
  sinceHours: number;
}

function parseArgs(argv: string[]): CycleArgs {
  let grade = argv.includes('--grade');
  let resolve = argv.includes('--resolve');
  if (!grade && !resolve) {
    grade = true;
    resolve = true;
  }

  let sinceHours: number = config.gradingLookbackHours;
  const index = argv.indexOf('--since-hours');
  if (index !== -1) {
    const value = parseFloat(argv[index + 1] ?? '');
    if (!Number.isFinite(value) || value <= 0) {
      throw new Error(`Invalid --since-hours value: ${argv[index + 1] ?? '(missing)'}`);
    }
    sinceHours = value;
  }

  return { grade, resolve, sinceHours };
}

const logger = new Logger('run-cycle');

async function main() {
  const args = parseArgs(process.argv.slice(2));

  if (!supabaseAdmin) {
    logger.error('Supabase is not configured: set SUPABASE_URL and SUPABASE_SERVICE_ROLE_KEY');
    process.exitCode = 1;
    return;
  }

  const now = new Date();
  logger.info(`Cycle started at ${formatDateTime(now)}`);
  const store = new SupabaseOpportunityStore(supabaseAdmin);

  if (args.grade) {
    await runGradingCycle(store, new GradingEngine(config.gradingMethod), {
      since: subHours(now, args.sinceHours),
      now,
      calibrate: config.calibratePrior,
    });
  }

  if (args.resolve) {
    await runResolutionCycle(store, new OutcomeResolver(), { now });
  }
}

main().catch(error => {
  logger.error(`Cycle failed: ${error instanceof Error ? error.message : 'Unknown error'}`);
  process.exitCode = 1;
});
