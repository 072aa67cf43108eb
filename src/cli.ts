#!/usr/bin/env node
import 'dotenv/config';
import { parseArgs } from 'util';
import { z } from 'zod';
import { loadConfig } from './config';
import { createEngine, createJobs, createScheduler, Engine } from './container';
import { describeError } from './errors';
import { IngestionWindow } from './ingestion/award-ingestor';

const USAGE = `Usage: award-credit <command> [options]

Commands:
  fetch-awards [--from-date YYYY-MM-DD --until-date YYYY-MM-DD]
  fetch-award <awardId> <supplierId>
  send-reminders
  lapse-applications
  sla-overdue-applications
  remove-dated-application-data
  update-statistics
  schedule

Options:
  --quiet   suppress progress output`;

const dateOption = z
  .string()
  .regex(/^\d{4}-\d{2}-\d{2}$/, 'dates must be YYYY-MM-DD')
  .transform(value => new Date(`${value}T00:00:00.000Z`));

export function parseWindow(fromDate: string | undefined, untilDate: string | undefined): IngestionWindow {
  if ((fromDate === undefined) !== (untilDate === undefined)) {
    throw new Error('--from-date and --until-date must be given together');
  }
  if (fromDate === undefined || untilDate === undefined) {
    return {};
  }
  const from = dateOption.parse(fromDate);
  const until = dateOption.parse(untilDate);
  if (from.getTime() > until.getTime()) {
    throw new Error('--from-date must not be after --until-date');
  }
  return { fromDate: from, untilDate: until };
}

const STATE_CHANGING_SWEEPS: ReadonlySet<string> = new Set([
  'lapse-applications',
  'sla-overdue-applications',
  'remove-dated-application-data',
]);

/**
 * A failed refresh is logged; the sweep's own result stands.
 */
async function refreshStatistics(engine: Engine): Promise<void> {
  try {
    await engine.statistics.recompute();
  } catch (error) {
    console.error('[CLI] Statistics refresh failed', { error: describeError(error) });
  }
}

export async function runCommand(
  engine: Engine,
  command: string,
  positionals: string[],
  window: IngestionWindow
): Promise<unknown> {
  const result = await dispatchCommand(engine, command, positionals, window);
  // Must finish before engine.close() ends the pool
  if (STATE_CHANGING_SWEEPS.has(command)) {
    await refreshStatistics(engine);
  }
  return result;
}

async function dispatchCommand(
  engine: Engine,
  command: string,
  positionals: string[],
  window: IngestionWindow
): Promise<unknown> {
  const jobs = createJobs(engine);
  switch (command) {
    case 'fetch-awards':
      return engine.ingestor.fetchAwards(window);
    case 'fetch-award': {
      const [awardId, supplierId] = positionals;
      if (!awardId || !supplierId) {
        throw new Error('fetch-award requires <awardId> <supplierId>');
      }
      const application = await engine.ingestor.fetchAwardByIdAndSupplier(awardId, supplierId);
      return { applicationId: application.id, uuid: application.uuid };
    }
    case 'send-reminders':
    case 'lapse-applications':
    case 'sla-overdue-applications':
    case 'remove-dated-application-data':
    case 'update-statistics':
      return jobs[command]();
    default:
      throw new Error(`Unknown command: ${command}\n\n${USAGE}`);
  }
}

async function main(): Promise<void> {
  const { values, positionals } = parseArgs({
    allowPositionals: true,
    options: {
      'from-date': { type: 'string' },
      'until-date': { type: 'string' },
      quiet: { type: 'boolean', default: false },
      help: { type: 'boolean', short: 'h', default: false },
    },
  });

  const [command, ...rest] = positionals;
  if (!command || values.help) {
    console.log(USAGE);
    return;
  }

  const window = parseWindow(values['from-date'], values['until-date']);
  const baseConfig = loadConfig();
  const config = values.quiet ? { ...baseConfig, quiet: true } : baseConfig;
  const engine = createEngine(config);

  if (command === 'schedule') {
    const scheduler = createScheduler(engine);
    const stop = () => {
      scheduler.stop();
      engine.close().catch(error => {
        console.error('[CLI] Failed to close database pool', { error: describeError(error) });
      });
    };
    process.on('SIGINT', stop);
    process.on('SIGTERM', stop);
    await scheduler.runOnce();
    scheduler.start();
    return;
  }

  try {
    const result = await runCommand(engine, command, rest, window);
    if (!config.quiet) {
      console.log(`[CLI] ${command} finished`, result);
    }
  } finally {
    await engine.close();
  }
}

if (require.main === module) {
  main().catch(error => {
    console.error('[CLI] Command failed', { error: describeError(error) });
    process.exit(1);
  });
}
