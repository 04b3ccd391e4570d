#!/usr/bin/env node
import chalk from 'chalk';
import { ArgumentError, USAGE, parseArgs, type CliOptions } from './args.js';
import { createExecutor, disconnect } from './db.js';
import { TableDropper } from './engine.js';
import { errorMessage } from './errors.js';
import { log } from './logger.js';
import { describeTable, formatInventorySummary, formatOutcome, formatReportHeader, summarizeReport } from './report.js';
import type { DropOutcomeEntry } from './types.js';

function printOutcome(entry: DropOutcomeEntry): void {
  const line = formatOutcome(entry);
  switch (entry.status.kind) {
    case 'dropped':
      if (entry.status.preview) log.statement(line);
      else log.success(line);
      break;
    case 'skipped':
      log.warn(line);
      break;
    case 'failed':
      log.error(line);
      break;
  }
}

async function main(): Promise<number> {
  let options: CliOptions;
  try {
    options = parseArgs(process.argv.slice(2));
  } catch (err) {
    if (err instanceof ArgumentError) {
      log.error(err.message);
      console.log(USAGE);
      return 1;
    }
    throw err;
  }

  const { namespace } = options;
  if (options.help || !namespace) {
    console.log(USAGE);
    return options.help ? 0 : 1;
  }

  log.banner('Table Dropper', options.mode === 'execute' ? 'EXECUTE mode: tables will be dropped' : 'Dry run: nothing will be dropped');

  try {
    log.info(chalk.yellow('Connecting to database...'));
    const dropper = new TableDropper(await createExecutor());
    log.success('Connected');

    log.info(`Loading tables from ${namespace}...`);
    const inventory = await dropper.load(namespace);
    log.success(formatInventorySummary(inventory));
    for (const table of inventory) {
      log.dim(describeTable(table));
    }

    if (options.all) {
      dropper.selectAll(true);
    }
    for (const name of options.tables) {
      dropper.toggle(name, true);
    }

    const selected = dropper.selection.selectedNames();
    if (selected.length === 0) {
      log.warn('No tables selected.');
      return 0;
    }

    log.blank();
    for (const line of formatReportHeader(options.mode, selected.length)) {
      log.info(chalk.bold(line));
    }
    const report = await dropper.drop(options.mode, { onOutcome: printOutcome });

    const summary = summarizeReport(report);
    log.blank();
    log.info(chalk.bold('Done.'));
    log.dim(
      `Dropped: ${summary.dropped}  Previewed: ${summary.previewed}  Skipped: ${summary.skipped}  Failed: ${summary.failed}`
    );
    return summary.failed > 0 ? 2 : 0;
  } catch (err) {
    log.error(errorMessage(err));
    return 1;
  } finally {
    await disconnect();
  }
}

main().then(
  (code) => {
    process.exitCode = code;
  },
  (err: unknown) => {
    log.error(`Fatal error: ${errorMessage(err)}`);
    process.exitCode = 1;
  }
);
