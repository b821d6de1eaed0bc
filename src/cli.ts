#!/usr/bin/env node
import { Command } from 'commander';
import { buildRunConfig, doctorReport, readEnv } from './config.js';
import { DEMO_FALLBACK_USER_ID, demoDestination, demoSourceProjects } from './demo.js';
import { loadEnvFiles } from './env.js';
import { FatalConfigError, fatalExits } from './errors.js';
import { createLogger, openLogFile } from './log.js';
import { RunContext } from './migrate/context.js';
import { MigrationEngine } from './migrate/engine.js';
import { formatSummary, type MigrationReport } from './migrate/summary.js';
import type { ProjectRef } from './model.js';
import { HttpStatusNotifier, nullNotifier } from './notify.js';
import { AsanaProvider } from './providers/asana.js';
import { MockDestination, MockSource } from './providers/mock.js';
import { ScoroProvider } from './providers/scoro.js';
import { RateLimitedExecutor, retryPolicy } from './retry.js';
import { ExportStore } from './store/exportStore.js';

loadEnvFiles();

const program = new Command();

program
  .name('asana-scoro-migrate')
  .description('Migrate Asana projects, tasks and comments into Scoro')
  .version('0.1.0');

function printReport(report: MigrationReport, format = 'pretty') {
  if (format === 'json') console.log(JSON.stringify(report, null, 2));
  else console.log(formatSummary(report));
}

program
  .command('doctor')
  .description('Check environment/config and print what is missing')
  .action(() =>
    fatalExits(async () => {
      const report = doctorReport(readEnv());
      console.log('asana-scoro-migrate doctor');
      if (report.missing.length) {
        console.log('\nMissing env vars:');
        for (const k of report.missing) console.log(`- ${k}`);
        process.exitCode = 2;
      } else {
        console.log('\nAll required env vars are set.');
      }

      if (report.notes.length) {
        console.log('\nNotes:');
        for (const n of report.notes) console.log(`- ${n}`);
      }
    }),
  );

interface MigrateOptions {
  by: string;
  workspace?: string;
  dryRun?: boolean;
  format: string;
  saveExports?: boolean;
  stateDir?: string;
  logFile?: string;
}

program
  .command('migrate')
  .description('Export the given source projects and import them into the destination')
  .argument('[projects...]', 'source project ids (or names with --by name)')
  .option('--by <kind>', 'how projects are given: gid|name', 'gid')
  .option('--workspace <gid>', 'workspace for --by name (default: ASANA_WORKSPACE_GID)')
  .option('--dry-run', 'Export and plan only; write nothing to the destination')
  .option('--format <format>', 'Output format: pretty|json', 'pretty')
  .option('--save-exports', 'Keep a JSON snapshot of every exported project in the state dir')
  .option('--state-dir <dir>', 'Override state dir (default: .migrate or MIGRATE_STATE_DIR)')
  .option('--log-file <file>', 'Also append log lines to this file')
  .action((projects: string[], opts: MigrateOptions) =>
    fatalExits(async () => {
      if (opts.by !== 'gid' && opts.by !== 'name') throw new FatalConfigError(`--by must be gid or name (got ${opts.by})`);
      const by = opts.by;
      if (!projects.length) throw new FatalConfigError('No projects given.');

      const config = buildRunConfig(readEnv(), { stateDir: opts.stateDir, workspaceId: opts.workspace });
      const logFile = opts.logFile
        ? await openLogFile(opts.logFile, (e) => console.error(`log file ${opts.logFile}: ${e.message}; no longer writing to it`))
        : undefined;
      const logger = createLogger(config.logLevel, { sink: logFile?.sink });

      try {
        const executor = new RateLimitedExecutor(config.retry, { logger: logger.child('http') });
        const destination = new ScoroProvider({
          ...config.scoro,
          timeoutMs: config.httpTimeoutMs,
          logger: logger.child('scoro'),
        });
        const source = new AsanaProvider({
          ...config.asana,
          timeoutMs: config.httpTimeoutMs,
        });
        const context = new RunContext({
          destination,
          executor,
          logger,
          settings: { ...config.settings, dryRun: !!opts.dryRun },
        });
        const notifier = config.monitorUrl
          ? new HttpStatusNotifier(config.monitorUrl, { logger: logger.child('notify') })
          : nullNotifier;

        const engine = new MigrationEngine({
          source,
          context,
          notifier,
          exportStore: opts.saveExports ? new ExportStore(config.stateDir) : undefined,
          lockDir: config.stateDir,
          workspaceId: config.asana.workspaceId,
        });

        const refs: ProjectRef[] = projects.map((value) => ({ by, value }));
        logger.info(`migrate start (dryRun=${!!opts.dryRun})`, { projects: projects.length });
        printReport(await engine.run(refs), opts.format);
      } finally {
        await logFile?.close();
      }
    }),
  );

program
  .command('demo')
  .description('Run the whole pipeline against in-memory mock source and destination')
  .option('--format <format>', 'Output format: pretty|json', 'pretty')
  .option('--dry-run', 'Plan only')
  .action((opts: { format: string; dryRun?: boolean }) =>
    fatalExits(async () => {
      const logger = createLogger(readEnv().MIGRATE_LOG_LEVEL ?? 'info');
      const source = new MockSource(demoSourceProjects());
      const destination = new MockDestination(demoDestination());
      const context = new RunContext({
        destination,
        logger,
        executor: new RateLimitedExecutor(retryPolicy({ minIntervalMs: 0 }), { logger: logger.child('http') }),
        settings: { fallbackUserId: DEMO_FALLBACK_USER_ID, dryRun: !!opts.dryRun },
      });
      const engine = new MigrationEngine({ source, context });
      const report = await engine.run([
        { by: 'gid', value: 'P-1' },
        { by: 'gid', value: 'P-2' },
      ]);
      printReport(report, opts.format);
    }),
  );

program.parseAsync(process.argv).catch((err) => {
  console.error(err instanceof Error ? err.message : String(err));
  process.exitCode = 1;
});
