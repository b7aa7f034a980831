#!/usr/bin/env node

import { Command, Option } from 'commander';
import fs from 'node:fs';
import path from 'node:path';
import {
  assertCredentials,
  loadConfig,
  writeDefaultConfig,
  RUN_MODES,
  type Config,
} from '../shared/config.js';
import { getImporterDir, getPackageRoot, resolvePath } from '../shared/utils.js';
import { ImporterError, errorMessage } from '../shared/errors.js';
import { StateLedger } from '../ledger/ledger.js';
import { loadSources, enabledSources, type Source } from '../sources/sources.js';
import { loadAllowlist, type DomainFilter } from '../filter/domainFilter.js';
import { PoliteFetcher } from '../discovery/fetcher.js';
import { DiscoveryEngine } from '../discovery/engine.js';
import { MealieClient } from '../destination/mealie.js';
import { CancellationToken, handleInterrupts } from '../importer/cancellation.js';
import { runImport } from '../importer/orchestrator.js';
import { appendRunLog, formatSummary } from '../importer/summary.js';

const program = new Command();

program
  .name('recipe-importer')
  .description('Discover recipe pages on configured sites and import them into Mealie')
  .version('0.1.0');

function createFetcher(config: Config): PoliteFetcher {
  return new PoliteFetcher({
    userAgent: config.discovery.user_agent,
    throttleSeconds: config.discovery.throttle_seconds,
    timeoutMs: config.discovery.timeout_ms,
    probeTimeoutMs: config.discovery.probe_timeout_ms,
    robotsTimeoutMs: config.discovery.robots_timeout_ms,
  });
}

function loadSiteConfig(config: Config): { sources: Source[]; filter: DomainFilter } {
  const sources = loadSources(resolvePath(config.paths.sources));
  const filter = loadAllowlist(resolvePath(config.paths.allowlist));
  for (const source of sources) {
    filter.registerSiteDomains(source.key, source.domains);
  }
  return { sources, filter };
}

async function withLedger(fn: (ledger: StateLedger, config: Config) => void | Promise<void>): Promise<void> {
  const config = await loadConfig();
  const ledger = StateLedger.open(config.paths.db);
  try {
    await fn(ledger, config);
  } finally {
    ledger.close();
  }
}

// === init ===
program
  .command('init')
  .description('Create the config directory with default configuration files')
  .action(() => {
    const dir = getImporterDir();
    const configPath = path.join(dir, 'config.yaml');

    if (!fs.existsSync(configPath)) {
      writeDefaultConfig(configPath);
      log(`✓ ${configPath} created`);
    } else {
      log(`✓ ${configPath} already exists`);
    }

    const examplesDir = path.join(getPackageRoot(), 'config');
    for (const name of ['sources.yaml', 'allowlist.yaml']) {
      const dest = path.join(dir, name);
      const example = path.join(examplesDir, name.replace('.yaml', '.example.yaml'));
      if (fs.existsSync(dest)) {
        log(`✓ ${dest} already exists`);
      } else if (fs.existsSync(example)) {
        fs.copyFileSync(example, dest);
        log(`✓ ${dest} created`);
      } else {
        log(`✗ example ${example} not found, skipping ${name}`);
      }
    }

    log('\nSet destination.api_token (or MEALIE_IMPORTER_TOKEN), then run:');
    log('  recipe-importer run --mode backfill --dry-run');
  });

// === run ===
program
  .command('run')
  .description('Discover and import recipes')
  .addOption(new Option('-m, --mode <mode>', 'Run mode').choices([...RUN_MODES]).default('backfill'))
  .option('--dry-run', 'Discover and filter, but import nothing')
  .option('--force-url <url>', 'Import a single URL, even if already imported')
  .option('--force-domain <domain>', 'Re-import URLs from this domain')
  .option('--reset-domain <domain>', 'Forget all history for this domain first')
  .action(
    async (opts: {
      mode: string;
      dryRun?: boolean;
      forceUrl?: string;
      forceDomain?: string;
      resetDomain?: string;
    }) => {
      const mode = RUN_MODES.find((m) => m === opts.mode);
      if (!mode) {
        log(`✗ Unknown mode: ${opts.mode}`);
        process.exitCode = 1;
        return;
      }

      const config = await loadConfig();
      assertCredentials(config);
      const { sources, filter } = loadSiteConfig(config);

      const fetcher = createFetcher(config);
      const discovery = new DiscoveryEngine(fetcher);
      const destination = new MealieClient(config.destination);
      const ledger = StateLedger.open(config.paths.db);

      const token = new CancellationToken();
      const stopHandlingInterrupts = handleInterrupts(token, {
        notify: (message) => log(`\n${message}`),
        exit: (code) => process.exit(code),
      });

      try {
        log(`Starting ${mode} import${opts.dryRun ? ' (dry run)' : ''}...`);
        const result = await runImport(
          { config, sources, filter, ledger, destination, discovery, pages: fetcher },
          {
            mode,
            dryRun: opts.dryRun ?? false,
            forceUrl: opts.forceUrl,
            forceDomain: opts.forceDomain,
            resetDomain: opts.resetDomain,
          },
          token,
        );

        log('');
        for (const line of formatSummary(result)) log(line);
        appendRunLog(resolvePath(config.paths.run_log), result);
        process.exitCode = result.success ? 0 : 1;
      } finally {
        stopHandlingInterrupts();
        ledger.close();
      }
    },
  );

// === stats ===
program
  .command('stats')
  .description('Show import totals')
  .action(async () => {
    await withLedger((ledger) => {
      const stats = ledger.getStats();
      log(`URLs tracked: ${stats.totalUrls}`);
      log(`  Imported:   ${stats.totalImported}`);
      log(`  Failed:     ${stats.totalFailed}`);
      log(`  Queued:     ${stats.totalQueued}`);

      if (stats.byDomain.length > 0) {
        log('\nImported by domain:');
        for (const { domain, count } of stats.byDomain) {
          log(`  ${domain.padEnd(40)} ${count}`);
        }
      }

      if (stats.lastRun) {
        const run = stats.lastRun;
        log(`\nLast run: #${run.id} ${run.mode} started ${run.started_at}`);
        log(
          `  discovered ${run.discovered_count}, imported ${run.imported_count}, ` +
            `failed ${run.failed_count}, skipped ${run.skipped_count}`,
        );
        if (run.error_message) log(`  error: ${run.error_message}`);
      }
    });
  });

// === failures ===
program
  .command('failures')
  .description('List recent failed URLs')
  .option('-n, --limit <n>', 'How many to show', '20')
  .action(async (opts: { limit: string }) => {
    await withLedger((ledger) => {
      const failures = ledger.getRecentFailures(parseInt(opts.limit, 10));
      if (failures.length === 0) {
        log('No failed URLs.');
        return;
      }
      for (const record of failures) {
        log(`✗ ${record.url}`);
        if (record.last_error) log(`    ${record.last_error}`);
      }
    });
  });

// === queued ===
program
  .command('queued')
  .description('List URLs the destination accepted for later processing')
  .action(async () => {
    await withLedger((ledger) => {
      const urls = ledger.getQueuedUrls();
      if (urls.length === 0) {
        log('No queued URLs.');
        return;
      }
      for (const url of urls) log(url);
    });
  });

// === runs ===
program
  .command('runs')
  .description('List recent runs')
  .option('-n, --limit <n>', 'How many to show', '10')
  .action(async (opts: { limit: string }) => {
    await withLedger((ledger) => {
      const runs = ledger.listRuns(parseInt(opts.limit, 10));
      if (runs.length === 0) {
        log('No runs yet.');
        return;
      }
      for (const run of runs) {
        const status = run.completed_at ? (run.error_message ? '✗' : '✓') : '…';
        log(
          `${status} #${run.id} ${run.mode.padEnd(8)} ${run.started_at}  ` +
            `discovered ${run.discovered_count}, imported ${run.imported_count}, ` +
            `failed ${run.failed_count}, skipped ${run.skipped_count}`,
        );
        if (run.error_message) log(`    ${run.error_message}`);
      }
    });
  });

// === check-config ===
program
  .command('check-config')
  .description('Validate sources and allowlist')
  .action(async () => {
    const config = await loadConfig();
    const { sources, filter } = loadSiteConfig(config);
    const enabled = enabledSources(sources);

    log(`✓ Sources: ${sources.length} configured, ${enabled.length} enabled`);
    log(`✓ Allowlist: ${filter.siteCount} sites with rules`);

    const uncovered = enabled.filter((s) => !filter.hasRulesFor(s.key));
    for (const source of uncovered) {
      log(`  ! ${source.key} has no allowlist rules; nothing from it will be imported`);
    }
    log(config.destination.api_token ? '✓ API token configured' : '✗ API token missing');
  });

// === probe ===
program
  .command('probe <url>')
  .description('Check whether a page carries recipe structured data')
  .action(async (url: string) => {
    const config = await loadConfig();
    const engine = new DiscoveryEngine(createFetcher(config));
    const found = await engine.hasContentSchema(url);
    log(found ? `✓ Recipe markup found: ${url}` : `✗ No recipe markup: ${url}`);
    process.exitCode = found ? 0 : 1;
  });

function log(msg: string): void {
  // eslint-disable-next-line no-console
  console.log(msg);
}

program.parseAsync().catch((err: unknown) => {
  const prefix = err instanceof ImporterError ? `[${err.code}] ` : '';
  // eslint-disable-next-line no-console
  console.error(`✗ ${prefix}${errorMessage(err)}`);
  process.exitCode = 1;
});
