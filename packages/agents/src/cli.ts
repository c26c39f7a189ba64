#!/usr/bin/env node
// Prospect Intel — command-line interface
//
// Usage:
//   prospect run "Acme Corporation"          # full pipeline (cached when possible)
//   prospect run --no-cache --json Acme      # force a fresh run, print JSON
//   prospect run --demo                      # prompt for a name, no API calls
//   prospect batch Acme Globex Initech -c 2  # several companies, comparative summary
//   prospect cache list | invalidate <company> | clear

import 'dotenv/config';
import { createInterface } from 'node:readline';
import { loadConfig, type AppConfig } from '../config/env.js';
import { createReportCache } from '../config/cache-backend.js';
import { createProspector } from '../orchestrator/pipeline-factory.js';
import { BatchProspector } from '../orchestrator/batch-prospector.js';
import type { OrchestratorEvent } from '../orchestrator/coordinator.js';
import type { Report } from '../types/report.js';
import { ConfigError, InvalidSubjectError, RunCancelledError, errorMessage } from '../types/errors.js';
import { subjectKey } from '../utils/subject.js';
import { setLogLevel } from '../utils/logger.js';
import { formatReportSummary } from '../utils/report-formatter.js';
import { UsageError, parseBatchArgs, parseCacheArgs, parseRunArgs } from './cli-args.js';

const EXAMPLE_COMPANY = 'Acme Corporation';
const EXIT_OK = 0;
const EXIT_FAILED = 1;
const EXIT_CANCELLED = 130;

// ── ANSI helpers (no chalk dependency) ──────────────────────────────

const isTTY = process.stdout.isTTY ?? false;

const ansi = {
  reset: isTTY ? '\x1b[0m' : '',
  bold: isTTY ? '\x1b[1m' : '',
  dim: isTTY ? '\x1b[2m' : '',
  cyan: isTTY ? '\x1b[36m' : '',
  green: isTTY ? '\x1b[32m' : '',
  yellow: isTTY ? '\x1b[33m' : '',
  red: isTTY ? '\x1b[31m' : '',
  magenta: isTTY ? '\x1b[35m' : '',
};

function c(color: keyof typeof ansi, text: string): string {
  return `${ansi[color]}${text}${ansi.reset}`;
}

function statusColor(status: Report['status']): keyof typeof ansi {
  if (status === 'completed') return 'green';
  return status === 'partial_failure' ? 'yellow' : 'red';
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null;
}

// ── CLI class ───────────────────────────────────────────────────────

class ProspectCli {
  async start(): Promise<number> {
    const rawArgs = process.argv.slice(2);

    if (rawArgs.length === 0 || rawArgs[0] === '--help' || rawArgs[0] === '-h') {
      this.printHelp();
      return EXIT_OK;
    }

    const command = rawArgs[0];
    const rest = rawArgs.slice(1);

    try {
      switch (command) {
        case 'run':
          return await this.handleRun(rest);
        case 'batch':
          return await this.handleBatch(rest);
        case 'cache':
          return await this.handleCache(rest);
        case 'help':
          this.printHelp();
          return EXIT_OK;
        default:
          console.error(`Unknown command: ${command}\n`);
          this.printHelp();
          return EXIT_FAILED;
      }
    } catch (err) {
      if (err instanceof UsageError || err instanceof ConfigError || err instanceof InvalidSubjectError) {
        console.error(`  ${c('red', 'Error:')} ${err.message}\n`);
        return EXIT_FAILED;
      }
      throw err;
    }
  }

  // ── Subcommand: run ─────────────────────────────────────────────

  private async handleRun(args: string[]): Promise<number> {
    const opts = parseRunArgs(args);
    if (opts.help) {
      this.printHelp();
      return EXIT_OK;
    }

    const config = this.loadConfig(opts.demo);
    let company = opts.company || await this.ask('Enter company name to research: ');
    if (!company) {
      console.log(`  ${c('yellow', 'No company name provided.')} Using example: '${EXAMPLE_COMPANY}'`);
      company = EXAMPLE_COMPANY;
    }

    const { orchestrator } = await createProspector(config, {
      onEvent: opts.json ? undefined : (e) => this.printProgress(e),
    });

    if (!opts.json) {
      console.log(`\n  ${c('bold', 'Prospect Intel')} ${c('dim', `— ${config.mode} mode`)}`);
      console.log(`  ${c('dim', `Company: ${company} | Model: ${config.mode === 'live' ? config.anthropic.model : 'template'}`)}\n`);
    }

    const report = await this.withInterrupt((signal) =>
      orchestrator.run(company, { signal, bypassCache: opts.bypassCache }));
    if (report === null) return EXIT_CANCELLED;

    if (opts.json) {
      console.log(JSON.stringify(report, null, 2));
    } else {
      console.log();
      for (const line of formatReportSummary(report)) console.log(`  ${line}`);
      console.log(`\n  ${c(statusColor(report.status), report.status)} ${c('dim', `— ${(report.durationMs / 1000).toFixed(1)}s`)}\n`);
    }
    return report.status === 'failed' ? EXIT_FAILED : EXIT_OK;
  }

  // ── Subcommand: batch ───────────────────────────────────────────

  private async handleBatch(args: string[]): Promise<number> {
    const opts = parseBatchArgs(args);
    if (opts.help) {
      this.printHelp();
      return EXIT_OK;
    }
    if (opts.companies.length === 0) {
      throw new UsageError('batch needs at least one company name');
    }

    const config = this.loadConfig(opts.demo);
    const { orchestrator } = await createProspector(config);
    const batch = new BatchProspector(orchestrator);

    const result = await this.withInterrupt((signal) => batch.run(opts.companies, {
      concurrency: opts.concurrency,
      bypassCache: opts.bypassCache,
      signal,
      onProgress: opts.json ? undefined : (p) => {
        const mark = p.status === 'running' ? c('cyan', '…') : p.status === 'completed' ? c('green', '✓') : c('red', '✗');
        process.stderr.write(`  ${mark} ${p.current} ${c('dim', `(${p.completed}/${p.total})`)}${p.error ? ` ${c('red', p.error)}` : ''}\n`);
      },
    }));
    if (result === null) return EXIT_CANCELLED;

    if (opts.json) {
      console.log(JSON.stringify(result, null, 2));
    } else {
      console.log(`\n${result.comparative}\n`);
      console.log(`  ${c('dim', `Total: ${(result.totalDurationMs / 1000).toFixed(1)}s`)}\n`);
    }
    const anyFailed = result.companies.some(r => !r.report || r.report.status === 'failed');
    return anyFailed ? EXIT_FAILED : EXIT_OK;
  }

  // ── Subcommand: cache ───────────────────────────────────────────

  private async handleCache(args: string[]): Promise<number> {
    const opts = parseCacheArgs(args);
    if (opts.action === 'help') {
      this.printHelp();
      return EXIT_OK;
    }

    const config = this.loadConfig(false);
    const cache = await createReportCache(config.cache);

    switch (opts.action) {
      case 'list': {
        const entries = await cache.list();
        if (entries.length === 0) {
          console.log(`  ${c('dim', 'Cache is empty.')}`);
          return EXIT_OK;
        }
        console.log(`\n  ${c('bold', 'Cached companies')} ${c('dim', `(${entries.length})`)}\n`);
        for (const entry of entries) {
          console.log(`  ${c('cyan', entry.company.padEnd(30))} ${c(statusColor(entry.status), entry.status.padEnd(16))} ${c('dim', entry.createdAt)}`);
        }
        console.log();
        return EXIT_OK;
      }
      case 'invalidate': {
        const removed = await cache.invalidate(subjectKey(opts.company));
        console.log(removed
          ? `  ${c('green', '✓')} Removed ${opts.company} from the cache`
          : `  ${c('dim', `${opts.company} was not cached`)}`);
        return EXIT_OK;
      }
      case 'clear':
        await cache.clear();
        console.log(`  ${c('green', '✓')} Cache cleared`);
        return EXIT_OK;
    }
  }

  // ── Helpers ─────────────────────────────────────────────────────

  private loadConfig(demo: boolean): AppConfig {
    const config = loadConfig(demo ? { ...process.env, PROSPECT_MODE: 'demo' } : process.env);
    setLogLevel(config.logLevel);
    return config;
  }

  /** Run `task` with Ctrl-C wired to its abort signal; null when cancelled */
  private async withInterrupt<T>(task: (signal: AbortSignal) => Promise<T>): Promise<T | null> {
    const controller = new AbortController();
    const onSigint = () => {
      process.stderr.write(`\n  ${c('yellow', 'Cancelling…')}\n`);
      controller.abort();
    };
    process.once('SIGINT', onSigint);
    try {
      const result = await task(controller.signal);
      // Batch runs absorb per-company cancellation; report it here instead
      if (controller.signal.aborted) {
        console.error(`  ${c('yellow', 'Cancelled.')}`);
        return null;
      }
      return result;
    } catch (err) {
      if (err instanceof RunCancelledError) {
        console.error(`  ${c('yellow', 'Cancelled.')} ${c('dim', err.message)}`);
        return null;
      }
      throw err;
    } finally {
      process.off('SIGINT', onSigint);
    }
  }

  private ask(question: string): Promise<string> {
    const rl = createInterface({ input: process.stdin, output: process.stdout });
    return new Promise((resolve) => {
      rl.question(`  ${c('cyan', question)}`, (answer) => {
        rl.close();
        resolve(answer.trim());
      });
    });
  }

  private printProgress(event: OrchestratorEvent): void {
    const p = isRecord(event.payload) ? event.payload : {};
    const stage = typeof p.stage === 'string' ? p.stage : '';
    switch (event.type) {
      case 'CacheHit':
        process.stderr.write(`  ${c('magenta', '[cache]')} ${c('dim', 'hit — no stages run')}\n`);
        break;
      case 'StageStarted':
        process.stderr.write(`  ${c('magenta', `[${stage}]`)} ${c('dim', `attempt ${String(p.attempt)}`)}\n`);
        break;
      case 'StageRetrying':
        process.stderr.write(`  ${c('magenta', `[${stage}]`)} ${c('yellow', `retrying in ${String(p.delayMs)}ms`)} ${c('dim', String(p.error))}\n`);
        break;
      case 'StageFailed':
        process.stderr.write(`  ${c('magenta', `[${stage}]`)} ${c('red', `failed (${String(p.kind)})`)} ${c('dim', String(p.error))}\n`);
        break;
      case 'StageSkipped':
        process.stderr.write(`  ${c('magenta', `[${stage}]`)} ${c('dim', 'skipped')}\n`);
        break;
      case 'CacheWriteFailed':
        process.stderr.write(`  ${c('yellow', 'Warning:')} report not cached — ${String(p.error)}\n`);
        break;
      case 'ReportArchived':
        process.stderr.write(`  ${c('dim', `Report saved to: ${String(p.location)}`)}\n`);
        break;
      default:
        break;
    }
  }

  private printHelp(): void {
    console.log(`
  ${c('bold', 'Prospect Intel')} ${c('dim', '— sales intelligence for one company or many')}

  ${c('bold', 'Usage:')}
    prospect run [options] [company]        Research, analyse, find contacts, draft outreach
    prospect batch [options] <company...>   Run several companies and compare them
    prospect cache list                     Show cached companies
    prospect cache invalidate <company>     Drop one cached report
    prospect cache clear                    Drop every cached report
    prospect help                           Show this help

  ${c('bold', 'Options:')}
    --no-cache           Ignore any cached report (the new one is still cached)
    --json               Print the report as JSON
    --demo               Simulated search and template responses, no API calls
    -c, --concurrency N  Companies processed at once in batch mode (default: 3)

  ${c('bold', 'Environment:')}
    ANTHROPIC_API_KEY          Language model key (live mode)
    GOOGLE_SEARCH_API_KEY      Custom Search API key (live mode)
    GOOGLE_SEARCH_ENGINE_ID    Custom Search engine id (live mode)
    PROSPECT_MODE              live | demo (default: live when all keys are set)
    PROSPECT_MODEL             Model override (default: claude-haiku-4-5-20251001)
    PROSPECT_CACHE_BACKEND     file | memory (default: file)
    PROSPECT_CACHE_FILE        Cache file path (default: prospect-cache.json)
    PROSPECT_CACHE_TTL_HOURS   Ignore cached reports older than this
    PROSPECT_REPORTS_DIR       Archive directory (default: reports)
    PROSPECT_LOG_LEVEL         debug | info | warn | error | silent

  ${c('bold', 'Exit codes:')}
    0 completed or partial_failure · 1 failed · 130 cancelled
`);
  }
}

// ── Entry point ─────────────────────────────────────────────────────

const cli = new ProspectCli();
cli.start()
  .then((code) => {
    process.exitCode = code;
  })
  .catch((err: unknown) => {
    console.error(`${c('red', 'Fatal:')} ${errorMessage(err)}`);
    process.exit(1);
  });
