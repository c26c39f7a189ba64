// Argument parsing for the prospect CLI (kept free of side effects)

export interface RunArgs {
  company: string;
  bypassCache: boolean;
  json: boolean;
  demo: boolean;
  help: boolean;
}

export interface BatchArgs {
  companies: string[];
  concurrency: number;
  bypassCache: boolean;
  json: boolean;
  demo: boolean;
  help: boolean;
}

export type CacheArgs =
  | { action: 'list' }
  | { action: 'invalidate'; company: string }
  | { action: 'clear' }
  | { action: 'help' };

export class UsageError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'UsageError';
  }
}

export function parseRunArgs(args: string[]): RunArgs {
  const parsed: RunArgs = { company: '', bypassCache: false, json: false, demo: false, help: false };
  const nameParts: string[] = [];

  for (const arg of args) {
    if (arg === '--no-cache') parsed.bypassCache = true;
    else if (arg === '--json') parsed.json = true;
    else if (arg === '--demo') parsed.demo = true;
    else if (arg === '--help' || arg === '-h') parsed.help = true;
    else if (arg.startsWith('--')) throw new UsageError(`Unknown option: ${arg}`);
    else nameParts.push(arg);
  }

  parsed.company = nameParts.join(' ').trim();
  return parsed;
}

export function parseBatchArgs(args: string[]): BatchArgs {
  const parsed: BatchArgs = {
    companies: [], concurrency: 3, bypassCache: false, json: false, demo: false, help: false,
  };

  for (let i = 0; i < args.length; i++) {
    const arg = args[i];
    if (arg === '--concurrency' || arg === '-c') {
      const value = Number(args[++i]);
      if (!Number.isInteger(value) || value < 1) {
        throw new UsageError(`--concurrency needs a positive integer (got "${args[i] ?? ''}")`);
      }
      parsed.concurrency = value;
    } else if (arg === '--no-cache') parsed.bypassCache = true;
    else if (arg === '--json') parsed.json = true;
    else if (arg === '--demo') parsed.demo = true;
    else if (arg === '--help' || arg === '-h') parsed.help = true;
    else if (arg.startsWith('--')) throw new UsageError(`Unknown option: ${arg}`);
    else {
      // "Acme, Globex" and "Acme" "Globex" are both accepted
      parsed.companies.push(...arg.split(',').map(s => s.trim()).filter(Boolean));
    }
  }

  return parsed;
}

export function parseCacheArgs(args: string[]): CacheArgs {
  const action: string | undefined = args[0];
  const rest = args.slice(1);
  switch (action) {
    case 'list':
    case undefined:
      return { action: 'list' };
    case 'clear':
      return { action: 'clear' };
    case 'invalidate': {
      const company = rest.join(' ').trim();
      if (!company) throw new UsageError('cache invalidate needs a company name');
      return { action: 'invalidate', company };
    }
    case 'help':
    case '--help':
    case '-h':
      return { action: 'help' };
    default:
      throw new UsageError(`Unknown cache action: ${action}`);
  }
}
