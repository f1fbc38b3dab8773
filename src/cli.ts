import { Command, CommanderError, InvalidArgumentError, Option } from 'commander';
import { createInterface } from 'node:readline';
import type { Dispatcher } from 'undici';
import { allResults, analyzePage } from './analyze.js';
import { DEFAULT_CONFIG, findBlockedSite } from './config.js';
import { fetchPage, FetchError, probeConnectivity, readLocalPage } from './fetch.js';
import { renderJson, renderMarkdown, renderText } from './report.js';
import type { RawResponse } from './types.js';

const VERSION = '0.1.0';

type Format = 'text' | 'json' | 'markdown';

interface CliOptions {
  timeout: number;
  format: Format;
  encoding?: string;
  yes: boolean;
  checkNetwork: boolean;
  strict: boolean;
  verbose: boolean;
}

/** Where the CLI writes and asks. The report goes to `out`; everything else to `err`. */
export interface CliIo {
  out(text: string): void;
  err(text: string): void;
  confirm(question: string): Promise<boolean>;
  dispatcher?: Dispatcher;
}

function confirm(question: string): Promise<boolean> {
  // stderr keeps the prompt out of piped reports
  const rl = createInterface({ input: process.stdin, output: process.stderr });
  return new Promise((resolve) => {
    rl.question(question, (answer) => {
      rl.close();
      resolve(answer.trim().toLowerCase() === 'y');
    });
  });
}

export const consoleIo: CliIo = {
  out: (text) => console.log(text),
  err: (text) => console.error(text),
  confirm,
};

function parseIntOption(v: string): number {
  const n = parseInt(v, 10);
  if (Number.isNaN(n) || n <= 0) throw new InvalidArgumentError('Expected a positive integer.');
  return n;
}

async function load(target: string, opts: CliOptions, io: CliIo): Promise<RawResponse | undefined> {
  if (!/^https?:\/\//i.test(target)) {
    try {
      return readLocalPage(target);
    } catch (err) {
      io.err(`Cannot read ${target}: ${err instanceof Error ? err.message : String(err)}`);
      return undefined;
    }
  }
  try {
    const raw = await fetchPage(target, { timeoutMs: opts.timeout, dispatcher: io.dispatcher });
    if (raw.status !== 200) io.err(`Warning: non-200 status (${raw.status}); analyzing anyway`);
    return raw;
  } catch (err) {
    if (!(err instanceof FetchError)) throw err;
    io.err(`✗ ${err.message}`);
    if (err.kind === 'timeout') io.err('Try a longer --timeout or check the network.');
    if (err.kind === 'tls') io.err('The TLS certificate could not be verified.');
    if (err.kind === 'connection') io.err('The site may be blocked or unreachable, or DNS resolution failed.');
    return undefined;
  }
}

function buildProgram(io: CliIo): Command {
  return new Command()
    .name('seo-probe')
    .version(VERSION)
    .argument('<target>', 'URL or local HTML file')
    .option('--timeout <ms>', 'request timeout', parseIntOption, 10000)
    .addOption(new Option('--format <format>', 'output format').choices(['text', 'json', 'markdown']).default('text'))
    .option('--encoding <name>', 'override the declared response encoding')
    .option('-y, --yes', 'skip the blocked-site confirmation', false)
    .option('--check-network', 'probe a few well-known sites first', false)
    .option('--strict', 'exit non-zero if any check fails', false)
    .option('--verbose', 'print decode diagnostics', false)
    .exitOverride()
    .configureOutput({ writeOut: (s) => io.out(s.trimEnd()), writeErr: (s) => io.err(s.trimEnd()) });
}

/**
 * Runs the CLI over user arguments (no node/script prefix) and resolves to
 * the exit code: 0 ok or declined, 1 a check failed under `--strict`,
 * 2 nothing to analyze.
 */
export async function run(argv: readonly string[], io: CliIo = consoleIo): Promise<number> {
  const program = buildProgram(io);
  try {
    program.parse([...argv], { from: 'user' });
  } catch (err) {
    if (err instanceof CommanderError) return err.exitCode;
    throw err;
  }

  const opts = program.opts<CliOptions>();
  const target = program.args[0];

  if (opts.checkNetwork) {
    io.err('Network check...');
    for (const r of await probeConnectivity(DEFAULT_CONFIG.connectivityProbes, { dispatcher: io.dispatcher })) {
      io.err(r.reachable ? `  ✓ ${r.name}: reachable (status ${r.status})` : `  ✗ ${r.name}: unreachable (${r.error})`);
    }
  }

  const blocked = findBlockedSite(target);
  if (blocked && !opts.yes) {
    io.err(`Note: ${blocked} may not be reachable from every network. Sites that usually are:`);
    for (const site of DEFAULT_CONFIG.suggestedSites) io.err(`  - ${site}`);
    if (!(await io.confirm('Continue anyway? (y/n): '))) return 0;
  }

  const raw = await load(target, opts, io);
  if (!raw) {
    io.err('Nothing to analyze: check the network, the address, and whether the site is reachable.');
    return 2;
  }

  const report = analyzePage(opts.encoding ? { ...raw, declaredEncoding: opts.encoding } : raw);
  if (opts.verbose && report.decode) {
    const { encoding, stage, degraded, detection } = report.decode;
    io.err(`decode: ${encoding} via ${stage}${degraded ? ' (degraded)' : ''}${detection ? `, detected ${detection.encoding} @ ${detection.confidence.toFixed(2)}` : ''}`);
  }

  const render = opts.format === 'json' ? renderJson : opts.format === 'markdown' ? renderMarkdown : renderText;
  io.out(render(report));

  return opts.strict && allResults(report).some((r) => r.status === 'fail') ? 1 : 0;
}
