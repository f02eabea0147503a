/**
 * Command-line program: argument parsing, --init, and task runs.
 * Kept free of process.exit so it can be driven in-process.
 */

import { parseArgs } from 'node:util';
import { existsSync, mkdirSync, copyFileSync } from 'node:fs';
import { fileURLToPath } from 'node:url';
import { dirname, join, resolve } from 'node:path';
import { errorMessage } from '../shared/errors.js';
import { logger } from '../shared/logger.js';
import { loadConfig, resolveConfigPath } from '../config/loader.js';
import { createServices, type ServiceOverrides, type Services } from '../bootstrap.js';
import { TASKS } from '../tasks/runner.js';
import { VERSION } from '../version.js';

export interface CliIo {
  out(text: string): void;
  err(text: string): void;
  cwd: string;
}

const processIo: CliIo = {
  out: (text) => console.log(text),
  err: (text) => console.error(text),
  cwd: process.cwd(),
};

export const USAGE = `
storefront-autopilot v${VERSION} - marketing content automation

Usage:
  storefront-autopilot [serve] [options]        Start the read-only HTTP API
  storefront-autopilot run <task> [options]     Run one task and exit

Tasks:
  ${Object.keys(TASKS).join('\n  ')}

Options:
  -c, --config <path>   Path to config file (default: ./config/config.yaml)
  -i, --input <path>    Product export CSV (monthly-optimization) or
                        content plan JSON/YAML (batch-content)
  -p, --port <port>     Port to listen on (overrides config)
  --init                Create config/config.yaml from the example
  -h, --help            Show this help message
`;

function exampleConfigPath(): string {
  return join(dirname(fileURLToPath(import.meta.url)), '..', '..', 'config', 'config.example.yaml');
}

function initConfig(io: CliIo): number {
  const targetPath = resolve(io.cwd, 'config', 'config.yaml');
  const sourcePath = exampleConfigPath();

  if (existsSync(targetPath)) {
    io.err(`Error: Config file already exists at ${targetPath}`);
    return 1;
  }

  if (!existsSync(sourcePath)) {
    io.err('Error: Example config not found (package may be corrupted)');
    return 1;
  }

  mkdirSync(dirname(targetPath), { recursive: true });
  copyFileSync(sourcePath, targetPath);

  io.out(`Created config file: ${targetPath}`);
  io.out('');
  io.out('Next steps:');
  io.out('  1. Edit the config file with your API keys and brand details');
  io.out('  2. Run: storefront-autopilot run daily-content');
  return 0;
}

async function runTask(
  task: string,
  options: { config?: string; input?: string },
  io: CliIo,
  overrides: ServiceOverrides,
): Promise<number> {
  let services: Services | undefined;
  try {
    const config = loadConfig(resolveConfigPath(options.config));
    logger.level = config.settings.logLevel;
    services = createServices(config, overrides);
    const outcome = await services.runner.run(task, { input: options.input });
    io.out(JSON.stringify({ task: outcome.task, executionId: outcome.executionId, ...outcome.details }, null, 2));
    return 0;
  } catch (err: unknown) {
    io.err(`Error: ${errorMessage(err)}`);
    return 1;
  } finally {
    services?.close();
  }
}

function parseCliArgs(argv: readonly string[]) {
  return parseArgs({
    args: [...argv],
    options: {
      config: { type: 'string', short: 'c' },
      input: { type: 'string', short: 'i' },
      port: { type: 'string', short: 'p' },
      init: { type: 'boolean' },
      help: { type: 'boolean', short: 'h' },
    },
    allowPositionals: true,
  });
}

/**
 * Run the CLI against `argv` (without the node and script entries).
 * @returns Process exit code. For `serve` the server keeps running after return.
 */
export async function runCli(
  argv: readonly string[],
  io: CliIo = processIo,
  overrides: ServiceOverrides = {},
): Promise<number> {
  let parsed: ReturnType<typeof parseCliArgs>;
  try {
    parsed = parseCliArgs(argv);
  } catch (err: unknown) {
    io.err(`Error: ${errorMessage(err)}`);
    io.err(USAGE);
    return 1;
  }

  const { values, positionals } = parsed;

  if (values.help) {
    io.out(USAGE);
    return 0;
  }

  if (values.init) {
    return initConfig(io);
  }

  const [command = 'serve', ...rest] = positionals;

  if (command === 'run') {
    const [task] = rest;
    if (task === undefined || rest.length > 1) {
      io.err('Error: run expects exactly one task name');
      io.err(USAGE);
      return 1;
    }
    return runTask(task, { config: values.config, input: values.input }, io, overrides);
  }

  if (command === 'serve' && rest.length === 0) {
    // Set environment variables for the server bootstrap
    if (values.config) {
      process.env['CONFIG_PATH'] = values.config;
    }
    if (values.port) {
      process.env['PORT'] = values.port;
    }
    await import('../index.js');
    return 0;
  }

  io.err(`Error: unknown command '${positionals.join(' ')}'`);
  io.err(USAGE);
  return 1;
}
