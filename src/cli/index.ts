import { Command } from 'commander';
import { readFileSync } from 'fs';
import { dirname, resolve } from 'path';
import { fileURLToPath } from 'url';
import { loadConfig } from '../core/config/loader.js';
import { systemDefaults } from '../core/config/resolver.js';
import { LicenseRegistryClient } from '../core/registry/client.js';
import { runDirect, runInteractive, runList, type CreateContext } from './commands/create.js';
import { createClackPrompter } from './prompts.js';
import { logger as log } from '../utils/logger.js';
import { InteractionCancelledError } from '../utils/errors.js';

const __dirname = dirname(fileURLToPath(import.meta.url));

function readVersion(): string {
  const pkg: unknown = JSON.parse(readFileSync(resolve(__dirname, '../../package.json'), 'utf-8'));
  if (typeof pkg === 'object' && pkg !== null && 'version' in pkg && typeof pkg.version === 'string') {
    return pkg.version;
  }
  return '0.0.0';
}

export interface CliOptions {
  author?: string;
  year?: string;
  license?: string;
  interactive: boolean;
  list?: boolean;
  verbose?: boolean;
  quiet?: boolean;
}

/** Create the CLI program. */
export function createCli(): Command {
  return new Command()
    .name('lic')
    .description('Initialize a LICENSE file from the license registry (default: direct mode)')
    .version(readVersion())
    .option('-a, --author <name>', 'Copyright holder name (defaults to git config user.name)')
    .option('-y, --year <year>', 'Copyright year (defaults to the current year)')
    .option('-l, --license <key>', "License key, e.g. mit, apache-2.0, gpl-3.0 (direct mode defaults to 'mit')")
    .option('-i, --interactive', 'Pick the license and values through prompts', false)
    .option('--list', 'List available licenses and exit')
    .option('--verbose', 'Print debug output')
    .option('--quiet', 'Only print errors')
    .action(async (options: CliOptions) => {
      try {
        await runCli(options);
      } catch (error) {
        // the prompt session already reported the cancellation
        if (!(error instanceof InteractionCancelledError)) {
          log.error(error instanceof Error ? error.message : 'Unknown error', error instanceof Error ? error : undefined);
        }
        process.exit(1);
      }
    });
}

async function runCli(options: CliOptions): Promise<void> {
  const config = loadConfig();
  log.setLevel(options.verbose ? 'debug' : options.quiet ? 'error' : config.logLevel);

  const client = new LicenseRegistryClient({
    baseUrl: config.registryUrl,
    userAgent: config.userAgent,
  });

  if (options.list) {
    await runList(client);
    return;
  }

  const context: CreateContext = {
    client,
    cwd: process.cwd(),
    defaults: systemDefaults,
  };

  if (options.interactive) {
    await runInteractive(options, context, await createClackPrompter());
  } else {
    await runDirect(options, context);
  }
}
