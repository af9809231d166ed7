/**
 * Creates a LICENSE file, either from flags alone or by prompting.
 */
import chalk from 'chalk';
import {
  resolveDirectParameters,
  defaultAuthor,
  currentYear,
  flagValue,
  type DefaultsSource,
  type ParameterFlags,
} from '../../core/config/resolver.js';
import type { LicenseRegistryClient } from '../../core/registry/client.js';
import { renderLicense } from '../../core/render/placeholders.js';
import { writeLicenseFile } from '../../core/output/license-file.js';
import type { RunParameters } from '../../core/types.js';
import { logger as log } from '../../utils/logger.js';
import type { Prompter } from '../prompts.js';

export type RegistryClient = Pick<LicenseRegistryClient, 'listLicenses' | 'fetchLicense'>;

export interface CreateContext {
  client: RegistryClient;
  /** Directory the LICENSE file is written to */
  cwd: string;
  defaults: DefaultsSource;
}

export interface CreateResult {
  parameters: RunParameters;
  displayName: string;
  filePath: string;
}

/**
 * Fetch, render and write. Nothing is written unless every earlier step succeeds.
 */
async function generate(parameters: RunParameters, context: CreateContext): Promise<CreateResult> {
  log.debug('Resolved parameters', { ...parameters });

  const license = await context.client.fetchLicense(parameters.licenseKey);
  const content = renderLicense(license.body, {
    year: parameters.copyrightYear,
    author: parameters.authorName,
  });
  const filePath = await writeLicenseFile(context.cwd, content);

  log.debug(`Wrote ${filePath}`);
  return { parameters, displayName: license.displayName, filePath };
}

/**
 * Direct mode: flags plus defaults, no prompts.
 */
export async function runDirect(flags: ParameterFlags, context: CreateContext): Promise<CreateResult> {
  const parameters = resolveDirectParameters(flags, context.defaults);
  const result = await generate(parameters, context);

  log.success(
    `Created ${result.displayName} license for ${parameters.authorName} (${parameters.copyrightYear}).`
  );
  return result;
}

/**
 * Interactive mode: prompts for every value not given as a flag.
 */
export async function runInteractive(
  flags: ParameterFlags,
  context: CreateContext,
  prompter: Prompter
): Promise<CreateResult> {
  prompter.intro(' 📜 Initialize License');

  let licenseKey = flagValue(flags.license);
  if (licenseKey === undefined) {
    const licenses = await context.client.listLicenses();
    licenseKey = await prompter.selectLicense(licenses);
  }

  const authorName = flagValue(flags.author) ?? await prompter.text({
    message: 'Copyright holder name',
    initialValue: defaultAuthor(context.defaults),
  });

  const copyrightYear = flagValue(flags.year) ?? await prompter.text({
    message: 'Copyright year',
    initialValue: currentYear(context.defaults),
  });

  const result = await generate({ licenseKey, authorName, copyrightYear }, context);

  prompter.outro(`✅ ${result.displayName} license created for ${authorName}!`);
  return result;
}

/**
 * Print the registry's licenses as aligned columns.
 */
export async function runList(client: RegistryClient): Promise<void> {
  const licenses = await client.listLicenses();

  if (licenses.length === 0) {
    log.warn('The license registry returned no licenses.');
    return;
  }

  const keyWidth = Math.max(...licenses.map((l) => l.key.length));
  const spdxWidth = Math.max(...licenses.map((l) => l.spdxId.length));

  for (const license of licenses) {
    console.log(
      `${chalk.cyan(license.key.padEnd(keyWidth))}  ${chalk.dim(license.spdxId.padEnd(spdxWidth))}  ${license.displayName}`
    );
  }
}
