/**
 * Resolves run parameters from command-line flags and local defaults.
 */
import { ConfigError, ErrorCodes } from '../../utils/errors.js';
import { getGitUserName } from '../../utils/git.js';
import type { RunParameters } from '../types.js';

/** License used in direct mode when --license is not given. */
export const DEFAULT_LICENSE_KEY = 'mit';

/** Author offered by the interactive prompt when git has no identity. */
export const FALLBACK_AUTHOR = 'Your Name';

/**
 * Values that may arrive from the command line.
 */
export interface ParameterFlags {
  license?: string;
  author?: string;
  year?: string;
}

/**
 * Sources of default values. Swappable so callers can pin the clock or identity.
 */
export interface DefaultsSource {
  /** Local git identity; null when it cannot be read */
  gitUserName(): string | null;
  now(): Date;
}

export const systemDefaults: DefaultsSource = {
  gitUserName: () => getGitUserName(),
  now: () => new Date(),
};

/**
 * Blank strings count as absent; anything else is kept verbatim.
 */
export function flagValue(value: string | undefined): string | undefined {
  return value?.trim() ? value : undefined;
}

export function currentYear(defaults: DefaultsSource = systemDefaults): string {
  return String(defaults.now().getFullYear());
}

/**
 * Resolve parameters for direct (non-interactive) mode.
 *
 * @throws ConfigError when no author is given and git has none configured
 */
export function resolveDirectParameters(
  flags: ParameterFlags,
  defaults: DefaultsSource = systemDefaults
): RunParameters {
  const licenseKey = flagValue(flags.license) ?? DEFAULT_LICENSE_KEY;

  const authorName = flagValue(flags.author) ?? defaults.gitUserName();
  if (!authorName) {
    throw new ConfigError(
      ErrorCodes.MISSING_AUTHOR,
      'Author name not found. Please provide via --author or configure git.'
    );
  }

  const copyrightYear = flagValue(flags.year) ?? currentYear(defaults);

  return { licenseKey, authorName, copyrightYear };
}

/**
 * Author pre-filled in the interactive prompt.
 */
export function defaultAuthor(defaults: DefaultsSource = systemDefaults): string {
  return defaults.gitUserName() ?? FALLBACK_AUTHOR;
}
