/**
 * Interactive prompts backed by @clack/prompts.
 */
import type { LicenseSummary } from '../core/types.js';
import { InteractionCancelledError } from '../utils/errors.js';

export interface TextPromptOptions {
  message: string;
  /** Pre-filled, editable value; also used when the input is submitted empty */
  initialValue: string;
}

/**
 * The prompts the interactive flow needs. Each prompt rejects with
 * InteractionCancelledError when the user aborts.
 */
export interface Prompter {
  intro(title: string): void;
  selectLicense(licenses: readonly LicenseSummary[]): Promise<string>;
  text(options: TextPromptOptions): Promise<string>;
  outro(message: string): void;
}

const CANCEL_MESSAGE = 'Operation cancelled.';

/**
 * Empty input is allowed through; the prompt substitutes `defaultValue` on submit.
 */
function rejectBlank(value: string | undefined): string | undefined {
  if (value && !value.trim()) return 'A value is required';
  return undefined;
}

/**
 * Options handed to the text prompt. No placeholder is set: the prompt would
 * submit it in place of an empty answer.
 */
export function textPromptOptions({ message, initialValue }: TextPromptOptions) {
  return {
    message,
    initialValue,
    defaultValue: initialValue,
    validate: rejectBlank,
  };
}

/**
 * Create a terminal prompter.
 * The prompt library is imported lazily so direct mode never loads it.
 */
export async function createClackPrompter(): Promise<Prompter> {
  const clack = await import('@clack/prompts');

  const unlessCancelled = <T>(value: T | symbol): T => {
    if (clack.isCancel(value)) {
      clack.cancel(CANCEL_MESSAGE);
      throw new InteractionCancelledError(CANCEL_MESSAGE);
    }
    return value;
  };

  return {
    intro(title) {
      clack.intro(title);
    },

    async selectLicense(licenses) {
      const choice = await clack.select<string>({
        message: 'Pick a license template',
        options: licenses.map((license) => ({
          value: license.key,
          label: license.displayName,
          hint: license.spdxId,
        })),
      });
      return unlessCancelled(choice);
    },

    async text(options) {
      const answer = unlessCancelled(await clack.text(textPromptOptions(options))).trim();
      return answer || options.initialValue;
    },

    outro(message) {
      clack.outro(message);
    },
  };
}
