/**
 * Git identity lookup.
 */
import { execFileSync } from 'child_process';

/** Default timeout for git commands in milliseconds */
const GIT_COMMAND_TIMEOUT_MS = 10000;

/**
 * Read the configured `user.name` from git.
 *
 * @param cwd - Directory to run git in (repository-local config applies)
 * @returns The trimmed name, or null when git is missing, unconfigured or prints nothing
 */
export function getGitUserName(cwd: string = process.cwd()): string | null {
  try {
    const result = execFileSync('git', ['config', 'user.name'], {
      cwd,
      encoding: 'utf-8',
      stdio: ['pipe', 'pipe', 'pipe'],
      timeout: GIT_COMMAND_TIMEOUT_MS,
    });
    return result.trim() || null;
  } catch { /* git unavailable or user.name unset */
    return null;
  }
}
