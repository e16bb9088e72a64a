/**
 * Interactive prompts
 */

import inquirer from 'inquirer';
import { AuthCancelledError } from '../../core/errors.js';
import { formatBadges } from '../../core/profile/classify.js';
import type { ProfileStore } from '../../core/profile/store.js';
import { DEFAULT_PROFILE_NAME } from '../../core/profile/store.js';
import type { MfaPromptRequest, Prompter } from '../../core/resolver/prompter.js';

// Prompts render on stderr so stdout stays with the wrapped command
const prompt = inquirer.createPromptModule({ output: process.stderr });

/**
 * Reject with AuthCancelledError as soon as the signal aborts
 */
export function abortable<T>(promise: Promise<T>, signal?: AbortSignal): Promise<T> {
  if (!signal) {
    return promise;
  }
  if (signal.aborted) {
    return Promise.reject(new AuthCancelledError());
  }

  return new Promise<T>((resolve, reject) => {
    const onAbort = (): void => reject(new AuthCancelledError());
    signal.addEventListener('abort', onAbort, { once: true });

    promise.then(
      (value) => {
        signal.removeEventListener('abort', onAbort);
        resolve(value);
      },
      (error: unknown) => {
        signal.removeEventListener('abort', onAbort);
        reject(error);
      }
    );
  });
}

/**
 * Prompter backed by inquirer; input is hidden, not masked
 */
export class InquirerPrompter implements Prompter {
  async mfaCode(request: MfaPromptRequest): Promise<string> {
    const { code } = await abortable(
      prompt<{ code: string }>([
        {
          type: 'password',
          name: 'code',
          message: `Enter MFA code (6 digits) for ${request.serial} [${request.attempt}/${request.maxAttempts}]:`,
        },
      ]),
      request.signal
    );
    return code;
  }

  /**
   * Ask for the cache passphrase; empty input means none
   */
  async passphrase(signal?: AbortSignal): Promise<string | undefined> {
    const { passphrase } = await abortable(
      prompt<{ passphrase: string }>([
        {
          type: 'password',
          name: 'passphrase',
          message: 'Cache passphrase (empty to skip caching):',
        },
      ]),
      signal
    );
    return passphrase === '' ? undefined : passphrase;
  }
}

/**
 * Let the user pick a profile from a list
 */
export async function selectProfile(store: ProfileStore, signal?: AbortSignal): Promise<string> {
  const { profile } = await abortable(
    prompt<{ profile: string }>([
      {
        type: 'list',
        name: 'profile',
        message: 'Select profile',
        choices: store.list().map((p) => ({
          name: `${p.name} ${formatBadges(p)}`.trim(),
          value: p.name,
        })),
        default: store.has(DEFAULT_PROFILE_NAME) ? DEFAULT_PROFILE_NAME : undefined,
      },
    ]),
    signal
  );
  return profile;
}
