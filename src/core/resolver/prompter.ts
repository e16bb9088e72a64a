/**
 * Interactive input, as the resolver sees it
 */

/**
 * Details shown when asking for an MFA code
 */
export interface MfaPromptRequest {
  profileName: string;

  /** Masked device serial */
  serial: string;

  attempt: number;
  maxAttempts: number;

  signal?: AbortSignal;
}

export interface Prompter {
  /**
   * Ask for an MFA code without echoing it
   *
   * @throws AuthCancelledError when the user interrupts
   */
  mfaCode(request: MfaPromptRequest): Promise<string>;
}
