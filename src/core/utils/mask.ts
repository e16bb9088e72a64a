/**
 * Masking for identifiers that show up in messages
 */

/**
 * Extract the account id from an ARN
 *
 * `arn:partition:service:region:account-id:resource`
 */
export function extractAccountFromArn(arn: string): string | undefined {
  const parts = arn.split(":");
  if (parts.length >= 6 && parts[0] === "arn" && parts[4]) {
    return parts[4];
  }
  return undefined;
}

/**
 * Reduce the account id in an ARN to its last four digits
 *
 * Values that are not ARNs (plain MFA device serials) come back with all
 * but their last four characters masked.
 */
export function maskArn(value: string): string {
  const account = extractAccountFromArn(value);
  if (account) {
    const parts = value.split(":");
    parts[4] = maskTail(account);
    return parts.join(":");
  }
  return maskTail(value);
}

function maskTail(value: string): string {
  if (value.length <= 4) {
    return "*".repeat(value.length);
  }
  return "*".repeat(value.length - 4) + value.slice(-4);
}
