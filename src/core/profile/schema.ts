/**
 * Zod schema for a single profile's raw attributes
 */

import { z } from "zod";
import type { Profile } from "../../types/profile.js";

const optionalString = z
  .string()
  .optional()
  .transform((value) => (value && value.trim() !== "" ? value.trim() : undefined));

/**
 * Raw INI keys merged from the config and credentials files
 */
export const rawProfileSchema = z.object({
  region: optionalString.pipe(
    z
      .string()
      .regex(/^[a-z]{2}(-gov|-iso[a-z]*)?-[a-z]+-\d+$/, "Must be a valid AWS region")
      .optional()
  ),
  sso_start_url: optionalString.pipe(z.string().url("Must be a URL").optional()),
  sso_region: optionalString,
  sso_session: optionalString,
  role_arn: optionalString.pipe(
    z
      .string()
      .regex(/^arn:aws[a-z-]*:iam::\d{12}:role\/.+$/, "Must be an IAM role ARN")
      .optional()
  ),
  source_profile: optionalString,
  mfa_serial: optionalString,
  aws_access_key_id: optionalString,
  aws_secret_access_key: optionalString,
  aws_session_token: optionalString,
  duration_seconds: optionalString.pipe(
    z.coerce
      .number()
      .int("Must be a whole number of seconds")
      .min(900, "Must be at least 900")
      .max(43200, "Must be at most 43200")
      .optional()
  ),
  external_id: optionalString,
  role_session_name: optionalString.pipe(
    z
      .string()
      .regex(/^[\w+=,.@-]{2,64}$/, "Must be 2-64 characters of [\\w+=,.@-]")
      .optional()
  ),
});

export type RawProfile = z.input<typeof rawProfileSchema>;

/**
 * Validate raw attributes and build a Profile
 */
export function parseProfile(
  name: string,
  raw: Record<string, string | undefined>
):
  | { success: true; profile: Profile }
  | { success: false; issues: string[] } {
  const result = rawProfileSchema.safeParse(raw);

  if (!result.success) {
    return {
      success: false,
      issues: result.error.issues.map(
        (issue) => `${issue.path.join(".")}: ${issue.message}`
      ),
    };
  }

  const data = result.data;
  return {
    success: true,
    profile: {
      name,
      region: data.region,
      ssoStartUrl: data.sso_start_url,
      ssoRegion: data.sso_region,
      ssoSession: data.sso_session,
      roleArn: data.role_arn,
      sourceProfile: data.source_profile,
      mfaSerial: data.mfa_serial,
      accessKeyId: data.aws_access_key_id,
      secretAccessKey: data.aws_secret_access_key,
      sessionToken: data.aws_session_token,
      durationSeconds: data.duration_seconds,
      externalId: data.external_id,
      roleSessionName: data.role_session_name,
    },
  };
}
