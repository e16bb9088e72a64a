/**
 * Zod schemas for awrap settings validation
 */

import { z } from "zod";

const TRUE_VALUES = ["1", "true", "yes", "on"];
const FALSE_VALUES = ["0", "false", "no", "off", ""];

/**
 * Boolean environment flag
 */
const flag = (defaultValue: boolean) =>
  z
    .string()
    .optional()
    .transform((value, ctx) => {
      if (value === undefined) {
        return defaultValue;
      }
      const normalized = value.trim().toLowerCase();
      if (TRUE_VALUES.includes(normalized)) {
        return true;
      }
      if (FALSE_VALUES.includes(normalized)) {
        return false;
      }
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        message: "Must be one of 1/0, true/false, yes/no, on/off",
      });
      return z.NEVER;
    });

/**
 * Integer environment value within [min, max]
 */
const boundedInt = (defaultValue: number, min: number, max: number) =>
  z
    .string()
    .optional()
    .transform((value, ctx) => {
      if (value === undefined || value.trim() === "") {
        return defaultValue;
      }
      const parsed = Number(value);
      if (!Number.isInteger(parsed) || parsed < min || parsed > max) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          message: `Must be an integer between ${min} and ${max}`,
        });
        return z.NEVER;
      }
      return parsed;
    });

const nonEmpty = z
  .string()
  .optional()
  .transform((value) => (value && value.trim() !== "" ? value : undefined));

/**
 * Environment variables consumed by awrap
 */
export const settingsEnvSchema = z.object({
  AWS_PROFILE: nonEmpty,
  AWS_REGION: nonEmpty,
  AWS_DEFAULT_REGION: nonEmpty,
  AWS_CONFIG_FILE: nonEmpty,
  AWS_SHARED_CREDENTIALS_FILE: nonEmpty,
  AWRAP_NO_INTERACTIVE: flag(false),
  AWRAP_CACHE: flag(false),
  AWRAP_CACHE_STATIC: flag(true),
  AWRAP_CACHE_PASSPHRASE: nonEmpty,
  AWRAP_CACHE_DIR: nonEmpty,
  AWRAP_CONNECT_TIMEOUT_MS: boundedInt(5000, 1, 600_000),
  AWRAP_REQUEST_TIMEOUT_MS: boundedInt(30_000, 1, 600_000),
  AWRAP_SESSION_DURATION: boundedInt(3600, 900, 43_200),
  AWRAP_AWS_CLI: nonEmpty,
});

export type SettingsEnv = z.infer<typeof settingsEnvSchema>;

/**
 * Validate environment variables with safe parsing (returns result object)
 */
export function validateSettingsEnvSafe(env: Record<string, string | undefined>) {
  return settingsEnvSchema.safeParse(env);
}
