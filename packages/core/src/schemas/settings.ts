import { z } from "zod";

export const DEFAULTS = {
  logging: {
    level: "info" as const,
    pretty: false,
  },
};

export const LogLevel = z.enum(["fatal", "error", "warn", "info", "debug"]);

export const LoggingConfigSchema = z.object({
  level: LogLevel.default(DEFAULTS.logging.level),
  pretty: z.boolean().default(DEFAULTS.logging.pretty),
});

/** Environment values that are set but blank count as unset. */
function blankAsUndefined(value: unknown): unknown {
  return typeof value === "string" && value.trim() === "" ? undefined : value;
}

const pathSetting = z.preprocess(blankAsUndefined, z.string().trim().optional());

/**
 * Environment-style settings consumed by the adapter.
 * Every credential is optional at parse time: the handshake decides which
 * ones it needs and names the missing one in its ConfigError.
 */
export const SettingsSchema = z
  .object({
    IDEVSPATH: pathSetting.describe("Directory holding the idevsutil executable"),
    IDRIVEID: pathSetting.describe("IDrive account (logon) id"),
    IDPWDFILE: pathSetting.describe("File containing the account password"),
    IDKEYFILE: pathSetting.describe("File containing the private encryption key"),
    EVS_LOG_LEVEL: z.preprocess(
      blankAsUndefined,
      LogLevel.default(DEFAULTS.logging.level),
    ),
    EVS_LOG_PRETTY: z.preprocess(
      blankAsUndefined,
      z
        .enum(["true", "false"])
        .default("false")
        .transform((value) => value === "true"),
    ),
  })
  .transform((env) => ({
    executableDir: env.IDEVSPATH,
    accountId: env.IDRIVEID,
    passwordFile: env.IDPWDFILE,
    privateKeyFile: env.IDKEYFILE,
    logging: {
      level: env.EVS_LOG_LEVEL,
      pretty: env.EVS_LOG_PRETTY,
    },
  }));

export type Settings = z.infer<typeof SettingsSchema>;
export type LoggingConfig = z.infer<typeof LoggingConfigSchema>;

/** Settings keys that name a credential or path, mapped to their variable. */
export const SETTING_VARIABLES = {
  executableDir: "IDEVSPATH",
  accountId: "IDRIVEID",
  passwordFile: "IDPWDFILE",
  privateKeyFile: "IDKEYFILE",
} as const;

export type CredentialSetting = keyof typeof SETTING_VARIABLES;
