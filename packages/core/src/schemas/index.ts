export {
  DEFAULTS,
  LogLevel,
  LoggingConfigSchema,
  SettingsSchema,
  SETTING_VARIABLES,
  type Settings,
  type LoggingConfig,
  type CredentialSetting,
} from "./settings.js";
