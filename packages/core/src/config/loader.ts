import { join } from "node:path";
import { ConfigError } from "../errors/catalog.js";
import { SettingsSchema, type Settings } from "../schemas/settings.js";
import { EXECUTABLE_NAME } from "./defaults.js";

/**
 * Parse adapter settings out of an environment-style key/value map.
 * A value that is present but malformed raises ConfigError (CONFIG_INVALID)
 * naming its variable.
 */
export function loadSettings(
  env: Record<string, string | undefined> = process.env,
): Settings {
  const parsed = SettingsSchema.safeParse(env);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    const variable = issue?.path[0];
    throw ConfigError.invalid(
      typeof variable === "string" ? variable : "settings",
      issue?.message ?? "invalid value",
    );
  }
  return parsed.data;
}

export function executablePath(executableDir: string): string {
  return join(executableDir, EXECUTABLE_NAME);
}
