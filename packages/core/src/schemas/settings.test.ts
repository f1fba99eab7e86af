import { describe, it, expect } from "vitest";
import { SettingsSchema, LoggingConfigSchema } from "./settings.js";

describe("SettingsSchema", () => {
  it("maps environment variables to settings", () => {
    const settings = SettingsSchema.parse({
      IDEVSPATH: "/opt/idrive",
      IDRIVEID: "backup@example.com",
      IDPWDFILE: "/etc/idrive/password",
      IDKEYFILE: "/etc/idrive/key",
      EVS_LOG_LEVEL: "debug",
      EVS_LOG_PRETTY: "true",
    });

    expect(settings).toEqual({
      executableDir: "/opt/idrive",
      accountId: "backup@example.com",
      passwordFile: "/etc/idrive/password",
      privateKeyFile: "/etc/idrive/key",
      logging: { level: "debug", pretty: true },
    });
  });

  it("leaves credentials undefined and applies logging defaults", () => {
    const settings = SettingsSchema.parse({});

    expect(settings.executableDir).toBeUndefined();
    expect(settings.accountId).toBeUndefined();
    expect(settings.passwordFile).toBeUndefined();
    expect(settings.privateKeyFile).toBeUndefined();
    expect(settings.logging).toEqual({ level: "info", pretty: false });
  });

  it("treats blank values as unset", () => {
    const settings = SettingsSchema.parse({
      IDRIVEID: "   ",
      EVS_LOG_LEVEL: "",
      EVS_LOG_PRETTY: "",
    });

    expect(settings.accountId).toBeUndefined();
    expect(settings.logging).toEqual({ level: "info", pretty: false });
  });

  it("trims surrounding whitespace from paths", () => {
    const settings = SettingsSchema.parse({ IDEVSPATH: " /opt/idrive " });
    expect(settings.executableDir).toBe("/opt/idrive");
  });

  it("rejects an unknown log level", () => {
    expect(() => SettingsSchema.parse({ EVS_LOG_LEVEL: "verbose" })).toThrow();
  });

  it("ignores unrelated environment variables", () => {
    const settings = SettingsSchema.parse({ HOME: "/home/backup", PATH: "/usr/bin" });
    expect(settings.accountId).toBeUndefined();
  });
});

describe("LoggingConfigSchema", () => {
  it("fills defaults", () => {
    expect(LoggingConfigSchema.parse({})).toEqual({ level: "info", pretty: false });
  });
});
