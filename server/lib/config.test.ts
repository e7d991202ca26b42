import { describe, expect, it } from "vitest";
import { ConfigError, loadConfig } from "./config";

describe("loadConfig", () => {
  it("uses router defaults when nothing is set", () => {
    const config = loadConfig({});

    expect(config.port).toBe(8048);
    expect(config.host).toBe("0.0.0.0");
    expect(config.logFile).toBe("/tmp/router-console.log");
    expect(config.lockFile).toBe("/tmp/router-console.lock");
    expect(config.workDir).toBe("/tmp");
    expect(config.historyFile).toBe("/tmp/router-console-runs.json");
    expect(config.commandTimeout).toBe(30 * 60 * 1000);
    expect(config.backupGlob).toBe("/tmp/backup-*.tar.gz");
  });

  it("reads overrides from the environment", () => {
    const config = loadConfig({
      PORT: "9000",
      RUNNER_LOG_FILE: "/var/log/console.log",
      SERVICE_RUNNER_URL: "https://scripts.example.com/runner.sh",
    });

    expect(config.port).toBe(9000);
    expect(config.logFile).toBe("/var/log/console.log");
    expect(config.serviceRunnerUrl).toBe("https://scripts.example.com/runner.sh");
  });

  it("rejects invalid values with every issue listed", () => {
    try {
      loadConfig({ PORT: "not-a-port", EXPAND_SCRIPT_URL: "nope" });
      expect.unreachable("loadConfig should throw");
    } catch (err) {
      expect(err).toBeInstanceOf(ConfigError);
      if (err instanceof ConfigError) {
        expect(err.issues).toHaveLength(2);
        expect(err.issues[0]).toMatch(/^PORT: /);
        expect(err.issues[1]).toMatch(/^EXPAND_SCRIPT_URL: /);
      }
    }
  });

  it("returns a frozen object", () => {
    const config = loadConfig({});
    expect(Object.isFrozen(config)).toBe(true);
    expect(Object.isFrozen(config.scripts)).toBe(true);
  });
});
