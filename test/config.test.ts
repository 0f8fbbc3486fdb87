import { afterEach, beforeEach, describe, expect, it } from "vitest";
import fs from "node:fs";
import os from "node:os";
import path from "node:path";
import { getConfigFilePath, loadConfigOrDefault } from "../src/config.ts";

describe("config", () => {
  let root: string;
  let configPath: string;

  beforeEach(() => {
    root = fs.mkdtempSync(path.join(os.tmpdir(), "pymanager-config-"));
    configPath = path.join(root, "config.json");
  });

  afterEach(() => {
    fs.rmSync(root, { recursive: true, force: true });
  });

  it("resolves the config file location", () => {
    expect(getConfigFilePath({ XDG_CONFIG_HOME: "/tmp/xdg" })).toBe("/tmp/xdg/pymanager/config.json");
    expect(getConfigFilePath({ PYMANAGER_CONFIG: "/etc/pymanager.json", XDG_CONFIG_HOME: "/tmp/xdg" })).toBe(
      "/etc/pymanager.json",
    );
    expect(getConfigFilePath({})).toBe(path.join(os.homedir(), ".config", "pymanager", "config.json"));
  });

  it("falls back to defaults without a config file", () => {
    expect(loadConfigOrDefault({ PYMANAGER_CONFIG: configPath })).toEqual({
      logDir: "/var/log/pymanager",
      scanDirs: ["/usr/bin", "/usr/local/bin"],
      logLevel: "warn",
    });
  });

  it("reads values from the config file", () => {
    fs.writeFileSync(
      configPath,
      JSON.stringify({ logDir: path.join(root, "logs"), scanDirs: [path.join(root, "bin")], logLevel: "info" }),
    );
    expect(loadConfigOrDefault({ PYMANAGER_CONFIG: configPath })).toEqual({
      logDir: path.join(root, "logs"),
      scanDirs: [path.join(root, "bin")],
      logLevel: "info",
    });
  });

  it("expands ~ in configured paths", () => {
    fs.writeFileSync(configPath, JSON.stringify({ logDir: "~/pylogs" }));
    expect(loadConfigOrDefault({ PYMANAGER_CONFIG: configPath }).logDir).toBe(path.join(os.homedir(), "pylogs"));
  });

  it("lets the environment override the file", () => {
    fs.writeFileSync(configPath, JSON.stringify({ logDir: path.join(root, "file-logs"), logLevel: "info" }));
    const config = loadConfigOrDefault({
      PYMANAGER_CONFIG: configPath,
      PYMANAGER_LOG_DIR: path.join(root, "env-logs"),
      PYMANAGER_SCAN_DIRS: [path.join(root, "a"), path.join(root, "b")].join(path.delimiter),
      PYMANAGER_LOG_LEVEL: "DEBUG",
    });
    expect(config).toEqual({
      logDir: path.join(root, "env-logs"),
      scanDirs: [path.join(root, "a"), path.join(root, "b")],
      logLevel: "debug",
    });
  });

  it("takes the table terminal type from the file or the environment", () => {
    fs.writeFileSync(configPath, JSON.stringify({ tuiTerm: "screen-256color" }));
    expect(loadConfigOrDefault({ PYMANAGER_CONFIG: configPath }).tuiTerm).toBe("screen-256color");
    expect(loadConfigOrDefault({ PYMANAGER_CONFIG: configPath, PYMANAGER_TUI_TERM: " xterm " }).tuiTerm).toBe("xterm");
  });

  it("rejects malformed config files", () => {
    fs.writeFileSync(configPath, "{");
    expect(() => loadConfigOrDefault({ PYMANAGER_CONFIG: configPath })).toThrow(`Invalid config file: ${configPath}`);

    fs.writeFileSync(configPath, JSON.stringify({ scanDirs: "/usr/bin" }));
    expect(() => loadConfigOrDefault({ PYMANAGER_CONFIG: configPath })).toThrow(`Invalid config file: ${configPath}`);

    fs.writeFileSync(configPath, JSON.stringify({ logLevel: "loud" }));
    expect(() => loadConfigOrDefault({ PYMANAGER_CONFIG: configPath })).toThrow(`Invalid config file: ${configPath}`);
  });

  it("rejects a config path that is a directory", () => {
    expect(() => loadConfigOrDefault({ PYMANAGER_CONFIG: root })).toThrow(`Config path is not a file: ${root}`);
  });

  it("rejects an unknown log level from the environment", () => {
    expect(() => loadConfigOrDefault({ PYMANAGER_CONFIG: configPath, PYMANAGER_LOG_LEVEL: "verbose" })).toThrow(
      "Invalid PYMANAGER_LOG_LEVEL: verbose",
    );
  });
});
