import { describe, it, expect, beforeEach, afterEach } from "vitest";
import * as fs from "node:fs";
import * as path from "node:path";
import * as os from "node:os";
import { loadConfig, DEFAULT_CONFIG } from "./config.js";

describe("loadConfig", () => {
  let tempDir: string;
  let configFile: string;
  let logFile: string;

  beforeEach(() => {
    tempDir = fs.mkdtempSync(path.join(os.tmpdir(), "flowport-config-test-"));
    fs.mkdirSync(path.join(tempDir, ".flowport"), { recursive: true });
    configFile = path.join(tempDir, ".flowport", "config.json");
    logFile = path.join(tempDir, ".flowport", "flowport.log");
  });

  afterEach(() => {
    fs.rmSync(tempDir, { recursive: true, force: true });
  });

  it("returns defaults when no config file exists", () => {
    expect(loadConfig(tempDir)).toEqual(DEFAULT_CONFIG);
  });

  it("returns a fresh copy of defaults (not the same reference)", () => {
    const config1 = loadConfig(tempDir);
    const config2 = loadConfig(tempDir);
    expect(config1).not.toBe(config2);
    expect(config1).not.toBe(DEFAULT_CONFIG);
  });

  it("loads and merges partial config", () => {
    fs.writeFileSync(configFile, JSON.stringify({ clipboardTimeoutMs: 1500 }));

    const config = loadConfig(tempDir);
    expect(config.clipboardTimeoutMs).toBe(1500);
    expect(config.maxLogSize).toBe(DEFAULT_CONFIG.maxLogSize);
    expect(config.clipboardCommand).toBeUndefined();
  });

  it("loads full config", () => {
    const custom = {
      maxLogSize: 1048576,
      clipboardCommand: ["tee", "/tmp/clip.txt"],
      clipboardTimeoutMs: 2000,
    };
    fs.writeFileSync(configFile, JSON.stringify(custom));

    expect(loadConfig(tempDir)).toEqual(custom);
  });

  it("drops invalid fields one by one", () => {
    fs.writeFileSync(
      configFile,
      JSON.stringify({ maxLogSize: -5, clipboardCommand: [], clipboardTimeoutMs: 250 })
    );

    expect(loadConfig(tempDir)).toEqual({ ...DEFAULT_CONFIG, clipboardTimeoutMs: 250 });
  });

  it("rejects non-integer sizes", () => {
    fs.writeFileSync(configFile, JSON.stringify({ maxLogSize: 1.5 }));

    expect(loadConfig(tempDir).maxLogSize).toBe(DEFAULT_CONFIG.maxLogSize);
  });

  it("rejects clipboard commands with empty parts", () => {
    fs.writeFileSync(configFile, JSON.stringify({ clipboardCommand: ["xclip", ""] }));

    expect(loadConfig(tempDir).clipboardCommand).toBeUndefined();
  });

  it("ignores unknown keys", () => {
    fs.writeFileSync(configFile, JSON.stringify({ theme: "dark" }));

    expect(loadConfig(tempDir)).toEqual(DEFAULT_CONFIG);
  });

  it("returns defaults on malformed JSON and logs a warning", () => {
    fs.writeFileSync(configFile, "not valid json {{{");

    expect(loadConfig(tempDir)).toEqual(DEFAULT_CONFIG);

    const entry = JSON.parse(fs.readFileSync(logFile, "utf-8").trim()) as Record<string, unknown>;
    expect(entry).toMatchObject({
      level: "warn",
      component: "config",
      msg: "Malformed config.json, using defaults",
    });
  });

  it("returns defaults when the document is not an object", () => {
    fs.writeFileSync(configFile, JSON.stringify([1, 2, 3]));

    expect(loadConfig(tempDir)).toEqual(DEFAULT_CONFIG);

    const entry = JSON.parse(fs.readFileSync(logFile, "utf-8").trim()) as Record<string, unknown>;
    expect(entry["msg"]).toBe("config.json must be an object, using defaults");
  });

  it("does not log the warning when the level is error", () => {
    fs.writeFileSync(configFile, "{");

    loadConfig(tempDir, "error");

    expect(fs.existsSync(logFile)).toBe(false);
  });
});
