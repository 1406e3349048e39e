import { mkdtempSync, rmSync, writeFileSync } from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { InvalidArgumentError } from "../infra/errors.js";
import { loadConfig } from "./loader.js";

describe("loadConfig", () => {
  let tempDir: string;

  beforeEach(() => {
    tempDir = mkdtempSync(join(tmpdir(), "chatlog-config-"));
  });

  afterEach(() => {
    rmSync(tempDir, { recursive: true, force: true });
  });

  function write(name: string, content: string): string {
    const path = join(tempDir, name);
    writeFileSync(path, content);
    return path;
  }

  it("loads a JSON5 file with comments and trailing commas", () => {
    const path = write(
      "chatlog.json5",
      `{
        // export defaults
        timezone: "Europe/Berlin",
        session: 30,
        format: "markdown",
        media: true,
        logging: { level: "info" },
      }`,
    );
    expect(loadConfig(path)).toEqual({
      timezone: "Europe/Berlin",
      session: 30,
      format: "markdown",
      media: true,
      logging: { level: "info" },
    });
  });

  it("accepts an empty object", () => {
    expect(loadConfig(write("empty.json", "{}"))).toEqual({});
  });

  it("fills the default log level", () => {
    expect(loadConfig(write("log.json", '{ "logging": {} }'))).toEqual({
      logging: { level: "warn" },
    });
  });

  it("throws when the file is missing", () => {
    expect(() => loadConfig(join(tempDir, "missing.json"))).toThrow(InvalidArgumentError);
    expect(() => loadConfig(join(tempDir, "missing.json"))).toThrow(/Config file not found/);
  });

  it("throws on unparsable content", () => {
    const path = write("broken.json", "{ timezone: ");
    expect(() => loadConfig(path)).toThrow(`Config file is not valid JSON or JSON5: ${path}`);
  });

  it("reports schema violations by path", () => {
    const path = write("bad.json", '{ "session": -5, "format": "html" }');
    let message = "";
    try {
      loadConfig(path);
    } catch (err) {
      message = err instanceof Error ? err.message : String(err);
    }
    expect(message).toContain("Config validation failed:");
    expect(message).toContain("  - session: session gap must be a positive number of minutes");
    expect(message).toContain("  - format: ");
  });

  it("rejects unknown keys", () => {
    const path = write("extra.json", '{ "colour": "blue" }');
    expect(() => loadConfig(path)).toThrow(/Config validation failed/);
  });
});
