import { strict as assert } from "assert";
import { mkdtemp, readFile, rm, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { ConfigError, DEFAULTS } from "./defaults";
import { readConfigFile, updateConfigFile } from "./configFile";
import { resolveConfigWithSources } from "./resolve";

describe("config", () => {
  let dir: string;
  let path: string;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), "dropfour-config-"));
    path = join(dir, "config.json");
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  describe("resolveConfigWithSources", () => {
    it("should fall back to defaults", async () => {
      const { values, sources } = await resolveConfigWithSources({ configPath: path, env: {} });
      assert.deepEqual(values, DEFAULTS);
      assert.deepEqual(sources, {
        rows: "default",
        columns: "default",
        maxAttempts: "default",
        logLevel: "default",
      });
    });

    it("should let flags beat env and env beat the file", async () => {
      await writeFile(path, JSON.stringify({ rows: 5, columns: "8", logLevel: "error" }));
      const { values, sources } = await resolveConfigWithSources({
        configPath: path,
        env: { DROPFOUR_COLUMNS: "9", LOG_LEVEL: "debug" },
        overrides: { rows: "4", maxAttempts: undefined },
      });

      assert.deepEqual(values, { rows: 4, columns: 9, maxAttempts: 3, logLevel: "debug" });
      assert.deepEqual(sources, { rows: "cli", columns: "env", maxAttempts: "default", logLevel: "env" });
    });

    it("should treat empty strings as unset", async () => {
      const { values } = await resolveConfigWithSources({ configPath: path, env: { DROPFOUR_ROWS: "" } });
      assert.equal(values.rows, 6);
    });

    it("should normalise log levels", async () => {
      const { values } = await resolveConfigWithSources({ configPath: path, env: { LOG_LEVEL: "WARN" } });
      assert.equal(values.logLevel, "warn");
    });

    it("should reject values that do not parse", async () => {
      await assert.rejects(
        resolveConfigWithSources({ configPath: path, env: { DROPFOUR_ROWS: "abc" } }),
        (err: unknown) => err instanceof ConfigError && err.message === 'rows must be a strictly positive integer, got "abc"'
      );
      await assert.rejects(
        resolveConfigWithSources({ configPath: path, env: {}, overrides: { maxAttempts: "0" } }),
        ConfigError
      );
      await assert.rejects(
        resolveConfigWithSources({ configPath: path, env: { LOG_LEVEL: "loud" } }),
        /logLevel must be one of trace, debug, info, warn, error, fatal/
      );
    });
  });

  describe("readConfigFile", () => {
    it("should ignore a malformed file", async () => {
      await writeFile(path, "{not json");
      assert.deepEqual(await readConfigFile(path), {});
    });

    it("should ignore unknown keys and non-scalar values", async () => {
      await writeFile(path, JSON.stringify({ rows: 8, colour: "red", columns: [1] }));
      assert.deepEqual(await readConfigFile(path), { rows: "8" });
    });
  });

  describe("updateConfigFile", () => {
    it("should write the parsed value", async () => {
      await updateConfigFile("columns", " 10 ", path);
      assert.deepEqual(await readConfigFile(path), { columns: "10" });
      assert.equal(await readFile(path, "utf-8"), '{\n  "columns": "10"\n}\n');
    });

    it("should leave the file alone when the value is invalid", async () => {
      await updateConfigFile("rows", "7", path);
      await assert.rejects(updateConfigFile("rows", "-2", path), ConfigError);
      assert.deepEqual(await readConfigFile(path), { rows: "7" });
    });
  });
});
