import { describe, it, expect, beforeEach, afterEach } from "vitest";
import * as fs from "node:fs/promises";
import * as path from "node:path";
import * as os from "node:os";
import {
  loadConfig,
  mergeWithDefaults,
  applyOverrides,
  resolvePaths,
  writeConfig,
  DEFAULT_CONFIG,
} from "../config";
import { ConfigSchema } from "../schemas";
import {
  ConfigError,
  InvalidJsonError,
  SchemaValidationError,
} from "../errors";

describe("loadConfig", () => {
  let tempDir: string;

  beforeEach(async () => {
    tempDir = await fs.mkdtemp(path.join(os.tmpdir(), "docbump-config-test-"));
    await fs.mkdir(path.join(tempDir, ".docbump"), { recursive: true });
  });

  afterEach(async () => {
    await fs.rm(tempDir, { recursive: true, force: true });
  });

  async function writeRaw(content: string): Promise<void> {
    await fs.writeFile(path.join(tempDir, ".docbump", "config.json"), content);
  }

  it("returns defaults when config.json does not exist", async () => {
    expect(await loadConfig(tempDir)).toEqual(DEFAULT_CONFIG);
  });

  it("fills missing fields from defaults", async () => {
    await writeRaw(JSON.stringify({ observed: ["main.tex", "refs.bib"] }));

    expect(await loadConfig(tempDir)).toEqual({
      schema_version: 1,
      observed: ["main.tex", "refs.bib"],
      hash_file: ".docbump/hash",
      version_file: "version.tex",
    });
  });

  it("uses every configured field", async () => {
    const full = {
      schema_version: 1,
      observed: ["lai.tex"],
      hash_file: "build/lai.sha1",
      version_file: "build/version.tex",
    };
    await writeRaw(JSON.stringify(full));

    expect(await loadConfig(tempDir)).toEqual(full);
  });

  it("applies overrides on top of the file", async () => {
    await writeRaw(JSON.stringify({ observed: ["main.tex"] }));

    const config = await loadConfig(tempDir, {
      observed: ["other.tex"],
      versionFile: "v.txt",
    });

    expect(config.observed).toEqual(["other.tex"]);
    expect(config.version_file).toBe("v.txt");
    expect(config.hash_file).toBe(".docbump/hash");
  });

  it("throws InvalidJsonError for malformed JSON", async () => {
    await writeRaw("{ observed: ");

    await expect(loadConfig(tempDir)).rejects.toBeInstanceOf(InvalidJsonError);
  });

  it("throws SchemaValidationError for wrong types", async () => {
    await writeRaw(JSON.stringify({ observed: "main.tex" }));

    await expect(loadConfig(tempDir)).rejects.toBeInstanceOf(
      SchemaValidationError,
    );
  });

  it("rejects blank paths", async () => {
    await writeRaw(JSON.stringify({ observed: ["main.tex", "  "] }));

    await expect(loadConfig(tempDir)).rejects.toBeInstanceOf(
      SchemaValidationError,
    );
  });

  it("round-trips through writeConfig", async () => {
    const config = { ...DEFAULT_CONFIG, observed: ["a.tex", "b.tex"] };

    await writeConfig(tempDir, config);

    expect(await loadConfig(tempDir)).toEqual(config);
  });
});

describe("ConfigSchema", () => {
  it("defaults the observed list and schema version", () => {
    expect(ConfigSchema.parse({})).toEqual({ schema_version: 1, observed: [] });
  });

  it("trims paths", () => {
    expect(ConfigSchema.parse({ observed: [" main.tex "] }).observed).toEqual([
      "main.tex",
    ]);
  });
});

describe("mergeWithDefaults", () => {
  it("does not share the default observed array", () => {
    const merged = mergeWithDefaults({});
    merged.observed.push("x.tex");

    expect(DEFAULT_CONFIG.observed).toEqual([]);
  });
});

describe("applyOverrides", () => {
  const base = { ...DEFAULT_CONFIG, observed: ["main.tex"] };

  it("keeps the configured list when no files are given", () => {
    expect(applyOverrides(base, { observed: [] }).observed).toEqual(["main.tex"]);
    expect(applyOverrides(base, {}).observed).toEqual(["main.tex"]);
  });

  it("replaces the list rather than extending it", () => {
    expect(applyOverrides(base, { observed: ["b.tex", "a.tex"] }).observed).toEqual([
      "b.tex",
      "a.tex",
    ]);
  });

  it("overrides the store paths", () => {
    const result = applyOverrides(base, { hashFile: "h", versionFile: "v" });

    expect(result.hash_file).toBe("h");
    expect(result.version_file).toBe("v");
  });
});

describe("resolvePaths", () => {
  it("resolves everything against the root, keeping order", () => {
    const root = path.resolve("/projects/thesis");
    const paths = resolvePaths(root, {
      ...DEFAULT_CONFIG,
      observed: ["ch2.tex", "ch1.tex", "/abs/refs.bib"],
    });

    expect(paths).toEqual({
      observed: [
        path.join(root, "ch2.tex"),
        path.join(root, "ch1.tex"),
        path.resolve("/abs/refs.bib"),
      ],
      hashFile: path.join(root, ".docbump", "hash"),
      versionFile: path.join(root, "version.tex"),
    });
  });

  it("refuses an empty observed set", () => {
    expect(() => resolvePaths("/p", DEFAULT_CONFIG)).toThrow(ConfigError);
  });

  it("refuses an observed set that includes the version file", () => {
    const root = path.resolve("/projects/thesis");

    expect(() =>
      resolvePaths(root, {
        ...DEFAULT_CONFIG,
        observed: ["main.tex", "./version.tex"],
      }),
    ).toThrow(`${path.join(root, "version.tex")} is written by docbump`);
  });

  it("refuses an observed set that includes the hash file", () => {
    expect(() =>
      resolvePaths("/p", {
        ...DEFAULT_CONFIG,
        observed: [".docbump/hash"],
      }),
    ).toThrow(ConfigError);
  });
});
