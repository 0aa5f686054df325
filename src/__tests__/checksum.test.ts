import { describe, it, expect, beforeEach, afterEach } from "vitest";
import * as crypto from "node:crypto";
import * as fs from "node:fs/promises";
import * as path from "node:path";
import * as os from "node:os";
import {
  FINGERPRINT_ALGORITHM,
  computeFingerprint,
  fingerprintOf,
} from "../integrity";
import { ConfigError, ObservedFileError } from "../errors";

function sha1(text: string): string {
  return crypto.createHash("sha1").update(text).digest("hex");
}

describe("fingerprintOf", () => {
  it("is SHA-1 rendered as lowercase hex", () => {
    expect(FINGERPRINT_ALGORITHM).toBe("sha1");
    expect(fingerprintOf(["abc"])).toBe("a9993e364706816aba3e25717850c26c9cd0d89d");
    expect(fingerprintOf([])).toBe("da39a3ee5e6b4b0d3255bfef95601890afd80709");
  });

  it("hashes chunks as one stream", () => {
    expect(fingerprintOf(["a", "bc"])).toBe(fingerprintOf(["abc"]));
    expect(fingerprintOf([Buffer.from("ab"), "c"])).toBe(sha1("abc"));
  });
});

describe("computeFingerprint", () => {
  let tempDir: string;

  beforeEach(async () => {
    tempDir = await fs.mkdtemp(path.join(os.tmpdir(), "docbump-checksum-test-"));
  });

  afterEach(async () => {
    await fs.rm(tempDir, { recursive: true, force: true });
  });

  async function writeFiles(files: Record<string, string>): Promise<string[]> {
    const paths: string[] = [];
    for (const [name, content] of Object.entries(files)) {
      const filePath = path.join(tempDir, name);
      await fs.writeFile(filePath, content);
      paths.push(filePath);
    }
    return paths;
  }

  it("hashes the concatenation of the files in order", async () => {
    const [a, b] = await writeFiles({ "a.tex": "x", "b.tex": "y" });

    expect(await computeFingerprint([a, b])).toBe(sha1("xy"));
    expect(await computeFingerprint([b, a])).toBe(sha1("yx"));
  });

  it("inserts nothing between files", async () => {
    const [a, bc] = await writeFiles({ "a.tex": "a", "bc.tex": "bc" });

    expect(await computeFingerprint([a, bc])).toBe(
      "a9993e364706816aba3e25717850c26c9cd0d89d",
    );
  });

  it("is deterministic", async () => {
    const files = await writeFiles({ "main.tex": "\\section{Intro}\n", "refs.bib": "@book{}" });

    const first = await computeFingerprint(files);
    const second = await computeFingerprint(files);

    expect(second).toBe(first);
    expect(first).toMatch(/^[0-9a-f]{40}$/);
  });

  it("hashes bytes, not decoded text", async () => {
    const filePath = path.join(tempDir, "latin1.tex");
    const bytes = Buffer.from([0x63, 0x61, 0x66, 0xe9]);
    await fs.writeFile(filePath, bytes);

    expect(await computeFingerprint([filePath])).toBe(
      crypto.createHash("sha1").update(bytes).digest("hex"),
    );
  });

  it("fails on the first unreadable file", async () => {
    const [a] = await writeFiles({ "a.tex": "x" });
    const missing = path.join(tempDir, "missing.tex");

    const promise = computeFingerprint([a, missing]);

    await expect(promise).rejects.toBeInstanceOf(ObservedFileError);
    await expect(promise).rejects.toMatchObject({
      code: "IO_ERROR",
      filePath: missing,
    });
  });

  it("rejects an empty file set", async () => {
    await expect(computeFingerprint([])).rejects.toBeInstanceOf(ConfigError);
  });

  it("reads through an injected reader", async () => {
    const contents: Record<string, string> = { A: "x", B: "z" };
    const fingerprint = await computeFingerprint(["A", "B"], async (file) =>
      Buffer.from(contents[file]),
    );

    expect(fingerprint).toBe(sha1("xz"));
  });
});
