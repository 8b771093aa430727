/**
 * Tests for file writing with compression support
 */

import { existsSync, mkdtempSync, readFileSync, rmSync } from "fs";
import { tmpdir } from "os";
import { join } from "path";
import { gunzipSync } from "fflate";
import { afterEach, beforeEach, describe, expect, test } from "vitest";
import { FileError, ParseError, ValidationError } from "../../src/errors";
import { readToString } from "../../src/io/file-reader";
import { openForWriting, writeString } from "../../src/io/file-writer";

let workDir: string;

beforeEach(() => {
  workDir = mkdtempSync(join(tmpdir(), "gtf-refflat-writer-"));
});

afterEach(() => {
  rmSync(workDir, { recursive: true, force: true });
});

describe("writeString", () => {
  test("should write plain text", async () => {
    const path = join(workDir, "table.refflat");

    await writeString(path, "G1\tT1");

    expect(readFileSync(path, "utf-8")).toBe("G1\tT1");
  });

  test("should gzip .gz paths", async () => {
    const path = join(workDir, "table.refflat.gz");

    await writeString(path, "G1\tT1");

    const bytes = readFileSync(path);
    expect(bytes[0]).toBe(0x1f);
    expect(bytes[1]).toBe(0x8b);
    expect(new TextDecoder().decode(gunzipSync(bytes))).toBe("G1\tT1");
    expect(await readToString(path)).toBe("G1\tT1");
  });

  test("should skip compression when asked", async () => {
    const path = join(workDir, "table.refflat.gz");

    await writeString(path, "G1\tT1", { autoCompress: false });

    expect(readFileSync(path, "utf-8")).toBe("G1\tT1");
  });

  test("should validate options and paths", async () => {
    await expect(
      writeString(join(workDir, "a.txt"), "x", { compressionLevel: 12 })
    ).rejects.toThrow(ValidationError);
    await expect(writeString("", "x")).rejects.toThrow(FileError);
  });

  test("should report writes into a missing directory as file errors", async () => {
    await expect(writeString(join(workDir, "nope", "a.txt"), "x")).rejects.toThrow(FileError);
  });
});

describe("openForWriting", () => {
  test("should append each write and return the callback result", async () => {
    const path = join(workDir, "genes.gff3");

    const result = await openForWriting(path, async (handle) => {
      await handle.writeString("line1");
      await handle.writeString("\nline2");
      return 2;
    });

    expect(result).toBe(2);
    expect(readFileSync(path, "utf-8")).toBe("line1\nline2");
  });

  test("should pass callback errors through unchanged", async () => {
    const path = join(workDir, "genes.gff3");
    const failure = new ParseError("bad line", "GTF", 3);

    await expect(
      openForWriting(path, async () => {
        throw failure;
      })
    ).rejects.toBe(failure);
    expect(existsSync(path)).toBe(true);
  });
});
