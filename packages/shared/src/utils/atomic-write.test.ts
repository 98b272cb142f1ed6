import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { mkdtemp, rm, readFile, readdir, mkdir } from "node:fs/promises";
import { join } from "node:path";
import { tmpdir } from "node:os";
import { atomicWriteFile, atomicWriteJson } from "./atomic-write.js";

let tempDir: string;

beforeEach(async () => {
  tempDir = await mkdtemp(join(tmpdir(), "inboxcast-test-"));
});

afterEach(async () => {
  await rm(tempDir, { recursive: true, force: true });
});

describe("atomicWriteFile", () => {
  it("writes UTF-8 text", async () => {
    const filePath = join(tempDir, "episode.txt");
    await atomicWriteFile(filePath, "Café au lait.");
    expect(await readFile(filePath, "utf-8")).toBe("Café au lait.");
  });

  it("creates parent directories", async () => {
    const filePath = join(tempDir, "emails", "2025", "episode.txt");
    await atomicWriteFile(filePath, "nested");
    expect(await readFile(filePath, "utf-8")).toBe("nested");
  });

  it("overwrites an existing file and leaves no .tmp behind", async () => {
    const filePath = join(tempDir, "episode.txt");
    await atomicWriteFile(filePath, "first");
    await atomicWriteFile(filePath, "second");

    expect(await readFile(filePath, "utf-8")).toBe("second");
    expect(await readdir(tempDir)).toEqual(["episode.txt"]);
  });

  it("removes the .tmp file when the rename fails", async () => {
    // Renaming a file over a non-empty directory fails on every platform
    const target = join(tempDir, "occupied");
    await mkdir(join(target, "child"), { recursive: true });

    await expect(atomicWriteFile(target, "data")).rejects.toThrow();
    expect(await readdir(tempDir)).toEqual(["occupied"]);
  });
});

describe("atomicWriteJson", () => {
  it("writes indented JSON with a trailing newline", async () => {
    const filePath = join(tempDir, "config.json");
    await atomicWriteJson(filePath, { output_dir: "emails" });
    expect(await readFile(filePath, "utf-8")).toBe(
      '{\n  "output_dir": "emails"\n}\n'
    );
  });
});
