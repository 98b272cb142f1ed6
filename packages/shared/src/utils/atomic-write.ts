import { writeFile, rename, mkdir, rm } from "node:fs/promises";
import { dirname } from "node:path";
import { randomBytes } from "node:crypto";

/**
 * Write text to a file by writing a .tmp sibling and renaming it over the
 * target, so readers (the TTS job, the feed builder) never see half a file.
 * The .tmp file is removed again if the rename fails.
 */
export async function atomicWriteFile(
  filePath: string,
  data: string
): Promise<void> {
  await mkdir(dirname(filePath), { recursive: true });

  const tmpName = `${filePath}.${randomBytes(6).toString("hex")}.tmp`;
  await writeFile(tmpName, data, "utf-8");
  try {
    await rename(tmpName, filePath);
  } catch (err: unknown) {
    await rm(tmpName, { force: true });
    throw err;
  }
}

/**
 * Atomically write a JSON value, pretty-printed with a trailing newline.
 */
export async function atomicWriteJson(
  filePath: string,
  data: unknown
): Promise<void> {
  await atomicWriteFile(filePath, JSON.stringify(data, null, 2) + "\n");
}
