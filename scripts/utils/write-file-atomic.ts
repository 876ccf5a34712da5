import { mkdir, rename, rm, writeFile } from "fs/promises";
import { dirname } from "path";
import { IconsmithError } from "../errors.js";

let tempCounter = 0;

// Generated files are replaced with a rename so an interrupted run never leaves a partial file behind
export async function writeFileAtomic(path: string, content: string): Promise<void> {
  const tempPath = `${path}.${process.pid}.${tempCounter++}.tmp`;
  try {
    await mkdir(dirname(path), { recursive: true });
    await writeFile(tempPath, content, "utf-8");
    await rename(tempPath, path);
  } catch (error) {
    await rm(tempPath, { force: true });
    throw new IconsmithError("FilesystemFailure", `Failed to write ${path}: ${String(error)}`, path, { cause: error });
  }
}
