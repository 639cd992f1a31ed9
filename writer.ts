import { call } from "effection";
import { mkdir, writeFile } from "node:fs/promises";
import { dirname } from "node:path";
import type { FileWriter } from "./types.ts";

export function createFileSystemWriter(): FileWriter {
  return {
    *write(path, content) {
      yield* call(async () => {
        await mkdir(dirname(path), { recursive: true });
        await writeFile(path, content);
      });
    },
  };
}
