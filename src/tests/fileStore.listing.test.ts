import { describe, it, expect, beforeEach, afterEach, vi } from "vitest";

const { removeBeforeRead } = vi.hoisted(() => ({ removeBeforeRead: new Set<string>() }));

// Simulate a record deleted after the directory was listed but before it was read.
vi.mock("node:fs/promises", async (importOriginal) => {
  const actual = await importOriginal<typeof import("node:fs/promises")>();
  return {
    ...actual,
    readFile: async (file: string, encoding: BufferEncoding) => {
      for (const name of removeBeforeRead) {
        if (file.endsWith(name)) await actual.rm(file, { force: true });
      }
      return actual.readFile(file, encoding);
    },
  };
});

import * as fs from "node:fs/promises";
import * as path from "node:path";
import * as os from "node:os";
import { FileStore } from "../core/store/fileStore.js";
import { makeResponse } from "./fixtures.js";

describe("FileStore listing", () => {
  let tempDir: string;
  let store: FileStore;

  beforeEach(async () => {
    tempDir = await fs.mkdtemp(path.join(os.tmpdir(), "geo-listing-"));
    store = new FileStore(tempDir);
    await store.initialize();
  });

  afterEach(async () => {
    removeBeforeRead.clear();
    await fs.rm(tempDir, { recursive: true, force: true });
  });

  it("should skip a record removed while the directory is read", async () => {
    await store.createResponse(makeResponse("r1"));
    await store.createResponse(makeResponse("r2"));
    removeBeforeRead.add(`${path.sep}r1.json`);

    const responses = await store.listResponses();

    expect(responses.map((r) => r.id)).toEqual(["r2"]);
    expect(await store.countResponses()).toBe(1);
  });
});
