import { describe, it, expect, beforeEach, afterEach } from "vitest";
import * as fs from "node:fs/promises";
import * as path from "node:path";
import * as os from "node:os";
import { FileStore } from "../core/store/fileStore.js";
import { NotFoundError, StorageError } from "../core/errors.js";
import { makeLLM, makePrompt, makeResponse, makeSchedule } from "./fixtures.js";

describe("FileStore", () => {
  let tempDir: string;
  let store: FileStore;

  beforeEach(async () => {
    tempDir = await fs.mkdtemp(path.join(os.tmpdir(), "geo-store-"));
    store = new FileStore(tempDir);
    await store.initialize();
  });

  afterEach(async () => {
    await fs.rm(tempDir, { recursive: true, force: true });
  });

  it("should write one JSON file per record", async () => {
    await store.createPrompt(makePrompt("p1"));

    const raw = await fs.readFile(path.join(tempDir, "prompts", "p1.json"), "utf-8");
    expect(JSON.parse(raw)).toMatchObject({ id: "p1", template: "Which tool is best for p1?" });
  });

  it("should save and load prompts, LLMs and schedules", async () => {
    const prompt = makePrompt("p1", { tags: ["crm"] });
    const llm = makeLLM("l1", { config: { max_tokens: "256" } });
    const schedule = makeSchedule("s1", { temperature: "random", nextRun: "2024-01-02T09:00:00.000Z" });
    await store.createPrompt(prompt);
    await store.createLLM(llm);
    await store.createSchedule(schedule);

    expect(await store.getPrompt("p1")).toEqual(prompt);
    expect(await store.getLLM("l1")).toEqual(llm);
    expect(await store.getSchedule("s1")).toEqual(schedule);
  });

  it("should return null for missing records", async () => {
    expect(await store.getPrompt("nope")).toBeNull();
    expect(await store.getResponse("nope")).toBeNull();
  });

  it("should filter listings by enabled state", async () => {
    await store.createLLM(makeLLM("l1"));
    await store.createLLM(makeLLM("l2", { enabled: false }));

    expect((await store.listLLMs()).map((l) => l.id).sort()).toEqual(["l1", "l2"]);
    expect((await store.listLLMs(true)).map((l) => l.id)).toEqual(["l1"]);
    expect((await store.listLLMs(false)).map((l) => l.id)).toEqual(["l2"]);
  });

  it("should refuse duplicate creates and updates of missing records", async () => {
    await store.createPrompt(makePrompt("p1"));

    await expect(store.createPrompt(makePrompt("p1"))).rejects.toBeInstanceOf(StorageError);
    await expect(store.updatePrompt(makePrompt("p2"))).rejects.toBeInstanceOf(NotFoundError);
  });

  it("should update and delete records", async () => {
    await store.createSchedule(makeSchedule("s1"));
    await store.updateSchedule(makeSchedule("s1", { enabled: false }));

    expect((await store.getSchedule("s1"))!.enabled).toBe(false);
    expect(await store.deleteSchedule("s1")).toBe(true);
    expect(await store.deleteSchedule("s1")).toBe(false);
    expect(await store.getSchedule("s1")).toBeNull();
  });

  it("should list responses newest first with filters", async () => {
    await store.createResponse(
      makeResponse("r1", { createdAt: "2024-01-01T10:00:00.000Z", responseText: "Acme rocks" }),
    );
    await store.createResponse(
      makeResponse("r2", { createdAt: "2024-01-02T10:00:00.000Z", promptId: "p2", responseText: "Globex" }),
    );
    await store.createResponse(
      makeResponse("r3", { createdAt: "2024-01-03T10:00:00.000Z", responseText: "acme again" }),
    );

    expect((await store.listResponses()).map((r) => r.id)).toEqual(["r3", "r2", "r1"]);
    expect((await store.listResponses({ promptId: "p1" })).map((r) => r.id)).toEqual(["r3", "r1"]);
    expect((await store.listResponses({ keyword: "ACME" })).map((r) => r.id)).toEqual(["r3", "r1"]);
    expect((await store.listResponses({ limit: 1 })).map((r) => r.id)).toEqual(["r3"]);
    expect(
      (
        await store.listResponses({
          window: { start: new Date("2024-01-02T00:00:00Z"), end: new Date("2024-01-02T23:59:59Z") },
        })
      ).map((r) => r.id),
    ).toEqual(["r2"]);
    expect(await store.countResponses({ promptId: "p1", limit: 1 })).toBe(2);
  });

  it("should skip corrupt records when listing", async () => {
    await store.createPrompt(makePrompt("p1"));
    await fs.writeFile(path.join(tempDir, "prompts", "broken.json"), "{ not json", "utf-8");

    expect((await store.listPrompts()).map((p) => p.id)).toEqual(["p1"]);
    await expect(store.getPrompt("broken")).rejects.toBeInstanceOf(StorageError);
  });

  it("should delete all responses", async () => {
    await store.createResponse(makeResponse("r1"));
    await store.createResponse(makeResponse("r2"));

    expect(await store.deleteAllResponses()).toBe(2);
    expect(await store.countResponses()).toBe(0);
  });

  it("should keep ids with unsafe characters inside the collection directory", async () => {
    await store.createPrompt(makePrompt("../escape"));

    expect(await store.getPrompt("../escape")).toMatchObject({ id: "../escape" });
    const files = await fs.readdir(path.join(tempDir, "prompts"));
    expect(files).toEqual(["%2E%2E%2Fescape.json"]);
  });

  it("should give ids that differ only in punctuation their own files", async () => {
    await store.createPrompt(makePrompt("a.b", { template: "dotted" }));
    await store.createPrompt(makePrompt("a_b", { template: "underscored" }));

    expect((await store.getPrompt("a.b"))?.template).toBe("dotted");
    expect((await store.getPrompt("a_b"))?.template).toBe("underscored");
    expect((await fs.readdir(path.join(tempDir, "prompts"))).sort()).toEqual(["a%2Eb.json", "a_b.json"]);
  });
});
