import { describe, it, expect } from "vitest";
import { InMemoryStore } from "../core/store/memoryStore.js";
import { NotFoundError, StorageError } from "../core/errors.js";
import { makePrompt, makeResponse } from "./fixtures.js";

describe("InMemoryStore", () => {
  it("should hand out copies rather than shared references", async () => {
    const store = new InMemoryStore();
    const prompt = makePrompt("p1");
    await store.createPrompt(prompt);

    prompt.template = "changed outside";
    const loaded = await store.getPrompt("p1");
    loaded!.enabled = false;

    expect((await store.getPrompt("p1"))!).toMatchObject({ template: "Which tool is best for p1?", enabled: true });
  });

  it("should reject duplicates and unknown updates", async () => {
    const store = new InMemoryStore();
    await store.createPrompt(makePrompt("p1"));

    await expect(store.createPrompt(makePrompt("p1"))).rejects.toThrow(
      new StorageError("Prompt p1 already exists"),
    );
    await expect(store.updatePrompt(makePrompt("p9"))).rejects.toBeInstanceOf(NotFoundError);
  });

  it("should order responses newest first and break ties by id", async () => {
    const store = new InMemoryStore();
    await store.createResponse(makeResponse("b", { createdAt: "2024-01-01T00:00:00.000Z" }));
    await store.createResponse(makeResponse("a", { createdAt: "2024-01-01T00:00:00.000Z" }));
    await store.createResponse(makeResponse("c", { createdAt: "2024-01-02T00:00:00.000Z" }));

    expect((await store.listResponses()).map((r) => r.id)).toEqual(["c", "a", "b"]);
  });

  it("should clear responses", async () => {
    const store = new InMemoryStore();
    await store.createResponse(makeResponse("r1"));

    expect(await store.deleteAllResponses()).toBe(1);
    expect(await store.listResponses()).toEqual([]);
  });
});
