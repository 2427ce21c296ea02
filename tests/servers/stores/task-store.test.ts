/**
 * @fileoverview Tests for the in-process and JSON file task stores.
 */

import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { mkdtemp, readFile, rm, writeFile } from "node:fs/promises";
import os from "node:os";
import path from "node:path";
import {
  InMemoryTaskStore,
  JsonFileTaskStore,
} from "../../../src/servers/stores/task-store.js";
import { ConflictError, NotFoundError, ParseError } from "../../../src/utils/errors.js";

describe("InMemoryTaskStore", () => {
  it("adds tasks as not done and completes them", async () => {
    const store = new InMemoryTaskStore();
    expect(await store.add("buy milk")).toEqual({ title: "buy milk", isDone: false });
    expect(await store.complete("buy milk")).toEqual({ title: "buy milk", isDone: true });
    expect(await store.complete("buy milk")).toEqual({ title: "buy milk", isDone: true });
  });

  it("rejects duplicates and unknown titles", async () => {
    const store = new InMemoryTaskStore([{ title: "buy milk", isDone: false }]);
    await expect(store.add("buy milk")).rejects.toBeInstanceOf(ConflictError);
    await expect(store.complete("walk")).rejects.toBeInstanceOf(NotFoundError);
  });

  it("hands out copies", async () => {
    const store = new InMemoryTaskStore([{ title: "a", isDone: false }]);
    const [task] = await store.list();
    if (task) task.isDone = true;
    expect(await store.list()).toEqual([{ title: "a", isDone: false }]);
  });
});

describe("JsonFileTaskStore", () => {
  let directory: string;

  beforeEach(async () => {
    directory = await mkdtemp(path.join(os.tmpdir(), "tasks-"));
  });

  afterEach(async () => {
    await rm(directory, { recursive: true, force: true });
  });

  it("treats a missing file as an empty list", async () => {
    expect(await new JsonFileTaskStore(directory).list()).toEqual([]);
  });

  it("writes one pretty-printed file per user", async () => {
    const store = new JsonFileTaskStore(path.join(directory, "nested"), "alice");
    await store.add("buy milk");

    expect(store.filePath).toBe(path.join(directory, "nested", "alice.json"));
    expect(await readFile(store.filePath, "utf-8")).toBe(
      '[\n  {\n    "title": "buy milk",\n    "isDone": false\n  }\n]\n',
    );
  });

  it("keeps every update of concurrent adds", async () => {
    const store = new JsonFileTaskStore(directory);
    await Promise.all([store.add("a"), store.add("b"), store.add("c")]);

    expect(await store.list()).toEqual([
      { title: "a", isDone: false },
      { title: "b", isDone: false },
      { title: "c", isDone: false },
    ]);
  });

  it("survives a new store instance on the same directory", async () => {
    await new JsonFileTaskStore(directory).add("buy milk");
    const reopened = new JsonFileTaskStore(directory);

    await reopened.complete("buy milk");

    expect(await reopened.list()).toEqual([{ title: "buy milk", isDone: true }]);
    await expect(reopened.add("buy milk")).rejects.toThrow("Task with title 'buy milk' already exists");
  });

  it("defaults a missing isDone to false", async () => {
    const store = new JsonFileTaskStore(directory);
    await writeFile(store.filePath, '[{"title": "old"}]', "utf-8");
    expect(await store.list()).toEqual([{ title: "old", isDone: false }]);
  });

  it("treats an empty file as an empty list", async () => {
    const store = new JsonFileTaskStore(directory);
    await writeFile(store.filePath, "  \n", "utf-8");
    expect(await store.list()).toEqual([]);
  });

  it("rejects malformed files with ParseError", async () => {
    const store = new JsonFileTaskStore(directory);
    await writeFile(store.filePath, "{not json", "utf-8");
    await expect(store.list()).rejects.toBeInstanceOf(ParseError);

    await writeFile(store.filePath, '{"title": "not a list"}', "utf-8");
    await expect(store.list()).rejects.toThrow(`Task file '${store.filePath}' has an unexpected shape`);
  });
});
