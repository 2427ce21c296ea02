/**
 * @module servers/stores/task-store
 * @fileoverview Per-user task lists behind the tasks server.
 *
 * Task titles are unique within a list and act as the key: adding an existing
 * title fails with {@link ConflictError}, completing an unknown one with
 * {@link NotFoundError}.
 *
 * ## File Layout
 * ```
 *  <TASKS_DATA_DIR>/
 *    user.json      [{ "title": "buy milk", "isDone": false }, ...]
 * ```
 */

import { mkdir, readFile, writeFile } from "node:fs/promises";
import path from "node:path";
import PQueue from "p-queue";
import { z } from "zod";
import { ConflictError, NotFoundError, ParseError, errorMessage } from "../../utils/errors.js";

export interface Task {
  title: string;
  isDone: boolean;
}

export interface TaskStore {
  list(): Promise<Task[]>;
  /** @throws {ConflictError} */
  add(title: string): Promise<Task>;
  /** Marks the task done; completing a done task again is allowed. @throws {NotFoundError} */
  complete(title: string): Promise<Task>;
}

function addTo(tasks: readonly Task[], title: string): Task[] {
  if (tasks.some((task) => task.title === title)) {
    throw new ConflictError(`Task with title '${title}' already exists`);
  }
  return [...tasks, { title, isDone: false }];
}

function completeIn(tasks: readonly Task[], title: string): Task[] {
  if (!tasks.some((task) => task.title === title)) {
    throw new NotFoundError(`Task with title '${title}' not found`);
  }
  return tasks.map((task) => (task.title === title ? { ...task, isDone: true } : task));
}

function find(tasks: readonly Task[], title: string): Task {
  const task = tasks.find((candidate) => candidate.title === title);
  if (!task) throw new NotFoundError(`Task with title '${title}' not found`);
  return { ...task };
}

/* ────────────────────────────────────────────────────────────────────────────
 * In-Process Store
 * ──────────────────────────────────────────────────────────────────────────── */

export class InMemoryTaskStore implements TaskStore {
  private tasks: Task[];

  constructor(initial: readonly Task[] = []) {
    this.tasks = initial.map((task) => ({ ...task }));
  }

  async list(): Promise<Task[]> {
    return this.tasks.map((task) => ({ ...task }));
  }

  async add(title: string): Promise<Task> {
    this.tasks = addTo(this.tasks, title);
    return find(this.tasks, title);
  }

  async complete(title: string): Promise<Task> {
    this.tasks = completeIn(this.tasks, title);
    return find(this.tasks, title);
  }
}

/* ────────────────────────────────────────────────────────────────────────────
 * JSON File Store
 * ──────────────────────────────────────────────────────────────────────────── */

const taskFileSchema = z.array(
  z.object({
    title: z.string(),
    isDone: z.boolean().default(false),
  }),
);

/**
 * One JSON file per user. Read-modify-write cycles run one at a time, so
 * concurrent calls on the same store never lose an update.
 */
export class JsonFileTaskStore implements TaskStore {
  private readonly queue = new PQueue({ concurrency: 1 });
  readonly filePath: string;

  constructor(directory: string, userId = "user") {
    this.filePath = path.join(directory, `${userId}.json`);
  }

  list(): Promise<Task[]> {
    return this.queue.add(() => this.read(), { throwOnTimeout: true });
  }

  add(title: string): Promise<Task> {
    return this.update((tasks) => addTo(tasks, title), title);
  }

  complete(title: string): Promise<Task> {
    return this.update((tasks) => completeIn(tasks, title), title);
  }

  private update(change: (tasks: readonly Task[]) => Task[], title: string): Promise<Task> {
    return this.queue.add(
      async () => {
        const next = change(await this.read());
        await this.write(next);
        return find(next, title);
      },
      { throwOnTimeout: true },
    );
  }

  /** A missing or empty file is an empty list. */
  private async read(): Promise<Task[]> {
    let text: string;
    try {
      text = await readFile(this.filePath, "utf-8");
    } catch (error) {
      if (error instanceof Error && "code" in error && error.code === "ENOENT") return [];
      throw error;
    }
    if (text.trim() === "") return [];

    let raw: unknown;
    try {
      raw = JSON.parse(text);
    } catch (error) {
      throw new ParseError(`Task file '${this.filePath}' is not valid JSON: ${errorMessage(error)}`);
    }
    const parsed = taskFileSchema.safeParse(raw);
    if (!parsed.success) {
      throw new ParseError(`Task file '${this.filePath}' has an unexpected shape`);
    }
    return parsed.data;
  }

  private async write(tasks: readonly Task[]): Promise<void> {
    await mkdir(path.dirname(this.filePath), { recursive: true });
    await writeFile(this.filePath, `${JSON.stringify(tasks, null, 2)}\n`, "utf-8");
  }
}
