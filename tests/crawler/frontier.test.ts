/**
 * @fileoverview Tests for the breadth-first frontier.
 */

import { describe, it, expect } from "vitest";
import { Frontier } from "../../src/crawler/frontier.js";

function drain(frontier: Frontier): Array<[string, number]> {
  const out: Array<[string, number]> = [];
  for (let entry = frontier.pop(); entry; entry = frontier.pop()) {
    out.push([entry.url, entry.depth]);
  }
  return out;
}

describe("Frontier", () => {
  it("pops the lowest depth first and FIFO within a depth", () => {
    const frontier = new Frontier();
    frontier.push("d2-a", 2);
    frontier.push("d1-a", 1);
    frontier.push("d2-b", 2);
    frontier.push("d0", 0);
    frontier.push("d1-b", 1);

    expect(drain(frontier)).toEqual([
      ["d0", 0],
      ["d1-a", 1],
      ["d1-b", 1],
      ["d2-a", 2],
      ["d2-b", 2],
    ]);
  });

  it("accepts a URL once, even after it was popped", () => {
    const frontier = new Frontier();
    expect(frontier.push("u", 0)).toBe(true);
    expect(frontier.push("u", 1)).toBe(false);
    frontier.pop();
    expect(frontier.push("u", 2)).toBe(false);
    expect(frontier.has("u")).toBe(true);
    expect(frontier.size).toBe(0);
  });

  it("serves shallower entries pushed after deeper ones were popped", () => {
    const frontier = new Frontier();
    frontier.push("deep", 3);
    expect(frontier.pop()).toEqual({ url: "deep", depth: 3 });
    frontier.push("shallow", 1);
    expect(frontier.pop()).toEqual({ url: "shallow", depth: 1 });
    expect(frontier.pop()).toBeUndefined();
  });
});
