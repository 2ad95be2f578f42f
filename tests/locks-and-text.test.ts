import { describe, expect, it } from "vitest";
import { KeyedMutex } from "@/lib/keyed-lock";
import { createInProcessLocks } from "@/lib/db-lock";
import { deriveTopic, extractKeywords } from "@/lib/topic-detection";
import { tryParseJson } from "@/lib/json-reply";
import { previewForLog } from "@/lib/log-format";

const tick = () => new Promise((resolve) => setTimeout(resolve, 1));

describe("KeyedMutex", () => {
  it("runs work for one key in arrival order and other keys freely", async () => {
    const mutex = new KeyedMutex();
    const events: string[] = [];
    const job = (name: string) => async () => {
      events.push(`${name}:start`);
      await tick();
      events.push(`${name}:end`);
      return name;
    };

    const results = await Promise.all([mutex.run("a", job("a1")), mutex.run("a", job("a2")), mutex.run("b", job("b1"))]);

    expect(results).toEqual(["a1", "a2", "b1"]);
    expect(events.indexOf("a1:end")).toBeLessThan(events.indexOf("a2:start"));
    expect(events.indexOf("b1:start")).toBeLessThan(events.indexOf("a1:end"));
  });

  it("keeps the queue moving after a failure", async () => {
    const mutex = new KeyedMutex();
    const failed = mutex.run("a", async () => {
      throw new Error("boom");
    });
    const next = mutex.run("a", async () => "after");
    await expect(failed).rejects.toThrow("boom");
    await expect(next).resolves.toBe("after");
  });

  it("scopes in-process locks by scope and key", async () => {
    const mutex = new KeyedMutex();
    const locks = createInProcessLocks(mutex);
    const events: string[] = [];

    await Promise.all([
      locks.withLock("class-index", "c1", async () => {
        events.push("lock:start");
        await tick();
        events.push("lock:end");
      }),
      mutex.run("class-index:c1", async () => {
        events.push("same-key");
      }),
      mutex.run("c1", async () => {
        events.push("other-key");
      }),
    ]);

    expect(events).toEqual(["lock:start", "other-key", "lock:end", "same-key"]);
  });
});

describe("deriveTopic", () => {
  it("keeps the first few distinct significant words", () => {
    expect(extractKeywords("What does the mitochondria do in a cell?")).toEqual(["mitochondria", "cell"]);
    expect(deriveTopic("Explain osmosis, diffusion, membranes and gradients")).toBe("osmosis diffusion membranes");
    expect(deriveTopic("cells cells CELLS energy")).toBe("cells energy");
  });

  it("falls back to general", () => {
    expect(deriveTopic("Why is it so?")).toBe("general");
  });
});

describe("tryParseJson", () => {
  it("reads fenced, prefixed, and string-wrapped objects", () => {
    expect(tryParseJson('```json\n{"a":1}\n```')).toEqual({ a: 1 });
    expect(tryParseJson('Sure! Here you go: {"a":1} Enjoy.')).toEqual({ a: 1 });
    expect(tryParseJson(JSON.stringify(JSON.stringify({ a: 1 })))).toEqual({ a: 1 });
  });

  it("returns null when there is no JSON", () => {
    expect(tryParseJson("")).toBeNull();
    expect(tryParseJson("no json here")).toBeNull();
  });
});

describe("previewForLog", () => {
  it("trims and truncates", () => {
    expect(previewForLog("  short  ")).toBe("short");
    expect(previewForLog("abcdefghij", 4)).toBe("abcd...(+6 chars)");
    expect(previewForLog("   ")).toBeNull();
  });
});
