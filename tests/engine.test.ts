import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { createSupabaseTutoringEngine, createTutoringEngine } from "@/lib/engine";
import { chunkIdFor } from "@/lib/transcript-indexer";
import { ConfigError } from "@/lib/errors";
import { createMemoryStores } from "./support/memory-stores";
import { keywordEmbedder, scriptedGenerator, staticEntitlements, testConfig } from "./support/fakes";

const TRANSCRIPT = [
  "Photosynthesis turns light into chemical energy.",
  "Chlorophyll absorbs light in the leaves of plants.",
  "Mitochondria release energy inside every cell.",
  "Gravity keeps the moon in orbit around the earth.",
].join(" ");
const FIRST_CHUNK = "Photosynthesis turns light into chemical energy. Chlorophyll absorbs light in the leaves of plants.";

describe("createTutoringEngine", () => {
  beforeEach(() => {
    vi.spyOn(console, "info").mockImplementation(() => undefined);
    vi.spyOn(console, "warn").mockImplementation(() => undefined);
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  it("answers from a freshly indexed class", async () => {
    const scripted = scriptedGenerator(["Leaves absorb light with chlorophyll [S1]."]);
    const engine = createTutoringEngine({
      config: testConfig(),
      stores: createMemoryStores(),
      embedder: keywordEmbedder().backend,
      generator: scripted.generator,
      entitlements: staticEntitlements({ "s1:biology": ["c1"] }),
    });

    const indexed = await engine.indexer.index("c1", "biology", TRANSCRIPT);
    expect(indexed.chunks).toHaveLength(2);

    const answer = await engine.tutor.ask({
      studentId: "s1",
      subjectId: "biology",
      question: "How does photosynthesis use light?",
    });

    expect(answer.kind).toBe("grounded");
    if (answer.kind !== "grounded") throw new Error("expected a grounded answer");
    expect(answer.citations.map((citation) => citation.chunkId)).toEqual([chunkIdFor("c1", 0, FIRST_CHUNK)]);
    expect(scripted.calls[0].context).toEqual([`[S1] ${FIRST_CHUNK}`]);
    expect(engine.levels.levelLabel(answer.level)).toBe("proficient");
  });

  it("refuses to wire Supabase without credentials", () => {
    expect(() => createSupabaseTutoringEngine({ env: {} })).toThrow(ConfigError);
  });
});
