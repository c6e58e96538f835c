import { describe, it, expect, afterEach } from "vitest";
import { semanticQuery, type SemanticQueryInput } from "../queries/semantic-query.ts";
import { EmbeddingProviderError, ValidationError } from "../../domain/errors.ts";
import { createTestContainer, FakeEmbeddingProvider, type TestContainer } from "../../__tests__/fixtures.ts";

describe("semanticQuery", () => {
  let t: TestContainer;

  afterEach(async () => {
    await t.container.close();
  });

  /** Every query embeds to [1, 0]; stored rows get explicit vectors. */
  function setup(): void {
    t = createTestContainer({ provider: new FakeEmbeddingProvider(2, () => [1, 0]) });
  }

  function addDomain(name: string, vector: number[] | null) {
    const store = t.container.domainStore;
    const doc = store.save(
      { project: "P", service: "S", domain: name },
      { summary: name, properties: [], policies: [], dependencies: [] },
    );
    if (vector) store.updateEmbedding(doc.identifier, vector);
    return doc;
  }

  function addConvention(title: string, vector: number[] | null) {
    const store = t.container.conventionStore;
    const conv = store.save(
      { project: "P", category: "NAMING", title },
      { content: title, example_correct: null, example_incorrect: null },
    );
    if (vector) store.updateEmbedding(conv.identifier, vector);
    return conv;
  }

  function search(input: SemanticQueryInput) {
    return semanticQuery(input, {
      embeddings: t.container.embeddings,
      domainStore: t.container.domainStore,
      conventionStore: t.container.conventionStore,
    });
  }

  it("returns an empty result when nothing clears the threshold", async () => {
    setup();
    addDomain("Sideways", [0, 1]);
    addConvention("Opposite", [-1, 0]);

    const result = await search({ query: "anything", similarityThreshold: 0.3 });

    expect(result).toEqual({ query: "anything", total_count: 0, matches: [] });
  });

  it("merges both catalogs and truncates to top_k by descending similarity", async () => {
    setup();
    for (let k = 0; k < 15; k++) {
      const vector = [1, 0.1 * k];
      if (k % 2 === 0) addDomain(`D${k}`, vector);
      else addConvention(`C${k}`, vector);
    }

    const result = await search({ query: "ranked", topK: 10, similarityThreshold: 0 });

    expect(result.total_count).toBe(10);
    expect(
      result.matches.map((m) => (m.document_type === "DOMAIN" ? m.content.domain : m.content.title)),
    ).toEqual(["D0", "C1", "D2", "C3", "D4", "C5", "D6", "C7", "D8", "C9"]);
    const scores = result.matches.map((m) => m.similarity);
    expect([...scores].sort((a, b) => b - a)).toEqual(scores);
    expect(scores[0]).toBeCloseTo(1, 10);
    expect(scores[9]).toBeCloseTo(1 / Math.sqrt(1 + 0.81), 10);
  });

  it("uses the default top_k of 10", async () => {
    setup();
    for (let k = 0; k < 12; k++) addDomain(`D${k}`, [1, 0.1 * k]);

    const result = await search({ query: "defaults" });

    expect(result.total_count).toBe(10);
  });

  it("skips soft-deleted and not-yet-embedded rows", async () => {
    setup();
    const live = addDomain("Live", [1, 0]);
    addDomain("Pending", null);
    addDomain("Removed", [1, 0]);
    t.container.domainStore.softDelete({ project: "P", service: "S", domain: "Removed" });

    const result = await search({ query: "live only" });

    expect(result.matches.map((m) => m.document_id)).toEqual([live.identifier]);
  });

  it("returns the entity snapshot without the vector", async () => {
    setup();
    const conv = addConvention("Variables", [1, 0]);

    const [match] = (await search({ query: "variables" })).matches;

    expect(match?.document_type).toBe("CONVENTION");
    expect(match?.document_id).toBe(conv.identifier);
    expect(match?.content).toMatchObject({ title: "Variables", category: "NAMING", version: 1, has_embedding: true });
    expect(match?.content).not.toHaveProperty("embedding");
  });

  it("keeps domain matches ahead of equally scored conventions", async () => {
    setup();
    addConvention("Tie", [2, 0]);
    addDomain("Tie", [1, 0]);

    const result = await search({ query: "tie" });

    expect(result.matches.map((m) => m.document_type)).toEqual(["DOMAIN", "CONVENTION"]);
  });

  it("rejects malformed parameters before embedding the query", async () => {
    const provider = new FakeEmbeddingProvider(2, () => [1, 0]);
    t = createTestContainer({ provider });

    await expect(search({ query: "  " })).rejects.toBeInstanceOf(ValidationError);
    await expect(search({ query: "ok", topK: 0 })).rejects.toThrow("top_k must be a positive integer, got 0");
    await expect(search({ query: "ok", similarityThreshold: 2 })).rejects.toBeInstanceOf(ValidationError);
    expect(provider.calls).toEqual([]);
  });

  it("surfaces a provider failure on the query path", async () => {
    const provider = new FakeEmbeddingProvider(2, () => [1, 0]);
    provider.failing = true;
    t = createTestContainer({ provider });

    await expect(search({ query: "broken" })).rejects.toBeInstanceOf(EmbeddingProviderError);
  });
});
