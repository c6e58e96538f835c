import { describe, it, expect, afterEach } from "vitest";
import { NotFoundError, ValidationError } from "../../domain/errors.ts";
import type { DomainSubmission } from "../../domain/rules.ts";
import { createTestContainer, type TestContainer } from "../../__tests__/fixtures.ts";

const ID = { name: "id", type: "UUID", description: "identifier", is_required: true, is_immutable: true };
const NICKNAME = { name: "nickname", type: "String", description: "display name", is_required: false, is_immutable: false };

function user(overrides: Partial<DomainSubmission> = {}): DomainSubmission {
  return {
    project: "P",
    service: "S",
    domain: "User",
    summary: "Registered users",
    properties: [ID],
    policies: [],
    ...overrides,
  };
}

describe("DomainCatalogService", () => {
  let t: TestContainer;

  afterEach(async () => {
    await t.container.close();
  });

  it("creates version 1 and then version 2 with the added property", async () => {
    t = createTestContainer();
    const { domains } = t.container;

    const v1 = await domains.createOrUpdate(user());
    const v2 = await domains.createOrUpdate(user({ properties: [ID, NICKNAME] }));

    expect(v1.version).toBe(1);
    expect(v2.version).toBe(2);

    const latest = domains.getByIdentity("P", "S", "User");
    expect(latest?.version).toBe(2);
    expect(latest?.properties.map((p) => p.name)).toEqual(["id", "nickname"]);

    const history = domains.listVersions("P", "S", "User");
    expect(history.map((d) => d.version)).toEqual([1, 2]);
    expect(history[0]?.properties).toEqual([ID]);
  });

  it("returns a requested version and rejects a malformed one", async () => {
    t = createTestContainer();
    const { domains } = t.container;
    await domains.createOrUpdate(user({ summary: "first" }));
    await domains.createOrUpdate(user({ summary: "second" }));

    expect(domains.getByIdentity("P", "S", "User", 1)?.summary).toBe("first");
    expect(domains.getByIdentity("P", "S", "User", 7)).toBeUndefined();
    expect(() => domains.getByIdentity("P", "S", "User", 0)).toThrow(ValidationError);
  });

  it("returns the document with its embedding once the inline save completes", async () => {
    t = createTestContainer();
    const saved = await t.container.domains.createOrUpdate(user());

    expect(saved.version).toBe(1);
    expect(saved.embedding).toEqual([1, 0, 0, 0]);
    expect(t.provider.calls).toEqual([
      "Domain: User | Project: P | Service: S | Summary: Registered users | Properties: id(UUID): identifier",
    ]);
    expect(t.container.domains.getByIdentifier(saved.identifier).embedding).toEqual([1, 0, 0, 0]);
  });

  it("still returns the saved document when the embedding provider fails", async () => {
    t = createTestContainer();
    t.provider.failing = true;

    const saved = await t.container.domains.createOrUpdate(user());

    expect(saved.version).toBe(1);
    expect(saved.embedding).toBeNull();
    expect(t.container.domains.getByIdentifier(saved.identifier).embedding).toBeNull();
    const failure = t.lines.find((l) => l.includes("ERROR [test.post-commit] post-commit task failed"));
    expect(failure).toContain(`task="embed domain_document ${saved.identifier}"`);
    expect(failure).toContain('error="EMBEDDING_PROVIDER_ERROR: fake-keywords: provider unavailable"');
  });

  it("embeds in the background when configured to", async () => {
    t = createTestContainer({ dispatch: "background" });
    const saved = await t.container.domains.createOrUpdate(user());

    await t.container.dispatcher.idle();

    expect(t.container.dispatcher.pendingCount).toBe(0);
    expect(t.container.domains.getByIdentifier(saved.identifier).embedding).toEqual([1, 0, 0, 0]);
  });

  it("assigns gap-free versions to saves issued together", async () => {
    t = createTestContainer();
    const saves = Array.from({ length: 10 }, (_, i) =>
      t.container.domains.createOrUpdate(user({ summary: `revision ${i}` })),
    );

    const saved = await Promise.all(saves);

    expect(saved.map((d) => d.version).sort((a, b) => a - b)).toEqual([1, 2, 3, 4, 5, 6, 7, 8, 9, 10]);
    expect(t.container.domains.getByIdentity("P", "S", "User")?.version).toBe(10);
  });

  it("rejects invalid input before touching storage", async () => {
    t = createTestContainer();

    await expect(t.container.domains.createOrUpdate(user({ properties: [ID, ID] }))).rejects.toThrow(
      "duplicate property name 'id'",
    );
    expect(t.container.domains.listVersions("P", "S", "User")).toEqual([]);
    expect(t.provider.calls).toEqual([]);
  });

  it("soft-deletes every version and lists only live projects", async () => {
    t = createTestContainer();
    const { domains } = t.container;
    await domains.createOrUpdate(user());
    await domains.createOrUpdate(user());
    await domains.createOrUpdate(user({ project: "Q" }));

    expect(domains.softDelete("P", "S", "User")).toBe(2);
    expect(domains.softDelete("P", "S", "User")).toBe(0);
    expect(domains.getByIdentity("P", "S", "User")).toBeUndefined();
    expect(domains.listProjects()).toEqual(["Q"]);
    expect(domains.listLatest("Q").map((d) => d.domain)).toEqual(["User"]);
  });

  it("throws NotFoundError for an unknown identifier", () => {
    t = createTestContainer();

    expect(() => t.container.domains.getByIdentifier("missing")).toThrow(NotFoundError);
  });
});
