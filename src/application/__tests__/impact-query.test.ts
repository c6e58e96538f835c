import { describe, it, expect, afterEach } from "vitest";
import { impactQuery } from "../queries/impact-query.ts";
import type { DependencyInput } from "../../domain/rules.ts";
import { createTestContainer, type TestContainer } from "../../__tests__/fixtures.ts";

describe("impactQuery", () => {
  let t: TestContainer;

  afterEach(async () => {
    await t.container.close();
  });

  async function domain(service: string, name: string, dependencies: DependencyInput[] = []) {
    return t.container.domains.createOrUpdate({
      project: "P",
      service,
      domain: name,
      summary: `${name} domain`,
      properties: [],
      policies: [],
      dependencies,
    });
  }

  it("reports exactly the domains that declare a dependency on the target", async () => {
    t = createTestContainer();
    const a = await domain("S", "A");
    const b = await domain("S", "B", [{ target_domain: "A", description: "owner" }]);
    const c = await domain("Other", "C", [{ target_domain: "A", target_service: "S", relation_type: "reference" }]);
    await domain("S", "D", [{ target_domain: "B" }]);

    const result = impactQuery({ project: "P", service: "S", domain: "A" }, t.container.domainStore);

    expect(result.analyzed).toEqual({ identifier: a.identifier, version: 1 });
    expect(result.dependents).toEqual([
      { identifier: c.identifier, service: "Other", domain: "C", version: 1, relation_type: "REFERENCE", description: "" },
      { identifier: b.identifier, service: "S", domain: "B", version: 1, relation_type: "DEPENDENCY", description: "owner" },
    ]);
    expect(result.total).toBe(2);
    expect(result.message).toBe("'A' is referenced by 2 domain(s): C (Other), B (S).");
  });

  it("reports no dependents for a domain nobody references", async () => {
    t = createTestContainer();
    await domain("S", "A");
    await domain("S", "B", [{ target_domain: "A" }]);

    const result = impactQuery({ project: "P", service: "S", domain: "B" }, t.container.domainStore);

    expect(result.dependents).toEqual([]);
    expect(result.total).toBe(0);
    expect(result.message).toBe("No dependents: no domain references 'B'.");
  });

  it("resolves an omitted target service to the declaring document's service", async () => {
    t = createTestContainer();
    await domain("S", "A");
    await domain("Other", "A");
    await domain("Other", "B", [{ target_domain: "A" }]);

    const inS = impactQuery({ project: "P", service: "S", domain: "A" }, t.container.domainStore);
    const inOther = impactQuery({ project: "P", service: "Other", domain: "A" }, t.container.domainStore);

    expect(inS.total).toBe(0);
    expect(inOther.dependents.map((d) => d.domain)).toEqual(["B"]);
  });

  it("only looks at the latest live version of each document", async () => {
    t = createTestContainer();
    await domain("S", "A");
    await domain("S", "B", [{ target_domain: "A" }]);
    await domain("S", "B");
    await domain("S", "C", [{ target_domain: "A" }]);
    t.container.domains.softDelete("P", "S", "C");

    const result = impactQuery({ project: "P", service: "S", domain: "A" }, t.container.domainStore);

    expect(result.dependents).toEqual([]);
  });

  it("still scans when the analyzed domain is not in the catalog", async () => {
    t = createTestContainer();
    await domain("S", "B", [{ target_domain: "Planned" }]);

    const result = impactQuery({ project: "P", service: "S", domain: "Planned" }, t.container.domainStore);

    expect(result.analyzed).toBeNull();
    expect(result.dependents.map((d) => d.domain)).toEqual(["B"]);
  });
});
