import { describe, it, expect } from "vitest";
import { NotFoundError } from "../../domain/errors.ts";
import { createLogger } from "../logger.ts";

const AT = "2026-01-01T00:00:00.000Z";

function logger(level: "debug" | "info" | "warn" | "error" = "info") {
  const lines: string[] = [];
  const log = createLogger("catalog", { level, sink: (line) => lines.push(line), clock: () => new Date(AT) });
  return { log, lines };
}

describe("createLogger", () => {
  it("drops messages below the configured level", () => {
    const { log, lines } = logger("warn");

    log.debug("noise");
    log.info("still noise");
    log.warn("kept");

    expect(lines).toEqual([`${AT} WARN [catalog] kept`]);
  });

  it("formats context fields as key=value pairs", () => {
    const { log, lines } = logger();

    log.info("saved", { id: "a1", version: 2, note: "two words", tags: ["x"], missing: undefined });
    log.info("bare", {});

    expect(lines).toEqual([
      `${AT} INFO [catalog] saved id=a1 version=2 note="two words" tags=["x"] missing=undefined`,
      `${AT} INFO [catalog] bare`,
    ]);
  });

  it("renders catalog errors with their code", () => {
    const { log, lines } = logger();

    log.error("lookup failed", { error: new NotFoundError("gone") });

    expect(lines).toEqual([`${AT} ERROR [catalog] lookup failed error="NOT_FOUND: gone"`]);
  });

  it("nests scopes and keeps the parent level", () => {
    const { log, lines } = logger("info");
    const child = log.child("domain").child("store");

    child.debug("hidden");
    child.info("visible");

    expect(lines).toEqual([`${AT} INFO [catalog.domain.store] visible`]);
  });
});
