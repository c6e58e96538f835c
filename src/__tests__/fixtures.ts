/**
 * Shared test fixtures: in-memory container, fake embedding provider,
 * deterministic clock and a log sink that keeps lines for assertions.
 */

import type { EmbeddingProvider } from "../application/embedding/provider.ts";
import type { DispatchMode } from "../application/embedding/post-commit.ts";
import type { CatalogConfig } from "../config.ts";
import { createContainer, type Container } from "../container.ts";
import { DEFAULT_CONVENTION_CATEGORIES } from "../domain/types.ts";
import { createLogger, type Logger } from "../infra/logger.ts";

export const KEYWORDS = ["user", "order", "naming", "test"] as const;

/** One axis per keyword: 1 when the lower-cased text contains it. */
export function keywordVector(text: string): number[] {
  const lower = text.toLowerCase();
  return KEYWORDS.map((k) => (lower.includes(k) ? 1 : 0));
}

export class FakeEmbeddingProvider implements EmbeddingProvider {
  readonly model = "fake-keywords";
  readonly calls: string[] = [];
  failing = false;

  constructor(
    readonly dimensions: number = KEYWORDS.length,
    private readonly vectorFor: (text: string) => number[] = keywordVector,
  ) {}

  async generateEmbedding(text: string): Promise<number[]> {
    this.calls.push(text);
    if (this.failing) throw new Error("provider unavailable");
    return this.vectorFor(text);
  }
}

/** Clock that advances one second per call, starting at 2026-01-01T00:00:00Z. */
export function steppingClock(start = "2026-01-01T00:00:00.000Z"): () => Date {
  let ms = Date.parse(start);
  return () => {
    const now = new Date(ms);
    ms += 1000;
    return now;
  };
}

export function captureLogger(): { logger: Logger; lines: string[] } {
  const lines: string[] = [];
  const logger = createLogger("test", { level: "debug", sink: (line) => lines.push(line) });
  return { logger, lines };
}

export function testConfig(overrides: Partial<CatalogConfig> = {}): CatalogConfig {
  return {
    databasePath: ":memory:",
    embeddingModel: "fake-keywords",
    embeddingDimensions: KEYWORDS.length,
    embeddingDispatch: "inline",
    logLevel: "debug",
    conventionCategories: [...DEFAULT_CONVENTION_CATEGORIES],
    ...overrides,
  };
}

export interface TestContainer {
  container: Container;
  provider: FakeEmbeddingProvider;
  lines: string[];
}

export function createTestContainer(
  options: { dispatch?: DispatchMode; provider?: FakeEmbeddingProvider; config?: Partial<CatalogConfig> } = {},
): TestContainer {
  const provider = options.provider ?? new FakeEmbeddingProvider();
  const { logger, lines } = captureLogger();
  const container = createContainer(
    testConfig({ embeddingDispatch: options.dispatch ?? "inline", ...options.config }),
    { provider, logger, store: { clock: steppingClock() } },
  );
  return { container, provider, lines };
}
