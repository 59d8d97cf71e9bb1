import { createClaim, type Claim, type Evidence, type Source } from "@/lib/analyzer/types";

export function makeSource(overrides: Partial<Source> = {}): Source {
  return {
    url: "https://example.org/article",
    title: "Example article",
    content: "Example content.",
    sourceType: "web",
    credibilityScore: 0.9,
    relevanceScore: 0.5,
    ...overrides,
  };
}

export function makeClaim(text: string, sources: Source[] = []): Claim {
  return { ...createClaim(text, "claim-1"), sources };
}

export function makeEvidence(overrides: Partial<Evidence> = {}): Evidence {
  return {
    source: makeSource(),
    supportingText: "",
    supportsClaim: true,
    confidence: 0.9,
    extractionMethod: "llm_analysis",
    metadata: {},
    ...overrides,
  };
}

export const BERLIN_SOURCE = makeSource({
  url: "https://example.org/encyclopedia/berlin-wall",
  title: "Berlin Wall",
  content: "The Berlin Wall fell on 9 November 1989 when border crossings were opened to the West.",
  sourceType: "wikipedia",
  credibilityScore: 0.9,
  relevanceScore: 0.9,
});

export const BERLIN_NEWS_SOURCE = makeSource({
  url: "https://example.org/news/wall-anniversary",
  title: "Thirty years since the wall came down",
  content: "Crowds gathered to mark the night in 1989 when the Berlin Wall fell.",
  sourceType: "news",
  credibilityScore: 0.9,
  relevanceScore: 0.6,
});

export const APPLE_SOURCE = makeSource({
  url: "https://example.org/encyclopedia/apple-inc",
  title: "Apple Inc.",
  content: "Apple Inc. was founded by Steve Jobs, Steve Wozniak and Ronald Wayne in April 1976.",
  sourceType: "wikipedia",
  credibilityScore: 0.9,
  relevanceScore: 0.8,
});
