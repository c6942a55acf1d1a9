// Test fixture: deterministic embedder that counts vocabulary hits.
// Every dimension gets a small floor so no vector is ever all zeros.

import type { Embedder } from "../types/index.js";

export const TEST_VOCABULARY = ["mcp", "protocol", "python", "agents", "vector", "search"];

export class KeywordEmbedder implements Embedder {
  public calls: string[][] = [];

  constructor(private readonly vocabulary: string[] = TEST_VOCABULARY) {}

  async embed(texts: string[]): Promise<Float32Array[]> {
    this.calls.push([...texts]);
    return texts.map((text) => this.toVector(text));
  }

  toVector(text: string): Float32Array {
    const words = text.toLowerCase().split(/[^a-z0-9]+/).filter(Boolean);
    return Float32Array.from(
      this.vocabulary.map((term) => words.filter((w) => w === term).length + 0.01)
    );
  }
}
