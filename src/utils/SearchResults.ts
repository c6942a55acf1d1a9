import type { ChunkMetadata } from "../types/index.js";

export interface SearchHit {
  document: string;
  metadata: ChunkMetadata;
  distance: number;
}

/**
 * Immutable bundle of retrieved chunks. Either carries hits or an error,
 * never both.
 */
export class SearchResults {
  readonly documents: ReadonlyArray<string>;
  readonly metadata: ReadonlyArray<ChunkMetadata>;
  readonly distances: ReadonlyArray<number>;
  readonly error: string | null;

  private constructor(
    documents: string[],
    metadata: ChunkMetadata[],
    distances: number[],
    error: string | null
  ) {
    this.documents = Object.freeze(documents);
    this.metadata = Object.freeze(metadata.map((m) => Object.freeze({ ...m })));
    this.distances = Object.freeze(distances);
    this.error = error;
    Object.freeze(this);
  }

  static fromHits(hits: SearchHit[]): SearchResults {
    return new SearchResults(
      hits.map((h) => h.document),
      hits.map((h) => h.metadata),
      hits.map((h) => h.distance),
      null
    );
  }

  static empty(error: string | null = null): SearchResults {
    return new SearchResults([], [], [], error);
  }

  isEmpty(): boolean {
    return this.documents.length === 0;
  }

  get size(): number {
    return this.documents.length;
  }

  hits(): SearchHit[] {
    return this.documents.map((document, i) => ({
      document,
      metadata: this.metadata[i],
      distance: this.distances[i],
    }));
  }
}
