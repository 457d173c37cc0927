// Externally supplied capabilities the generators call into.

/** Maps texts to vectors in one shared space. Order of output matches input. */
export interface EmbeddingProvider {
  readonly model: string;
  embed(texts: string[]): Promise<number[][]>;
}

export interface ExtractedEntity {
  text:  string;
  label: "ORG" | "PERSON" | "PRODUCT" | "OTHER";
}

/** Named-entity recognition over article text. */
export interface EntityExtractor {
  extract(text: string): Promise<ExtractedEntity[]>;
}
