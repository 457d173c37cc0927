import { GoogleGenerativeAI, TaskType } from "@google/generative-ai";

import type { EmbeddingProvider } from "./capabilities.ts";
import { ConfigurationError } from "./errors.ts";

const DEFAULT_MODEL = "text-embedding-004";
const BATCH_LIMIT   = 100;  // batchEmbedContents request cap

type Env = Record<string, string | undefined>;

/** Gemini text embeddings. Reads GOOGLE_AI_KEY unless a key is passed. */
export function createGeminiEmbeddings(
  apiKey = "",
  model  = DEFAULT_MODEL,
  env:    Env = process.env,
): EmbeddingProvider {
  const key = apiKey || env.GOOGLE_AI_KEY || "";
  if (!key) throw new ConfigurationError("Missing GOOGLE_AI_KEY");

  const embedder = new GoogleGenerativeAI(key).getGenerativeModel({ model });

  return {
    model,
    async embed(texts: string[]): Promise<number[][]> {
      const vectors: number[][] = [];
      for (let i = 0; i < texts.length; i += BATCH_LIMIT) {
        const chunk = texts.slice(i, i + BATCH_LIMIT);
        const res   = await embedder.batchEmbedContents({
          requests: chunk.map(text => ({
            content:  { role: "user", parts: [{ text }] },
            taskType: TaskType.SEMANTIC_SIMILARITY,
          })),
        });
        if (res.embeddings.length !== chunk.length) {
          throw new Error(`Gemini returned ${res.embeddings.length} embeddings for ${chunk.length} texts`);
        }
        for (const e of res.embeddings) vectors.push(e.values);
      }
      return vectors;
    },
  };
}
