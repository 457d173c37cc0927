// scripts/lib/env.ts
// Env for operator scripts: process.env over an optional .env at the repo root.

import { existsSync, readFileSync } from "node:fs";
import { dirname, resolve } from "node:path";
import { fileURLToPath } from "node:url";

const __filename = fileURLToPath(import.meta.url);
const __dirname  = dirname(__filename);
export const ROOT = resolve(__dirname, "../..");

export type Env = Record<string, string | undefined>;

export function parseEnvFile(content: string): Record<string, string> {
  const result: Record<string, string> = {};
  for (const line of content.split("\n")) {
    const trimmed = line.trim();
    if (!trimmed || trimmed.startsWith("#")) continue;
    const eqIdx = trimmed.indexOf("=");
    if (eqIdx === -1) continue;
    result[trimmed.slice(0, eqIdx).trim()] = trimmed.slice(eqIdx + 1).trim();
  }
  return result;
}

export function loadEnv(path = resolve(ROOT, ".env")): Env {
  const fromFile = existsSync(path) ? parseEnvFile(readFileSync(path, "utf-8")) : {};
  return { ...fromFile, ...process.env };
}
