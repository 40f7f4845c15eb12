import fs from "node:fs/promises";
import path from "node:path";
import { randomBytes } from "node:crypto";
import { fileURLToPath } from "node:url";

export function nowIso(): string {
  return new Date().toISOString();
}

export function repoRoot(): string {
  // This file lives at server/src/pipeline/utils.ts
  // repo root is three levels up: pipeline -> src -> server -> repo
  const here = path.dirname(fileURLToPath(import.meta.url));
  return path.resolve(here, "../../..");
}

function resolveFromEnv(envName: string, fallback: string): string {
  const env = process.env[envName];
  if (env && env.trim().length > 0) return path.resolve(env.trim());
  return path.join(repoRoot(), fallback);
}

export function promptsFileAbs(): string {
  return resolveFromEnv("NEWSROOM_PROMPTS_FILE", path.join("config", "prompts.json"));
}

export function logFileAbs(): string {
  return resolveFromEnv("NEWSROOM_LOG_FILE", path.join("logs", "newsroom.log"));
}

export function webDirAbs(): string {
  return resolveFromEnv("NEWSROOM_WEB_DIR", "web");
}

export async function ensureDir(dirPath: string): Promise<void> {
  await fs.mkdir(dirPath, { recursive: true });
}

export async function appendTextLine(filePath: string, line: string): Promise<void> {
  await ensureDir(path.dirname(filePath));
  await fs.appendFile(filePath, line.endsWith("\n") ? line : `${line}\n`, "utf8");
}

export async function readJsonFile(filePath: string): Promise<unknown> {
  const raw = await fs.readFile(filePath, "utf8");
  const parsed: unknown = JSON.parse(raw);
  return parsed;
}

export function toErrorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

export function slug(input: string): string {
  const s = input
    .trim()
    .toLowerCase()
    .normalize("NFKD")
    .replace(/[\u0300-\u036f]/g, "")
    .replace(/ł/g, "l")
    .replace(/[^a-z0-9]+/g, "-")
    .replace(/^-+|-+$/g, "");
  return s.slice(0, 60) || "untitled";
}

export function excerpt(text: string, max = 120): string {
  const flat = text.replace(/\s+/g, " ").trim();
  return flat.length > max ? `${flat.slice(0, max)}...` : flat;
}

const CYCLE_ID_SLUG_MAX = 48;
const CYCLE_ID_SUFFIX_LEN = 8;
const CYCLE_ID_SUFFIX_ALPHABET = "abcdefghijklmnopqrstuvwxyz0123456789";

function randomSuffix(length: number): string {
  const bytes = randomBytes(length);
  let out = "";
  for (const byte of bytes) out += CYCLE_ID_SUFFIX_ALPHABET[byte % CYCLE_ID_SUFFIX_ALPHABET.length];
  return out;
}

/** `<topic-slug>-<8 random chars>`, e.g. `energy-prices-4k2m9x0a`. */
export function newCycleId(topic: string): string {
  return `${slug(topic).slice(0, CYCLE_ID_SLUG_MAX).replace(/-+$/, "")}-${randomSuffix(CYCLE_ID_SUFFIX_LEN)}`;
}
