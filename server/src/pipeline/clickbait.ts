export const CLICKBAIT_TRIGGERS = [
  "szok",
  "nie uwierzysz",
  "tego nie wiedziałeś",
  "sekret",
  "zdradza",
  "musisz zobaczyć",
  "niewiarygodne",
  "hit",
  "sensacja",
  "pilne",
  "breaking",
  "exclusive"
] as const;

const EXCLAMATION_WEIGHT = 0.5;
const QUESTION_WEIGHT = 0.25;
const CAPS_RATIO_THRESHOLD = 0.3;
const CAPS_PENALTY = 0.5;
const SCALE = 0.2;

export type ClickbaitBand = "ok" | "warning" | "clickbait";

function countChar(chars: string[], target: string): number {
  return chars.filter((c) => c === target).length;
}

function isUpperCase(ch: string): boolean {
  return ch !== ch.toLowerCase() && ch === ch.toUpperCase();
}

/**
 * Heuristic sensationalism score for a headline, in [0, 1].
 *
 * Each trigger phrase found (substring, case-insensitive) adds 1, every `!`
 * adds 0.5, every `?` 0.25, and a title that is more than 30% capitals adds
 * 0.5. The sum is scaled by 0.2 and capped at 1.
 */
export function scoreClickbait(title: string): number {
  const lower = title.toLowerCase();
  const chars = [...title];

  let raw = CLICKBAIT_TRIGGERS.filter((phrase) => lower.includes(phrase)).length;
  raw += countChar(chars, "!") * EXCLAMATION_WEIGHT;
  raw += countChar(chars, "?") * QUESTION_WEIGHT;

  const capsRatio = chars.filter(isUpperCase).length / Math.max(chars.length, 1);
  if (capsRatio > CAPS_RATIO_THRESHOLD) raw += CAPS_PENALTY;

  return Math.min(raw * SCALE, 1);
}

export function classifyClickbait(score: number): ClickbaitBand {
  if (score < 0.3) return "ok";
  if (score < 0.6) return "warning";
  return "clickbait";
}
