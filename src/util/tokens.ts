// Fixed heuristic shared by every size limit: one token per four characters (code points).

export function charCount(text: string): number {
  let n = 0;
  for (const _ of text) n++;
  return n;
}

export function estimateTokens(text: string): number {
  return Math.max(1, Math.floor(charCount(text) / 4));
}

export function clampTokens(text: string, maxTokens: number, notice: string): string {
  if (estimateTokens(text) <= maxTokens) return text;
  return Array.from(text).slice(0, maxTokens * 4).join("") + notice;
}
