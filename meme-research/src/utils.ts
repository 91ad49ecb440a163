export function collapse(s: string): string {
  return s.replace(/\s+/g, " ").trim();
}

export function trimTo(s: string | undefined, n = 800): string | undefined {
  if (!s) return s;
  const t = collapse(s);
  return t.length > n ? t.slice(0, n) : t;
}

export async function sleep(ms: number) {
  return new Promise((r) => setTimeout(r, ms));
}

export function sanitizeKeyword(keyword: string): string {
  return keyword
    .toLowerCase()
    .replace(/[^a-z0-9]+/gi, "_")
    .replace(/^_+|_+$/g, "")
    .slice(0, 60);
}
