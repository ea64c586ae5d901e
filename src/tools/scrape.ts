import type { Scraper } from "../types";

const USER_AGENT =
  "Mozilla/5.0 (Windows NT 10.0; Win64; x64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/120.0.0.0 Safari/537.36";
const FETCH_TIMEOUT_MS = 20_000;
const MAX_ATTEMPTS = 3;

const NOISE_TAGS = [
  "script", "style", "noscript", "iframe", "nav", "footer", "header", "aside",
  "form", "button", "select", "textarea", "svg", "canvas",
];
const CONTENT_TAGS = ["article", "main"];
const TEXT_TAGS = ["h1", "h2", "h3", "h4", "h5", "h6", "p", "li", "blockquote", "td", "th", "dd", "dt", "pre", "figcaption"];

const NESTED_BLOCK = new RegExp(`<(${TEXT_TAGS.join("|")})\\b`, "i");

const MIN_FRAGMENT_LENGTH = 15;
const MIN_CONTENT_LENGTH = 200;
export const MAX_TEXT_LENGTH = 8_000;

const ENTITIES: Record<string, string> = {
  amp: "&", lt: "<", gt: ">", quot: "\"", apos: "'", nbsp: " ", "#39": "'",
};

const HANGUL = /[가-힣ᄀ-ᇿㄱ-ㆎ]/g;

function decodeEntities(text: string): string {
  return text
    .replace(/&#x([0-9a-f]+);/gi, (_, hex: string) => String.fromCodePoint(parseInt(hex, 16)))
    .replace(/&#(\d+);/g, (_, dec: string) => String.fromCodePoint(parseInt(dec, 10)))
    .replace(/&([a-z]+|#39);/gi, (match, name: string) => ENTITIES[name.toLowerCase()] ?? match);
}

function stripTags(html: string): string {
  return decodeEntities(html.replace(/<[^>]+>/g, " ")).replace(/\s+/g, " ").trim();
}

function removeNoise(html: string): string {
  let cleaned = html.replace(/<!--[\s\S]*?-->/g, "");
  for (const tag of NOISE_TAGS) {
    cleaned = cleaned.replace(new RegExp(`<${tag}\\b[^>]*>[\\s\\S]*?</${tag}>`, "gi"), " ");
  }
  return cleaned;
}

function findContentNode(html: string): string {
  for (const tag of CONTENT_TAGS) {
    const match = new RegExp(`<${tag}\\b[^>]*>([\\s\\S]*?)</${tag}>`, "i").exec(html);
    if (match && stripTags(match[1]).length > MIN_CONTENT_LENGTH) {
      return match[1];
    }
  }
  const body = /<body\b[^>]*>([\s\S]*)<\/body>/i.exec(html);
  return body ? body[1] : html;
}

/** Leaf-level text fragments, deduplicated by their first 80 characters. */
export function collectFragments(html: string): string[] {
  const seen = new Set<string>();
  const fragments: string[] = [];

  const visit = (markup: string): void => {
    const pattern = new RegExp(`<(${TEXT_TAGS.join("|")})\\b[^>]*>([\\s\\S]*?)</\\1>`, "gi");
    for (const match of markup.matchAll(pattern)) {
      // a list item wrapping paragraphs: descend to the paragraphs
      if (NESTED_BLOCK.test(match[2])) {
        visit(match[2]);
        continue;
      }
      const text = stripTags(match[2]);
      if (text.length < MIN_FRAGMENT_LENGTH) continue;
      const key = text.slice(0, 80);
      if (seen.has(key)) continue;
      seen.add(key);
      fragments.push(text);
    }
  };

  visit(html);
  return fragments;
}

/** Moves fragments mentioning any focus keyword to the front, keeping order otherwise. */
export function prioritizeFocus(fragments: string[], focus: string): string[] {
  const keywords = focus.toLowerCase().split(/[\s,]+/).filter(Boolean);
  if (keywords.length === 0) return fragments;
  const matches = (fragment: string) => keywords.some((kw) => fragment.toLowerCase().includes(kw));
  return [...fragments.filter(matches), ...fragments.filter((f) => !matches(f))];
}

/**
 * Extracts the readable body of an HTML page. Fragments mentioning the focus
 * keywords come first; the result is capped at MAX_TEXT_LENGTH characters.
 */
export function extractText(html: string, focus = ""): string {
  if (!html.trim()) {
    return "";
  }
  const cleaned = removeNoise(html);
  const content = findContentNode(cleaned);

  let text = prioritizeFocus(collectFragments(content), focus.trim()).join("\n");
  if (text.length < MIN_CONTENT_LENGTH && content !== cleaned) {
    const body = /<body\b[^>]*>([\s\S]*)<\/body>/i.exec(cleaned);
    text = prioritizeFocus(collectFragments(body ? body[1] : cleaned), focus.trim()).join("\n");
  }

  if (text.length > MAX_TEXT_LENGTH) {
    text = `${text.slice(0, MAX_TEXT_LENGTH)}\n[...]`;
  }
  return text;
}

/** "ko" when at least 30% of the non-space characters are Hangul, otherwise "en". */
export function detectLanguage(text: string): string {
  if (text.trim().length < 10) {
    return "en";
  }
  const compact = text.replace(/\s/g, "");
  const ratio = (compact.match(HANGUL)?.length ?? 0) / compact.length;
  return ratio >= 0.3 ? "ko" : "en";
}

export class HttpScraper implements Scraper {
  async fetch(url: string, focus: string): Promise<string> {
    if (!/^https?:\/\//.test(url)) {
      throw new Error(`Invalid URL: ${url}`);
    }

    let lastError: unknown = null;
    for (let attempt = 1; attempt <= MAX_ATTEMPTS; attempt++) {
      try {
        const response = await fetch(url, {
          headers: {
            "User-Agent": USER_AGENT,
            Accept: "text/html,application/xhtml+xml,application/xml;q=0.9,*/*;q=0.8",
            "Accept-Language": "ko-KR,ko;q=0.9,en-US;q=0.8,en;q=0.7",
          },
          redirect: "follow",
          signal: AbortSignal.timeout(FETCH_TIMEOUT_MS),
        });
        if (!response.ok) {
          throw new Error(`Failed to fetch ${url}: ${response.status} ${response.statusText}`);
        }
        const html = await response.text();
        console.log(`[scrape] Fetched ${url} (${html.length} chars)`);
        return extractText(html, focus);
      } catch (error) {
        lastError = error;
        if (attempt < MAX_ATTEMPTS) {
          console.warn(`[scrape] Attempt ${attempt} failed, retrying:`, error instanceof Error ? error.message : error);
          await new Promise((resolve) => setTimeout(resolve, 1000 * 2 ** (attempt - 1)));
        }
      }
    }
    throw lastError instanceof Error ? lastError : new Error(String(lastError));
  }

  detectLanguage(text: string): string {
    return detectLanguage(text);
  }
}
