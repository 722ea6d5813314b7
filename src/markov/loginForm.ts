export const VERIFICATION_TOKEN_FIELD = "__RequestVerificationToken";

const INPUT_TAG_RE = /<input\b[^>]*>/gi;
const ATTRIBUTE_RE = /([^\s"'=<>/]+)\s*=\s*(?:"([^"]*)"|'([^']*)'|([^\s"'=<>`]+))/g;

const ENTITIES: Record<string, string> = {
  "&amp;": "&",
  "&quot;": '"',
  "&#39;": "'",
  "&#x27;": "'",
  "&lt;": "<",
  "&gt;": ">",
};

function decodeEntities(value: string): string {
  return value.replace(/&(?:amp|quot|#39|#x27|lt|gt);/g, (entity) => ENTITIES[entity] ?? entity);
}

function parseAttributes(tag: string): Map<string, string> {
  const attrs = new Map<string, string>();
  for (const match of tag.matchAll(ATTRIBUTE_RE)) {
    const name = match[1].toLowerCase();
    const value = match[2] ?? match[3] ?? match[4] ?? "";
    if (!attrs.has(name)) attrs.set(name, decodeEntities(value));
  }
  return attrs;
}

/** Reads the anti-forgery token the login form posts back. */
export function extractVerificationToken(html: string): string {
  for (const match of html.matchAll(INPUT_TAG_RE)) {
    const attrs = parseAttributes(match[0]);
    if (attrs.get("name") !== VERIFICATION_TOKEN_FIELD) continue;
    const value = attrs.get("value");
    if (value) return value;
  }
  throw new Error("Could not find verification token in login form");
}
