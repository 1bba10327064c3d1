export const LANGUAGE_NAMES: Record<string, string> = {
  en: "English",
  it: "Italian",
};

function languageName(code: string): string {
  return LANGUAGE_NAMES[code] ?? code;
}

export const VALIDATION_SYSTEM_PROMPT = `You are an expert translator reviewing sentence alignments between a book and its translation.
You answer with a single JSON object and nothing else.`;

export const RELEVANCE_SYSTEM_PROMPT = `You are a search relevance judge for a bilingual literary corpus.
You answer with a single JSON object and nothing else.`;

export function buildValidationPrompt({
  srcLanguage,
  tgtLanguage,
  srcText,
  tgtText,
}: {
  srcLanguage: string;
  tgtLanguage: string;
  srcText: string;
  tgtText: string;
}): string {
  const src = languageName(srcLanguage);
  const tgt = languageName(tgtLanguage);

  return `Decide whether the ${tgt} text is a retrievable match for the ${src} text:
a reader searching for the ${src} passage should be shown this ${tgt} passage.

Count it as valid when the ${tgt} text translates the ${src} text, even loosely,
or covers most of it. Count it as invalid when the texts talk about different things,
or when one side is mostly missing from the other.

Respond with JSON only, in this exact shape:
{"is_valid_alignment": true or false, "confidence": number between 0 and 1, "reason": "one short sentence"}

---

**${src}:**
${srcText}

**${tgt}:**
${tgtText}`;
}

export function buildRelevancePrompt({
  query,
  srcText,
  tgtText,
}: {
  query: string;
  srcText: string;
  tgtText: string;
}): string {
  return `Rate how relevant the passage is to the search query.

Use a score between 0 and 1:
- 1: the passage is exactly what the query asks for
- 0.5: the passage is related but only partly answers the query
- 0: the passage is unrelated

Respond with JSON only, in this exact shape:
{"score": number between 0 and 1}

---

**Query:**
${query}

**Passage:**
${srcText}

**Passage (translation):**
${tgtText}`;
}

/**
 * Pull the first JSON object out of a model reply, which may wrap it in
 * prose or a code fence
 */
export function extractJsonObject(text: string): unknown {
  const start = text.indexOf("{");
  if (start === -1) return undefined;

  let depth = 0;
  let inString = false;
  for (let i = start; i < text.length; i++) {
    const ch = text[i];
    if (inString) {
      if (ch === "\\") i++;
      else if (ch === '"') inString = false;
      continue;
    }
    if (ch === '"') {
      inString = true;
    } else if (ch === "{") {
      depth += 1;
    } else if (ch === "}") {
      depth -= 1;
      if (depth === 0) {
        try {
          return JSON.parse(text.slice(start, i + 1));
        } catch {
          return undefined;
        }
      }
    }
  }

  return undefined;
}
