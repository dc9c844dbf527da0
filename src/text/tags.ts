/**
 * Tag parser for tag-delimited model output.
 *
 * Recovers outermost `<name>...</name>` blocks from free text. Names are bare
 * word characters; tags with attributes are treated as plain text.
 */

// ── Types ────────────────────────────────────────────────────

export interface XmlBlock {
  readonly tag: string;
  readonly content: string;
}

interface OpenTag {
  tag: string;
  start: number;
  contentStart: number;
}

interface MatchedBlock extends XmlBlock {
  start: number;
}

// ── Parsing ──────────────────────────────────────────────────

const TAG_PATTERN = /<(\/?)(\w+)>/g;

/**
 * Every outermost block, in order of its closing tag.
 *
 * A closing tag matches the nearest open tag of the same name; open tags
 * above it on the stack are discarded as unterminated. Closing tags with no
 * open counterpart are ignored. A block is outermost when no other matched
 * block encloses it, so an unterminated tag such as `List<T>` hides nothing.
 */
export function parseAllTags(text: string): XmlBlock[] {
  const matched: MatchedBlock[] = [];
  const stack: OpenTag[] = [];

  for (const match of text.matchAll(TAG_PATTERN)) {
    const [raw, slash, tag] = match;
    if (tag === undefined) continue;
    const start = match.index ?? 0;

    if (slash !== '/') {
      stack.push({ tag, start, contentStart: start + raw.length });
      continue;
    }

    const openIndex = findLastOpen(stack, tag);
    if (openIndex === -1) continue;

    const open = stack[openIndex];
    stack.length = openIndex;
    if (open !== undefined) {
      matched.push({ tag, start: open.start, content: text.slice(open.contentStart, start) });
    }
  }

  // Matched blocks nest properly, and an enclosing block closes later and
  // opens earlier than everything inside it.
  const blocks: XmlBlock[] = [];
  let earliestLaterStart = Infinity;
  for (let i = matched.length - 1; i >= 0; i--) {
    const block = matched[i];
    if (block === undefined) continue;
    if (block.start < earliestLaterStart) {
      blocks.push({ tag: block.tag, content: block.content });
    }
    earliestLaterStart = Math.min(earliestLaterStart, block.start);
  }

  return blocks.reverse();
}

function findLastOpen(stack: readonly OpenTag[], tag: string): number {
  for (let i = stack.length - 1; i >= 0; i--) {
    if (stack[i]?.tag === tag) return i;
  }
  return -1;
}

// ── Derived lookups ──────────────────────────────────────────

export function parseTag(text: string, tag: string): string[] {
  return parseAllTags(text)
    .filter((block) => block.tag === tag)
    .map((block) => block.content);
}

/** Content of the last `tag` block, or `''` when there is none. */
export function parseLastTag(text: string, tag: string): string {
  return parseTag(text, tag).at(-1) ?? '';
}

/** Merge tag → content across texts; later blocks win. */
export function collectTagValues(texts: Iterable<string>): Record<string, string> {
  const values: Record<string, string> = {};
  for (const text of texts) {
    for (const block of parseAllTags(text)) {
      values[block.tag] = block.content;
    }
  }
  return values;
}
