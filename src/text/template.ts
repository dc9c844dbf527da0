// ── Types ────────────────────────────────────────────────────

export type TemplateValue =
  | string
  | number
  | boolean
  | readonly string[]
  | null
  | undefined;

export type TemplateValues = Readonly<Record<string, TemplateValue>>;

// ── Placeholder grammar ──────────────────────────────────────

const PLACEHOLDER = /\{\{(\w+)\}\}/g;

export function stringifyValue(value: TemplateValue): string {
  if (value === null || value === undefined) return '';
  if (typeof value === 'string') return value;
  if (typeof value === 'number' || typeof value === 'boolean') {
    return String(value);
  }
  return value.join(', ');
}

// ── Rendering ────────────────────────────────────────────────

/**
 * Replace `{{key}}` placeholders whose key is present in `values`.
 * Unknown placeholders stay verbatim. Substituted text is never re-scanned.
 */
export function renderTemplate(template: string, values: TemplateValues): string {
  return template.replace(PLACEHOLDER, (match, key: string) =>
    Object.hasOwn(values, key) ? stringifyValue(values[key]) : match,
  );
}

/** Distinct placeholder identifiers, in first-seen order. */
export function templateKeys(template: string): string[] {
  const keys = new Set<string>();
  for (const match of template.matchAll(PLACEHOLDER)) {
    const key = match[1];
    if (key !== undefined) keys.add(key);
  }
  return [...keys];
}

export class Template {
  constructor(readonly text: string) {}

  format(values: TemplateValues): string {
    return renderTemplate(this.text, values);
  }

  get keys(): string[] {
    return templateKeys(this.text);
  }
}
