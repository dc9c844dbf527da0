/**
 * Text utilities.
 * `{{placeholder}}` templates and tag-delimited block extraction.
 */

export { Template, renderTemplate, templateKeys, stringifyValue } from './template.js';
export type { TemplateValue, TemplateValues } from './template.js';
export { parseAllTags, parseTag, parseLastTag, collectTagValues } from './tags.js';
export type { XmlBlock } from './tags.js';
