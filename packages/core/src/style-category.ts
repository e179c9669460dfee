/**
 * Token classes used to look up a {@link Style}. Every category but `text`
 * has exactly one parent; resolution of a category without its own style
 * walks towards `text`.
 */
export const styleParents = {
  text: undefined,
  comment: "text",
  "comment-preproc": "comment",
  generic: "text",
  "generic-deleted": "generic",
  "generic-error": "generic",
  "generic-error-invalid": "generic-error",
  "generic-error-unknown": "generic-error",
  "generic-highlight": "generic",
  "generic-highlight-dim": "generic-highlight",
  "generic-inserted": "generic",
  literal: "text",
  "literal-boolean": "literal",
  "literal-null": "literal",
  "literal-null-implicit": "literal-null",
  "literal-number": "literal",
  "literal-number-bin": "literal-number",
  "literal-number-float": "literal-number",
  "literal-number-hex": "literal-number",
  "literal-number-infinity": "literal-number",
  "literal-number-integer": "literal-number",
  "literal-number-nan": "literal-number",
  "literal-number-oct": "literal-number",
  "literal-string": "literal",
  "literal-string-double": "literal-string",
  "literal-string-single": "literal-string",
  name: "text",
  "name-alias": "name",
  "name-alias-merge": "name-alias",
  "name-anchor": "name",
  "name-decorator": "name-anchor",
  "name-tag": "name",
  punctuation: "text",
  "punctuation-block": "punctuation",
  "punctuation-block-folded": "punctuation-block",
  "punctuation-block-literal": "punctuation-block",
  "punctuation-collect-entry": "punctuation",
  "punctuation-heading": "punctuation",
  "punctuation-mapping": "punctuation",
  "punctuation-mapping-end": "punctuation-mapping",
  "punctuation-mapping-start": "punctuation-mapping",
  "punctuation-mapping-value": "punctuation-mapping",
  "punctuation-sequence": "punctuation",
  "punctuation-sequence-end": "punctuation-sequence",
  "punctuation-sequence-entry": "punctuation-sequence",
  "punctuation-sequence-start": "punctuation-sequence",
  "text-accent": "text",
  "text-accent-dim": "text-accent",
  "text-subtle": "text",
  "text-subtle-dim": "text-subtle",
  title: "text",
  "title-accent": "title",
  "title-error": "title",
  "title-ok": "title",
  "title-subtle": "title",
  "title-warn": "title",
} as const satisfies Record<string, string | undefined>;

export type StyleCategory = keyof typeof styleParents;

export const styleCategories: readonly StyleCategory[] = Object.keys(
  styleParents
).filter(isStyleCategory);

export function isStyleCategory(value: string): value is StyleCategory {
  return Object.hasOwn(styleParents, value);
}

export function parentCategory(
  category: StyleCategory
): StyleCategory | undefined {
  return styleParents[category];
}

/** The category followed by its ancestors, ending with `text`. */
export function categoryLineage(category: StyleCategory): StyleCategory[] {
  const lineage: StyleCategory[] = [];
  let current: StyleCategory | undefined = category;
  while (current !== undefined) {
    lineage.push(current);
    current = parentCategory(current);
  }
  return lineage;
}
