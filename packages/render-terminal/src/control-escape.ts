const CONTROL_PICTURES = 0x2400;
const DELETE_PICTURE = 0x2421;
const REPLACEMENT_CHARACTER = 0xfffd;

/** Visible stand-in for one code point; non-control code points pass through. */
export function escapeControl(char: string): string {
  const code = char.codePointAt(0);
  if (code === undefined) {
    return char;
  }
  if (code <= 0x1f) {
    return String.fromCodePoint(CONTROL_PICTURES + code);
  }
  if (code === 0x7f) {
    return String.fromCodePoint(DELETE_PICTURE);
  }
  if (code >= 0x80 && code <= 0x9f) {
    return String.fromCodePoint(REPLACEMENT_CHARACTER);
  }
  return char;
}

const CONTROL_RE = /[\u0000-\u001f\u007f-\u009f]/gu;

/** Replaces every C0, DEL and C1 control, one code point for one. */
export function escapeControls(text: string): string {
  return text.replace(CONTROL_RE, escapeControl);
}

/**
 * Expands TAB to the next multiple of `tabWidth`, counting from `column`
 * (0-based). Returns the text and the column after it.
 */
export function expandTabs(
  text: string,
  tabWidth: number,
  column = 0
): { text: string; column: number } {
  let out = "";
  let current = column;
  for (const char of text) {
    if (char === "\t") {
      const width = tabWidth - (current % tabWidth);
      out += " ".repeat(width);
      current += width;
    } else {
      out += char;
      current++;
    }
  }
  return { text: out, column: current };
}
