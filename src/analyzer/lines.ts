/**
 * Splits source text into lines. A trailing newline yields a final
 * empty line, which every consumer treats as blank.
 */
export function splitLines(text: string): readonly string[] {
  return text.split(/\r?\n/);
}
