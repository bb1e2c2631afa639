/**
 * Block scanner shared by the table parsers.
 *
 * readelf prints one table per object; for an archive the same heading is
 * repeated once per member. The scanner finds each heading, drops the framing
 * lines that follow it and yields the content lines up to the end of the table.
 */

export interface BlockLayout {
  /** Text that identifies the heading line (substring match) */
  header: string;
  /** Lines dropped after the heading was found, the heading line included */
  skip: number;
  /** Line that closes a table (substring match) */
  terminator?: string;
  /** Whether a blank line closes a table. Default: true */
  stopAtBlank?: boolean;
}

export function splitLines(text: string): string[] {
  return text.split(/\r?\n/);
}

/**
 * Yield one group of content lines per heading occurrence.
 *
 * Nothing is yielded when the heading never appears; a heading followed by an
 * empty table yields an empty group.
 */
export function* scanBlocks(text: string, layout: BlockLayout): Generator<string[]> {
  const lines = splitLines(text);
  const stopAtBlank = layout.stopAtBlank ?? true;
  let i = 0;

  while (i < lines.length) {
    while (i < lines.length && !lines[i].includes(layout.header)) i++;
    if (i >= lines.length) return;

    i += Math.max(layout.skip, 1);

    const block: string[] = [];
    while (i < lines.length) {
      const line = lines[i];
      if (layout.terminator !== undefined && line.includes(layout.terminator)) break;
      if (stopAtBlank && line.trim() === "") break;
      block.push(line);
      i++;
    }
    yield block;
  }
}
