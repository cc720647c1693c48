/** Shared encoder; chunk budgets are measured in UTF-8 bytes. */
const encoder = new TextEncoder();

/** UTF-8 byte length of `text`. */
export function byteLength(text: string): number {
  return encoder.encode(text).length;
}

/** Serialized size of a chunk: its lines joined by `\n`. */
export function chunkSize(lines: readonly string[]): number {
  return byteLength(lines.join('\n'));
}

/**
 * Split one line into code-point-aligned pieces of at most `budgetBytes`.
 * Every piece holds at least one code point, so nothing is lost even when a
 * single character is larger than the budget.
 */
export function splitLineToBudget(line: string, budgetBytes: number): string[] {
  if (byteLength(line) <= budgetBytes) {
    return [line];
  }

  const pieces: string[] = [];
  let current = '';
  let currentBytes = 0;
  for (const char of line) {
    const charBytes = byteLength(char);
    if (current.length > 0 && currentBytes + charBytes > budgetBytes) {
      pieces.push(current);
      current = '';
      currentBytes = 0;
    }
    current += char;
    currentBytes += charBytes;
  }
  if (current.length > 0) {
    pieces.push(current);
  }
  return pieces;
}

/**
 * Pack report blocks into size-bounded chunks with greedy first fit.
 *
 * Every chunk opens with `header`. A block that does not fit closes the current
 * chunk and opens a new one. `footer` goes on the final chunk, or on a fresh
 * chunk when it does not fit. A block too large for a fresh chunk falls back to
 * line granularity: lines fill chunks up to the budget, a new chunk drops the
 * header when header and line do not fit together, and oversized lines are
 * split. Every input line appears exactly once across the output.
 */
export function packChunks(
  header: readonly string[],
  blocks: readonly (readonly string[])[],
  footer: readonly string[],
  budgetBytes: number
): string[][] {
  const chunks: string[][] = [];
  let current: string[] = [...header];
  let hasContent = false;

  const fits = (extra: readonly string[]): boolean => chunkSize([...current, ...extra]) <= budgetBytes;

  const close = (): void => {
    if (hasContent) {
      chunks.push(current);
      current = [...header];
      hasContent = false;
    }
  };

  const appendLines = (lines: readonly string[]): void => {
    for (const line of lines) {
      for (const piece of splitLineToBudget(line, budgetBytes)) {
        if (!fits([piece])) {
          close();
          if (!fits([piece])) {
            current = [];
          }
        }
        current.push(piece);
        hasContent = true;
      }
    }
  };

  const appendBlock = (block: readonly string[]): void => {
    if (block.length === 0) {
      return;
    }
    if (!fits(block)) {
      close();
    }
    if (fits(block)) {
      current.push(...block);
      hasContent = true;
      return;
    }
    appendLines(block);
  };

  for (const block of blocks) {
    appendBlock(block);
  }
  appendBlock(footer);

  if (hasContent || chunks.length === 0) {
    chunks.push(current);
  }
  return chunks;
}
