// `app.use('/:name', ...)` catch-all registrations
const RESPONDER_PATTERN = /\.use\s*\(\s*['"]\/:/;

function balancedLines(lines: readonly string[], startIndex: number, open: string, close: string): string[] {
  const collected: string[] = [];
  let depth = 0;
  let started = false;

  for (const line of lines.slice(startIndex)) {
    collected.push(line);
    for (const ch of line) {
      if (ch === open) depth++;
      else if (ch === close) depth--;
    }
    if (line.includes(open)) started = true;
    if (started && depth <= 0) break;
  }
  return collected;
}

/**
 * Lines from `startIndex` until the braces opened on them balance
 */
export function extractBraceBlock(lines: readonly string[], startIndex: number): string[] {
  return balancedLines(lines, startIndex, '{', '}');
}

/**
 * The catch-all registration: its handler body when written inline,
 * otherwise just the `use(...)` call
 */
export function findResponderBlock(lines: readonly string[]): string[] | null {
  const index = lines.findIndex(line => RESPONDER_PATTERN.test(line));
  if (index === -1) return null;
  return lines[index]?.includes('{') ? extractBraceBlock(lines, index) : balancedLines(lines, index, '(', ')');
}
