import fs from 'node:fs';

/**
 * Line access to source files, memoized for one bundle
 */
export class SourceReader {
  private files = new Map<string, string[] | null>();

  async lines(filePath: string): Promise<string[] | null> {
    if (this.files.has(filePath)) {
      return this.files.get(filePath) ?? null;
    }

    let lines: string[] | null;
    try {
      const content = await fs.promises.readFile(filePath, 'utf-8');
      lines = content.split(/\r?\n/);
    } catch {
      lines = null;
    }
    this.files.set(filePath, lines);
    return lines;
  }

  /**
   * Lines `startLine..endLine` (1-based, inclusive); null when the file is
   * unreadable or the span is out of range
   */
  async slice(filePath: string, startLine: number, endLine: number): Promise<string[] | null> {
    const lines = await this.lines(filePath);
    if (!lines || startLine < 1 || startLine > lines.length || endLine < startLine) {
      return null;
    }
    return lines.slice(startLine - 1, endLine);
  }
}
