/**
 * Cuts text into consecutive windows of a fixed number of characters.
 * The last window holds whatever is left and may be shorter.
 */
export class FixedWindowSplitter {
  constructor(private readonly chunkSize: number) {
    if (!Number.isInteger(chunkSize) || chunkSize < 1) {
      throw new Error(`Chunk size must be a positive integer, got ${chunkSize}`);
    }
  }

  split(text: string): string[] {
    const chunks: string[] = [];
    for (let start = 0; start < text.length; start += this.chunkSize) {
      chunks.push(text.slice(start, start + this.chunkSize));
    }
    return chunks;
  }
}
