import { createHash } from 'crypto';

/** SHA-256 of the snippet text, hex encoded. The language is not part of the key. */
export function contentHash(code: string): string {
  return createHash('sha256').update(code).digest('hex');
}

/**
 * Process-lifetime map from snippet hash to captured stdout.
 * Entries are never evicted.
 */
export class ArtifactCache {
  private entries: Map<string, string> = new Map();

  get(hash: string): string | undefined {
    return this.entries.get(hash);
  }

  set(hash: string, output: string): void {
    this.entries.set(hash, output);
  }

  has(hash: string): boolean {
    return this.entries.has(hash);
  }

  get size(): number {
    return this.entries.size;
  }

  keys(): string[] {
    return [...this.entries.keys()];
  }

  clear(): void {
    this.entries.clear();
  }
}
