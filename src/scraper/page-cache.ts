/**
 * URL -> body cache shared by the phases of one reconciliation run
 */
export class PageCache {
  private readonly pages = new Map<string, string>();

  get(url: string): string | undefined {
    return this.pages.get(url);
  }

  has(url: string): boolean {
    return this.pages.has(url);
  }

  set(url: string, body: string): void {
    this.pages.set(url, body);
  }

  get size(): number {
    return this.pages.size;
  }

  clear(): void {
    this.pages.clear();
  }
}
