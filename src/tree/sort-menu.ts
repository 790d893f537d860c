export type SortMenuResult = { done: false } | { done: true; attribute: string | null };

/**
 * Modal picker over the sortable attributes. While open it swallows every
 * key; a finished result carries the chosen attribute, or null on cancel.
 */
export class SortMenu {
  private highlighted = 0;
  private open = false;

  constructor(readonly options: readonly string[]) {}

  get visible(): boolean {
    return this.open;
  }

  get highlightedIndex(): number {
    return this.highlighted;
  }

  show(): void {
    this.open = true;
    this.highlighted = 0;
  }

  handleKey(name: string): SortMenuResult {
    if (!this.open) return { done: true, attribute: null };

    switch (name) {
      case 'j':
      case 'DOWN':
        this.highlighted = Math.min(this.highlighted + 1, this.options.length - 1);
        return { done: false };
      case 'k':
      case 'UP':
        this.highlighted = Math.max(this.highlighted - 1, 0);
        return { done: false };
      case 'ENTER':
        return this.finish(this.options[this.highlighted] ?? null);
      case 'ESCAPE':
      case 'q':
        return this.finish(null);
    }

    if (/^[1-9]$/.test(name)) {
      const picked = this.options[Number(name) - 1];
      if (picked !== undefined) return this.finish(picked);
    }
    return { done: false };
  }

  lines(): string[] {
    return this.options.map((option, i) => `${i === this.highlighted ? '>' : ' '} ${i + 1}. ${option}`);
  }

  private finish(attribute: string | null): SortMenuResult {
    this.open = false;
    return { done: true, attribute };
  }
}
