export type TuiEvent = { type: 'key'; name: string } | { type: 'resize'; width: number; height: number };

/**
 * Runs events one at a time in arrival order. An event pushed while another
 * is being handled waits for it to finish.
 */
export class EventQueue<E> {
  private readonly pending: E[] = [];
  private draining = false;

  constructor(private readonly handle: (event: E) => void) {}

  get size(): number {
    return this.pending.length;
  }

  push(event: E): void {
    this.pending.push(event);
    if (this.draining) return;

    this.draining = true;
    try {
      for (let next = this.pending.shift(); next !== undefined; next = this.pending.shift()) {
        this.handle(next);
      }
    } finally {
      this.draining = false;
    }
  }
}
