/**
 * Visible index range `[a, b]` over the flattened rows. Both bounds are
 * inclusive, so a window of height `h` shows `h + 1` rows.
 */
export class ScrollWindow {
  constructor(
    public a: number,
    public b: number
  ) {}

  get height(): number {
    return this.b - this.a;
  }

  shift(delta: number): void {
    this.a += delta;
    this.b += delta;
  }

  /** Slide the window (height preserved) until `current` is inside it. */
  fixView(current: number): void {
    if (this.a < 0) this.shift(-this.a);
    if (current <= this.a) this.shift(current - this.a);
    if (current >= this.b) this.shift(current - this.b);
  }

  /**
   * Growing extends the window upwards and lets `fixView` push it back below
   * zero. Shrinking pins the bottom at the selection (or the old bottom,
   * whichever is lower) so the selected row stays on screen.
   */
  resize(newHeight: number, current: number): void {
    const delta = this.height - newHeight;

    if (delta <= 0) {
      this.a += delta;
    } else {
      this.b -= delta;
      const bottom = Math.max(current + 1, this.b);
      this.a = bottom - newHeight;
      this.b = bottom;
    }

    this.fixView(current);
  }

  contains(index: number): boolean {
    return index >= this.a && index <= this.b;
  }

  range(): number[] {
    const out: number[] = [];
    for (let i = this.a; i <= this.b; i++) out.push(i);
    return out;
  }
}
