/**
 * Generate the next free name for a prefix, e.g. `todo-7` when `todo-6` is the
 * highest one taken. Names that do not follow `<prefix>-<n>` are ignored.
 */
export function generateName(prefix: string, existing: Iterable<string>): string {
  const head = `${prefix}-`;
  let max = 0;
  for (const name of existing) {
    if (!name.startsWith(head)) continue;
    const n = Number.parseInt(name.slice(head.length), 10);
    if (!Number.isNaN(n) && n > max) max = n;
  }
  return `${head}${max + 1}`;
}
