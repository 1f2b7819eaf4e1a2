/**
 * The `(previous, current)` container pairs currently open on the path from
 * the root to the node being compared.
 *
 * Meeting a pair that is already open means both sides loop back to an
 * enclosing container, and descending again would never end.
 */
export class CycleTracker {
  private readonly open = new Map<unknown, Set<unknown>>();

  isOpen(previous: unknown, current: unknown): boolean {
    return this.open.get(previous)?.has(current) ?? false;
  }

  enter(previous: unknown, current: unknown): void {
    const partners = this.open.get(previous);
    if (partners) partners.add(current);
    else this.open.set(previous, new Set([current]));
  }

  leave(previous: unknown, current: unknown): void {
    const partners = this.open.get(previous);
    if (!partners) return;
    partners.delete(current);
    if (partners.size === 0) this.open.delete(previous);
  }
}
