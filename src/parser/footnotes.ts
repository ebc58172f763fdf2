/**
 * Footnote numbering
 *
 * @since 2025-12-09
 */

/**
 * Footnote labels for one parse
 *
 * Labels are sequential. A named footnote keeps the label of its first
 * definition, so references (`footnote:id[]`) point back to it.
 */
export class FootnoteRegistry {
  private counter = 0;
  private readonly labels = new Map<string, string>();

  /**
   * Register an anonymous footnote; returns its generated id and label
   */
  nextAnonymous(): { id: string; label: string } {
    const label = this.nextLabel();
    const id = `_footnotedef_${label}`;
    this.labels.set(id, label);
    return { id, label };
  }

  /**
   * Label of a named footnote definition
   */
  define(id: string): string {
    const existing = this.labels.get(id);
    if (existing) return existing;
    const label = this.nextLabel();
    this.labels.set(id, label);
    return label;
  }

  /**
   * Label for a reference to `id` (a fresh one when it was never defined)
   */
  reference(id: string): string {
    return this.define(id);
  }

  get count(): number {
    return this.counter;
  }

  private nextLabel(): string {
    this.counter++;
    return String(this.counter);
  }
}
