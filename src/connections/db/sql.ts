/**
 * Collects positional parameters while a statement is assembled, so the
 * same fragment can be reused by several statements without renumbering.
 */
export class SqlParams {
  readonly values: unknown[] = [];

  add(value: unknown): string {
    this.values.push(value);
    return `$${this.values.length}`;
  }
}
