/**
 * Remembers the latest entry seen in each text column. Columns are the
 * truncated `x` of a block.
 */
export class ColumnIndex<T> {
  private readonly columns = new Map<number, T>();

  static bucket(x: number): number {
    return Math.trunc(x);
  }

  register(x: number | undefined, entry: T): void {
    if (x === undefined) return;
    this.columns.set(ColumnIndex.bucket(x), entry);
  }

  lookup(x: number | undefined): T | undefined {
    if (x === undefined) return undefined;
    return this.columns.get(ColumnIndex.bucket(x));
  }

  get size(): number {
    return this.columns.size;
  }
}
