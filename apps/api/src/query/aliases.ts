/**
 * Hands out unique relation aliases for one query composition. Create a fresh
 * instance per staging run and pass it down every builder that introduces a
 * subquery or join.
 */
export class AliasGenerator {
  private counter = 0;

  next(prefix = 't'): string {
    this.counter += 1;
    return `${prefix}${this.counter}`;
  }

  get issued(): number {
    return this.counter;
  }
}
