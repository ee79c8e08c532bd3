/** Stored program lines, kept in ascending line-number order */
export class ProgramStore {
  private lines = new Map<number, string>();
  private keys: number[] = [];

  public get size(): number {
    return this.keys.length;
  }

  public get = (n: number): string | undefined => this.lines.get(n);

  public has = (n: number): boolean => this.lines.has(n);

  public set = (n: number, text: string): void => {
    if (!this.lines.has(n)) {
      const at = this.keys.findIndex((k) => k > n);
      if (at === -1) this.keys.push(n);
      else this.keys.splice(at, 0, n);
    }
    this.lines.set(n, text);
  };

  public delete = (n: number): void => {
    if (this.lines.delete(n)) {
      this.keys.splice(this.keys.indexOf(n), 1);
    }
  };

  public clear = (): void => {
    this.lines.clear();
    this.keys = [];
  };

  public first = (): number | undefined => this.keys[0];

  // smallest stored line number strictly greater than `n`
  public next = (n: number): number | undefined =>
    this.keys.find((k) => k > n);

  public entries = (): [number, string][] =>
    this.keys.map((k): [number, string] => [k, this.lines.get(k) ?? ""]);
}
