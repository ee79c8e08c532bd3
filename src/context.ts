import { wrap16 } from "./utils.js";

const VAR_COUNT = 26;

const slot = (name: string): number => name.toUpperCase().charCodeAt(0) - 65;

/** Variable bank: one signed 16-bit cell per letter A-Z */
export class Context {
  private vars = new Int16Array(VAR_COUNT);

  public setVar = (name: string, value: number): void => {
    this.vars[slot(name)] = wrap16(value);
  };

  // never-assigned cells read as 0
  public getVar = (name: string): number => this.vars[slot(name)];

  public reset = (): void => {
    this.vars.fill(0);
  };
}
