import type { KeyEvent } from "./key-input";

const registerNamePattern = /^[a-zA-Z0-9"]$/;

export const isValidRegisterName = (name: string): boolean =>
  registerNamePattern.test(name);

export const isAppendRegisterName = (name: string): boolean =>
  /^[A-Z]$/.test(name);

export class RegisterMap {
  private registers = new Map<string, readonly KeyEvent[]>();

  public has(name: string): boolean {
    return this.get(name).length > 0;
  }

  public get(name: string): readonly KeyEvent[] {
    return this.registers.get(name.toLowerCase()) ?? [];
  }

  public set(name: string, keys: readonly KeyEvent[]): boolean {
    if (!isValidRegisterName(name)) return false;
    const slot = name.toLowerCase();
    const stored = isAppendRegisterName(name)
      ? [...this.get(slot), ...keys]
      : [...keys];
    this.registers.set(slot, stored);
    return true;
  }

  public clear(name: string): void {
    this.registers.delete(name.toLowerCase());
  }

  public names(): string[] {
    return [...this.registers.keys()].sort();
  }
}
