import type { LineLink } from "../serial-link.js";

/** Scripted in-process stand-in for a serial line. */
export class FakeLineLink implements LineLink {
  isOpen = false;
  readonly written: string[] = [];
  readonly timeouts: number[] = [];
  discards = 0;
  openError: Error | null = null;

  constructor(private readonly incoming: string[] = []) {}

  push(...lines: string[]): void {
    this.incoming.push(...lines);
  }

  async open(): Promise<void> {
    if (this.openError) throw this.openError;
    this.isOpen = true;
  }

  async close(): Promise<void> {
    this.isOpen = false;
  }

  async discardInput(): Promise<void> {
    this.discards += 1;
  }

  async writeLine(text: string): Promise<void> {
    this.written.push(text);
  }

  async readLine(timeoutMs: number): Promise<string | null> {
    this.timeouts.push(timeoutMs);
    return this.incoming.shift() ?? null;
  }
}
