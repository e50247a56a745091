/**
 * Parse cursor — current position plus error and warning state.
 * Mutable and owned by the caller of a parse pass.
 */

import { assert } from "./validation.js";

export class ParseLog {
  private pos: number;
  private errorIndex = -1;
  private errorMessage = "";
  private warning = false;

  constructor(position = 0) {
    assert(Number.isInteger(position) && position >= 0, "Undefined parse position", { position });
    this.pos = position;
  }

  get position(): number {
    return this.pos;
  }

  /** Index of the first failure, or -1. */
  get errorPosition(): number {
    return this.errorIndex;
  }

  get message(): string {
    return this.errorMessage;
  }

  isError(): boolean {
    return this.errorIndex !== -1;
  }

  isWarning(): boolean {
    return this.warning;
  }

  setPosition(position: number): void {
    assert(Number.isInteger(position) && position >= 0, "Undefined parse position", { position });
    this.pos = position;
  }

  /** Records a failure. The position is left untouched. */
  setError(errorIndex: number, message: string): void {
    this.errorIndex = errorIndex;
    this.errorMessage = message;
  }

  setWarning(): void {
    this.warning = true;
  }

  /** Clears error and warning state; keeps the position. */
  clearError(): void {
    this.errorIndex = -1;
    this.errorMessage = "";
    this.warning = false;
  }

  toString(): string {
    return `[position=${this.pos}, error-index=${this.errorIndex}, error-message="${this.errorMessage}", warning=${this.warning}]`;
  }
}
