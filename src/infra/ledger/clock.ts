/**
 * Ledger time in whole seconds. Readings never go backwards.
 */
export interface LedgerClock {
  now(): number;
}

export class SystemClock implements LedgerClock {
  private last = 0;

  now(): number {
    this.last = Math.max(this.last, Math.floor(Date.now() / 1000));
    return this.last;
  }
}

export class ManualClock implements LedgerClock {
  constructor(private current: number) {}

  now(): number {
    return this.current;
  }

  advance(seconds: number): number {
    if (!Number.isInteger(seconds) || seconds < 0) {
      throw new RangeError(`clock can only advance by a non-negative integer, got ${seconds}`);
    }
    this.current += seconds;
    return this.current;
  }

  setTo(timestamp: number): number {
    if (timestamp < this.current) {
      throw new RangeError(`clock cannot move back from ${this.current} to ${timestamp}`);
    }
    this.current = timestamp;
    return this.current;
  }
}
