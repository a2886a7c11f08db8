import { FundsPort } from './funds.port';

/**
 * Unit of work for a state-changing call. Every mutation registers its inverse; when the
 * call fails the inverses run newest first, so nothing of the call survives.
 */
export class Journal {
  private undo: Array<() => void> = [];

  record(inverse: () => void) {
    this.undo.push(inverse);
  }

  transferIn(funds: FundsPort, token: string, from: string, amount: bigint) {
    if (amount === 0n) {
      return;
    }
    funds.transferIn(token, from, amount);
    this.record(() => funds.transferOut(token, from, amount));
  }

  transferOut(funds: FundsPort, token: string, to: string, amount: bigint) {
    if (amount === 0n) {
      return;
    }
    funds.transferOut(token, to, amount);
    this.record(() => funds.transferIn(token, to, amount));
  }

  rollback() {
    const pending = this.undo.reverse();
    this.undo = [];
    pending.forEach((inverse) => inverse());
  }
}

export function atomically<T>(operation: (journal: Journal) => T): T {
  const journal = new Journal();
  try {
    return operation(journal);
  } catch (error) {
    journal.rollback();
    throw error;
  }
}
