/**
 * PURPOSE: Ledger primitives.
 * DESCRIPTION: Accounts and withdrawals.
 */

/**
 * PURPOSE: Track a running balance.
 * DESCRIPTION: Holds funds for one owner.
 * ATTRIBUTES:
 *     owner: string
 *     balance: number
 */
export class Ledger {
  /**
   * PURPOSE: Open a ledger.
   * DESCRIPTION: Starts from an opening balance.
   * ARGUMENTS:
   *     owner: string
   *     balance: number
   */
  constructor(public readonly owner: string, private balance: number) {}

  /**
   * Withdraw funds. Lowers the balance.
   */
  withdraw(amount: number): void {
    if (amount > this.balance) {
      throw new RangeError('insufficient funds');
    }
    this.balance -= amount;
  }

  /**
   * PURPOSE: Report the balance.
   * DESCRIPTION: Reads the current funds.
   * RETURNS: number
   */
  current(): number {
    return this.balance;
  }
}

export function ownerOf(ledger: Ledger): string {
  return ledger.owner;
}
