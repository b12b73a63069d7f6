/**
 * Ledger Adapter
 * Moves fungible tokens between participants and the engine's treasury
 *
 * The ledger is the source of truth for balances. The engine only needs:
 * 1. debit  - pull tokens from a participant against the allowance they granted the engine
 * 2. credit - pay tokens out of the treasury to a participant
 *
 * Every transfer carries a reference. A ledger must move funds for a reference
 * at most once and answer a repeat of a completed transfer with success, so a
 * transfer whose outcome was lost in transit can be retried or reconciled.
 */

import { ErrorCodes, StakeVoteError, type Participant } from '../types.js';

export interface LedgerConfig {
  url: string;
  timeout?: number;
}

export interface LedgerAdapter {
  /**
   * Debit `amount` from `from` using the allowance granted to the engine.
   * Resolves false when the allowance or balance is insufficient.
   * Throws when the outcome is unknown.
   */
  debit(from: Participant, amount: bigint, reference: string): Promise<boolean>;

  /**
   * Credit `amount` to `to` from the engine's holdings.
   * Resolves false when the treasury cannot cover it.
   * Throws when the outcome is unknown.
   */
  credit(to: Participant, amount: bigint, reference: string): Promise<boolean>;

  /**
   * Check if the ledger service is available
   */
  healthCheck(): Promise<boolean>;
}

interface TransferResponse {
  ok?: boolean;
}

/**
 * HTTP-based ledger adapter
 */
export class HttpLedgerAdapter implements LedgerAdapter {
  private timeout: number;

  constructor(private config: LedgerConfig) {
    this.timeout = config.timeout ?? 10000;
  }

  async debit(from: Participant, amount: bigint, reference: string): Promise<boolean> {
    return this.transfer('/v1/debit', { from, amount: amount.toString(), reference });
  }

  async credit(to: Participant, amount: bigint, reference: string): Promise<boolean> {
    return this.transfer('/v1/credit', { to, amount: amount.toString(), reference });
  }

  async healthCheck(): Promise<boolean> {
    const controller = new AbortController();
    const timeoutId = setTimeout(() => controller.abort(), 5000);

    try {
      const response = await fetch(`${this.config.url}/health`, {
        signal: controller.signal,
      });
      return response.ok;
    } catch {
      return false;
    } finally {
      clearTimeout(timeoutId);
    }
  }

  private async transfer(
    path: string,
    body: Record<string, string> & { reference: string }
  ): Promise<boolean> {
    const controller = new AbortController();
    const timeoutId = setTimeout(() => controller.abort(), this.timeout);
    const url = `${this.config.url}${path}`;

    try {
      console.log(`[Ledger] POST ${url}`);
      const response = await fetch(url, {
        method: 'POST',
        headers: {
          'Content-Type': 'application/json',
          'Idempotency-Key': body.reference,
        },
        body: JSON.stringify(body),
        signal: controller.signal,
      });

      if (!response.ok) {
        const text = await response.text().catch(() => '');
        throw new LedgerError(
          `Ledger request failed: ${response.status} - ${url}${text ? ` - ${text}` : ''}`
        );
      }

      const data = await response.json() as TransferResponse;
      return data.ok === true;
    } catch (error) {
      if (error instanceof LedgerError) throw error;
      throw new LedgerError(
        `Ledger unreachable at ${url} (reference ${body.reference}): ${
          error instanceof Error ? error.message : String(error)
        }`
      );
    } finally {
      clearTimeout(timeoutId);
    }
  }
}

/**
 * In-memory ledger for testing and development
 *
 * Staked tokens move into a treasury account; winner bonuses are paid from
 * the same treasury, so it must be topped up with `fundRewards`.
 * A reference that already moved funds is answered with true without moving
 * them again; a refused transfer leaves no trace and may be retried.
 */
export class InMemoryLedger implements LedgerAdapter {
  static readonly TREASURY = 'treasury';

  private balances = new Map<Participant, bigint>();
  private allowances = new Map<Participant, bigint>();
  private applied = new Set<string>();

  async debit(from: Participant, amount: bigint, reference: string): Promise<boolean> {
    return this.once(reference, () => this.applyDebit(from, amount));
  }

  async credit(to: Participant, amount: bigint, reference: string): Promise<boolean> {
    return this.once(reference, () => this.applyCredit(to, amount));
  }

  async healthCheck(): Promise<boolean> {
    return true;
  }

  private once(reference: string, apply: () => boolean): boolean {
    if (this.applied.has(reference)) {
      return true;
    }
    const result = apply();
    if (result) {
      this.applied.add(reference);
    }
    return result;
  }

  private applyDebit(from: Participant, amount: bigint): boolean {
    const allowance = this.allowance(from);
    const balance = this.balanceOf(from);
    if (amount <= 0n || allowance < amount || balance < amount) {
      return false;
    }

    this.allowances.set(from, allowance - amount);
    this.move(from, InMemoryLedger.TREASURY, amount);
    return true;
  }

  private applyCredit(to: Participant, amount: bigint): boolean {
    if (amount <= 0n || this.treasuryBalance() < amount) {
      return false;
    }

    this.move(InMemoryLedger.TREASURY, to, amount);
    return true;
  }

  // Test helpers

  mint(account: Participant, amount: bigint): void {
    this.balances.set(account, this.balanceOf(account) + amount);
  }

  /**
   * Set the allowance `owner` grants the engine
   */
  approve(owner: Participant, amount: bigint): void {
    this.allowances.set(owner, amount);
  }

  fundRewards(amount: bigint): void {
    this.mint(InMemoryLedger.TREASURY, amount);
  }

  balanceOf(account: Participant): bigint {
    return this.balances.get(account) ?? 0n;
  }

  allowance(owner: Participant): bigint {
    return this.allowances.get(owner) ?? 0n;
  }

  treasuryBalance(): bigint {
    return this.balanceOf(InMemoryLedger.TREASURY);
  }

  private move(from: Participant, to: Participant, amount: bigint): void {
    this.balances.set(from, this.balanceOf(from) - amount);
    this.balances.set(to, this.balanceOf(to) + amount);
  }
}

/**
 * Ledger-specific error
 */
export class LedgerError extends StakeVoteError {
  constructor(message: string) {
    super(message, ErrorCodes.LEDGER_ERROR, 502);
    this.name = 'LedgerError';
  }
}
