/**
 * Tip ledger: direct agent-to-agent payments with running totals.
 *
 * Tokens move sender → recipient on the tips account's allowance; the
 * ledger never holds tip funds. Tips are final: there is no refund path.
 * Post refs and messages are recorded only in the TipSent event.
 */

import {
  BATCH_TIP_SENT,
  MAX_BATCH_SIZE,
  TIP_SENT,
  ensure,
  isParticipant,
  type Identity,
} from "@agentledger/protocol";
import type { LedgerContext } from "../ledger.js";
import type { Receipt, TipStats } from "../types.js";

function isPositiveAmount(amount: number): boolean {
  return Number.isSafeInteger(amount) && amount > 0;
}

export class TipLedger {
  constructor(private readonly ctx: LedgerContext) {}

  /** Account that must hold the sender's allowance. */
  get account(): Identity {
    return this.ctx.accounts.tips;
  }

  async tip(
    sender: Identity,
    recipient: Identity,
    amount: number,
    postRef: string = "",
    message: string = "",
  ): Promise<Receipt> {
    ensure(isParticipant(sender), "sender must be a non-zero identity");
    this.validateRecipient(sender, recipient);
    ensure(isPositiveAmount(amount), "amount must be a positive integer");

    return this.ctx.transact(async (tx) => {
      await this.ctx.pull(this.account, sender, recipient, amount);

      const received = this.ctx.store.mutableTipStats(recipient);
      received.totalReceived += amount;
      received.receivedCount += 1;
      this.ctx.store.mutableTipStats(sender).totalSent += amount;

      tx.emit({
        type: TIP_SENT,
        payload: { from: sender, to: recipient, amount, post_ref: postRef, message },
      });
    });
  }

  /**
   * One transfer per recipient; all-or-nothing. Every precondition is
   * checked before the first transfer.
   */
  async batchTip(
    sender: Identity,
    recipients: readonly Identity[],
    amounts: readonly number[],
  ): Promise<Receipt> {
    ensure(isParticipant(sender), "sender must be a non-zero identity");
    ensure(recipients.length === amounts.length, "recipients and amounts must have equal length");
    ensure(recipients.length > 0, "batch must not be empty");
    ensure(recipients.length <= MAX_BATCH_SIZE, `batch exceeds ${MAX_BATCH_SIZE} recipients`);

    let total = 0;
    recipients.forEach((recipient, i) => {
      this.validateRecipient(sender, recipient, `recipients[${i}]`);
      const amount = amounts[i] ?? 0;
      ensure(isPositiveAmount(amount), `amounts[${i}] must be a positive integer`);
      total += amount;
    });
    ensure(Number.isSafeInteger(total), "batch total exceeds the representable range");

    return this.ctx.transact(async (tx) => {
      await this.ctx.requireFunds(sender, this.account, total);

      for (let i = 0; i < recipients.length; i++) {
        const recipient = recipients[i] ?? "";
        const amount = amounts[i] ?? 0;
        await this.ctx.pull(this.account, sender, recipient, amount);

        const received = this.ctx.store.mutableTipStats(recipient);
        received.totalReceived += amount;
        received.receivedCount += 1;
      }
      this.ctx.store.mutableTipStats(sender).totalSent += total;

      tx.emit({
        type: BATCH_TIP_SENT,
        payload: {
          from: sender,
          recipients: [...recipients],
          amounts: [...amounts],
          total_amount: total,
        },
      });
    });
  }

  getAgentStats(identity: Identity): TipStats {
    return this.ctx.store.tipStats(identity);
  }

  private validateRecipient(sender: Identity, recipient: Identity, label = "recipient"): void {
    ensure(isParticipant(recipient), `${label} must be a non-zero identity`);
    ensure(recipient !== sender, `${label} cannot be the sender`);
    ensure(!this.ctx.isLedgerAccount(recipient), `${label} cannot be a ledger account`);
  }
}
