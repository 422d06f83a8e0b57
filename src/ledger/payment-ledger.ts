import { Address } from '../types';
import { PaymentError, PaymentErrorCode } from '../core/errors';
import { PaymentTransferCapability, PaymentTransferEvent } from './ledger-adapter';

export interface PaymentLedgerSnapshot {
  balances: Array<[Address, number]>;
  allowances: Array<[Address, Address, number]>;
}

export type TransferListener = (event: PaymentTransferEvent) => void;

function assertAmount(amount: number): void {
  if (!Number.isSafeInteger(amount) || amount < 0) {
    throw new PaymentError(PaymentErrorCode.INVALID_AMOUNT, `invalid amount: ${amount}`);
  }
}

/**
 * In-process fungible payment asset with allowance-based transferFrom.
 * Receive hooks registered through onTransfer run inside transferFrom after
 * funds have moved; an error thrown by a hook escapes transferFrom.
 */
export class InMemoryPaymentLedger implements PaymentTransferCapability {
  readonly assetAddress: Address;
  private balances: Map<Address, number> = new Map();
  private allowances: Map<Address, Map<Address, number>> = new Map();
  private listeners: TransferListener[] = [];

  constructor(assetAddress: Address) {
    this.assetAddress = assetAddress;
  }

  balanceOf(owner: Address): number {
    return this.balances.get(owner) ?? 0;
  }

  allowance(owner: Address, spender: Address): number {
    return this.allowances.get(owner)?.get(spender) ?? 0;
  }

  credit(to: Address, amount: number): void {
    assertAmount(amount);
    this.balances.set(to, this.balanceOf(to) + amount);
  }

  approve(owner: Address, spender: Address, amount: number): void {
    assertAmount(amount);
    let granted = this.allowances.get(owner);
    if (!granted) {
      granted = new Map();
      this.allowances.set(owner, granted);
    }
    granted.set(spender, amount);
  }

  transferFrom(spender: Address, owner: Address, recipient: Address, amount: number): boolean {
    assertAmount(amount);

    const balance = this.balanceOf(owner);
    const allowed = this.allowance(owner, spender);
    if (balance < amount || allowed < amount) {
      return false;
    }

    this.approve(owner, spender, allowed - amount);
    this.balances.set(owner, balance - amount);
    this.balances.set(recipient, this.balanceOf(recipient) + amount);

    const event: PaymentTransferEvent = { spender, from: owner, to: recipient, amount };
    for (const listener of [...this.listeners]) {
      listener(event);
    }

    return true;
  }

  onTransfer(listener: TransferListener): () => void {
    this.listeners.push(listener);
    return () => {
      this.listeners = this.listeners.filter((registered) => registered !== listener);
    };
  }

  snapshot(): PaymentLedgerSnapshot {
    const allowances: Array<[Address, Address, number]> = [];
    for (const [owner, granted] of this.allowances) {
      for (const [spender, amount] of granted) {
        allowances.push([owner, spender, amount]);
      }
    }

    return {
      balances: Array.from(this.balances.entries()),
      allowances
    };
  }

  restore(snapshot: PaymentLedgerSnapshot): void {
    this.balances = new Map(snapshot.balances);
    this.allowances = new Map();
    for (const [owner, spender, amount] of snapshot.allowances) {
      this.approve(owner, spender, amount);
    }
  }
}
