import { expect } from 'chai';
import { LedgerAdapter } from '../src/ledger/ledger-adapter';
import { InMemoryPaymentLedger } from '../src/ledger/payment-ledger';
import { InMemoryTokenStore } from '../src/ledger/token-store';
import { MintLockController } from '../src/token/mint-controller';
import { Address, Logger, silentLogger } from '../src/types';

export const ADMIN = 'admin-address';
export const CONTROLLER = 'mint-controller';
export const ASSET = 'test-credits';
export const BUYER = 'buyer-address';
export const NOW = 1_700_000_000_000;

export interface Harness {
  payments: InMemoryPaymentLedger;
  tokens: InMemoryTokenStore;
  ledger: LedgerAdapter;
  controller: MintLockController;
}

export class RecordingLogger implements Logger {
  errors: Array<{ message: string; error: unknown }> = [];

  log(): void {}

  warn(): void {}

  error(message: string, error?: unknown): void {
    this.errors.push({ message, error });
  }
}

export function createHarness(
  options: { maxSupply?: number; minMintAmount?: number; logger?: Logger } = {}
): Harness {
  const payments = new InMemoryPaymentLedger(ASSET);
  const tokens = new InMemoryTokenStore();
  const ledger = new LedgerAdapter(CONTROLLER, tokens, payments);
  const controller = new MintLockController({
    administrator: ADMIN,
    maxSupply: options.maxSupply ?? 100,
    minMintAmount: options.minMintAmount ?? 100,
    ledger,
    clock: () => NOW,
    logger: options.logger ?? silentLogger
  });
  return { payments, tokens, ledger, controller };
}

export function fund(payments: InMemoryPaymentLedger, owner: Address, balance: number, allowance: number = balance): void {
  payments.credit(owner, balance);
  payments.approve(owner, CONTROLLER, allowance);
}

/**
 * Runs `action` and returns what it threw, failing the test if nothing was.
 */
export function captureError(action: () => unknown): unknown {
  try {
    action();
  } catch (error) {
    return error;
  }
  expect.fail('expected an error to be thrown');
}

export async function captureRejection(action: () => Promise<unknown>): Promise<unknown> {
  try {
    await action();
  } catch (error) {
    return error;
  }
  expect.fail('expected the promise to reject');
}
