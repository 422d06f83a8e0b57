import { Address, DistributionReceipt, Payout } from '../types';
import { LedgerAdapter } from '../ledger/ledger-adapter';
import { PaymentError, PaymentErrorCode } from './errors';

export interface DistributionRequest {
  payer: Address;
  recipients: Address[];
  amounts: number[];
  declaredTotal: number;
  residualBeneficiary: Address;
}

export type PaymentPort = Pick<LedgerAdapter, 'transferPayment'>;

function isAmount(value: number): boolean {
  return Number.isSafeInteger(value) && value >= 0;
}

/**
 * Splits a declared total between commission recipients and a residual
 * beneficiary. Holds no state; all-or-nothing behaviour comes from the unit
 * of work the caller runs it in.
 */
export class PaymentDistributor {
  /**
   * Sum of commissions, validated against the declared total. Throws before
   * any funds move.
   */
  static validate(request: DistributionRequest): number {
    if (request.recipients.length !== request.amounts.length) {
      throw new PaymentError(
        PaymentErrorCode.LENGTH_MISMATCH,
        `${request.recipients.length} recipients but ${request.amounts.length} amounts`
      );
    }

    if (!isAmount(request.declaredTotal)) {
      throw new PaymentError(PaymentErrorCode.INVALID_AMOUNT, `invalid declared total: ${request.declaredTotal}`);
    }

    let allocated = 0;
    request.amounts.forEach((amount, index) => {
      if (!isAmount(amount)) {
        throw new PaymentError(PaymentErrorCode.INVALID_AMOUNT, `invalid amount at index ${index}: ${amount}`, index);
      }
      allocated += amount;
    });

    if (allocated > request.declaredTotal) {
      throw new PaymentError(
        PaymentErrorCode.AMOUNTS_EXCEED_TOTAL,
        `commissions ${allocated} exceed declared total ${request.declaredTotal}`
      );
    }

    return allocated;
  }

  distribute(payments: PaymentPort, request: DistributionRequest): DistributionReceipt {
    const allocated = PaymentDistributor.validate(request);
    const payouts: Payout[] = [];

    request.recipients.forEach((recipient, index) => {
      const amount = request.amounts[index];
      let moved: boolean;
      try {
        moved = payments.transferPayment(request.payer, recipient, amount);
      } catch (error) {
        throw new PaymentError(
          PaymentErrorCode.TRANSFER_FAILED,
          `transfer ${index} to ${recipient} failed`,
          index,
          { error }
        );
      }
      if (!moved) {
        throw new PaymentError(PaymentErrorCode.TRANSFER_FAILED, `transfer ${index} to ${recipient} was refused`, index);
      }
      payouts.push({ recipient, amount });
    });

    const residual = request.declaredTotal - allocated;
    let residualMoved: boolean;
    try {
      residualMoved = payments.transferPayment(request.payer, request.residualBeneficiary, residual);
    } catch (error) {
      throw new PaymentError(
        PaymentErrorCode.RESIDUAL_TRANSFER_FAILED,
        `residual transfer to ${request.residualBeneficiary} failed`,
        undefined,
        { error }
      );
    }
    if (!residualMoved) {
      throw new PaymentError(
        PaymentErrorCode.RESIDUAL_TRANSFER_FAILED,
        `residual transfer to ${request.residualBeneficiary} was refused`
      );
    }

    return {
      payer: request.payer,
      payouts,
      residualBeneficiary: request.residualBeneficiary,
      residual,
      total: request.declaredTotal
    };
  }
}
