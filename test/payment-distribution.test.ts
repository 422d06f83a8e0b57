import { expect } from 'chai';
import { PaymentError, PaymentErrorCode } from '../src/core/errors';
import { DistributionRequest, PaymentDistributor, PaymentPort } from '../src/core/payment-distribution';
import { captureError } from './fixtures';

interface RecordedTransfer {
  from: string;
  to: string;
  amount: number;
}

class RecordingPort implements PaymentPort {
  transfers: RecordedTransfer[] = [];
  private outcomes: Array<boolean | Error>;

  constructor(outcomes: Array<boolean | Error> = []) {
    this.outcomes = outcomes;
  }

  transferPayment(from: string, to: string, amount: number): boolean {
    this.transfers.push({ from, to, amount });
    const outcome = this.outcomes[this.transfers.length - 1] ?? true;
    if (outcome instanceof Error) {
      throw outcome;
    }
    return outcome;
  }
}

function request(overrides: Partial<DistributionRequest> = {}): DistributionRequest {
  return {
    payer: 'buyer',
    recipients: ['alice', 'bob'],
    amounts: [30, 20],
    declaredTotal: 100,
    residualBeneficiary: 'admin',
    ...overrides
  };
}

describe('PaymentDistributor', function () {
  let distributor: PaymentDistributor;

  beforeEach(() => {
    distributor = new PaymentDistributor();
  });

  describe('validate', function () {
    it('returns the sum of the commissions', () => {
      expect(PaymentDistributor.validate(request())).to.equal(50);
    });

    it('rejects mismatched recipient and amount lists', () => {
      const error = captureError(() => PaymentDistributor.validate(request({ amounts: [30] })));
      expect(error).to.be.instanceOf(PaymentError);
      expect(error).to.have.property('code', PaymentErrorCode.LENGTH_MISMATCH);
    });

    it('rejects negative and fractional amounts with their index', () => {
      const negative = captureError(() => PaymentDistributor.validate(request({ amounts: [30, -1] })));
      expect(negative).to.have.property('code', PaymentErrorCode.INVALID_AMOUNT);
      expect(negative).to.have.property('index', 1);

      const fractional = captureError(() => PaymentDistributor.validate(request({ amounts: [1.5, 20] })));
      expect(fractional).to.have.property('index', 0);
    });

    it('rejects commissions above the declared total', () => {
      const error = captureError(() => PaymentDistributor.validate(request({ amounts: [60, 50] })));
      expect(error).to.have.property('code', PaymentErrorCode.AMOUNTS_EXCEED_TOTAL);
    });
  });

  describe('distribute', function () {
    it('pays each recipient in order and sends the remainder to the beneficiary', () => {
      const port = new RecordingPort();
      const receipt = distributor.distribute(port, request());

      expect(port.transfers).to.deep.equal([
        { from: 'buyer', to: 'alice', amount: 30 },
        { from: 'buyer', to: 'bob', amount: 20 },
        { from: 'buyer', to: 'admin', amount: 50 }
      ]);
      expect(receipt).to.deep.equal({
        payer: 'buyer',
        payouts: [
          { recipient: 'alice', amount: 30 },
          { recipient: 'bob', amount: 20 }
        ],
        residualBeneficiary: 'admin',
        residual: 50,
        total: 100
      });
    });

    it('still transfers a zero residual', () => {
      const port = new RecordingPort();
      const receipt = distributor.distribute(port, request({ recipients: ['alice'], amounts: [100] }));

      expect(port.transfers).to.have.length(2);
      expect(port.transfers[1]).to.deep.equal({ from: 'buyer', to: 'admin', amount: 0 });
      expect(receipt.residual).to.equal(0);
    });

    it('sends the whole total to the beneficiary when there are no recipients', () => {
      const port = new RecordingPort();
      distributor.distribute(port, request({ recipients: [], amounts: [] }));

      expect(port.transfers).to.deep.equal([{ from: 'buyer', to: 'admin', amount: 100 }]);
    });

    it('moves nothing when validation fails', () => {
      const port = new RecordingPort();
      captureError(() => distributor.distribute(port, request({ amounts: [60, 50] })));

      expect(port.transfers).to.deep.equal([]);
    });

    it('stops at the first refused commission transfer', () => {
      const port = new RecordingPort([true, false]);
      const error = captureError(() => distributor.distribute(port, request()));

      expect(error).to.have.property('code', PaymentErrorCode.TRANSFER_FAILED);
      expect(error).to.have.property('index', 1);
      expect(port.transfers).to.have.length(2);
    });

    it('wraps an error thrown by the payment asset', () => {
      const cause = new Error('asset offline');
      const port = new RecordingPort([cause]);
      const error = captureError(() => distributor.distribute(port, request()));

      expect(error).to.be.instanceOf(PaymentError);
      expect(error).to.have.property('code', PaymentErrorCode.TRANSFER_FAILED);
      expect(error).to.have.property('index', 0);
      expect(error).to.have.property('details').that.deep.equals({ error: cause });
    });

    it('reports a refused residual transfer separately', () => {
      const port = new RecordingPort([true, true, false]);
      const error = captureError(() => distributor.distribute(port, request()));

      expect(error).to.have.property('code', PaymentErrorCode.RESIDUAL_TRANSFER_FAILED);
      expect(error).to.have.property('index', undefined);
    });
  });
});
