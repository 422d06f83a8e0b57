import { Address, Logger } from '../types';
import { AuthorizationError, ConfigError, MintError, MintErrorCode } from '../core/errors';
import { LedgerAdapter } from '../ledger/ledger-adapter';
import { InMemoryPaymentLedger } from '../ledger/payment-ledger';
import { InMemoryTokenStore } from '../ledger/token-store';
import { MintLockController } from '../token/mint-controller';
import { CHECKPOINT_VERSION, MintCheckpoint, StateStore } from '../store/state-store';

export interface MintNodeOptions {
  administrator: Address;
  maxSupply: number;
  minMintAmount: number;
  paymentAssetAddress: Address;
  controllerAddress: Address;
  store?: StateStore;
  clock?: () => number;
  logger?: Logger;
}

/**
 * Wires the controller to the in-process token store and payment asset and
 * keeps a checkpoint of all three in the state store after every commit.
 */
export class MintNode {
  readonly controller: MintLockController;
  readonly payments: InMemoryPaymentLedger;
  readonly tokens: InMemoryTokenStore;
  readonly controllerAddress: Address;
  private store?: StateStore;
  private persisting: Promise<void> = Promise.resolve();
  private clock: () => number;
  private logger: Logger;

  constructor(options: MintNodeOptions) {
    this.clock = options.clock ?? (() => Date.now());
    this.logger = options.logger ?? console;
    this.store = options.store;
    this.controllerAddress = options.controllerAddress;
    this.payments = new InMemoryPaymentLedger(options.paymentAssetAddress);
    this.tokens = new InMemoryTokenStore();

    const ledger = new LedgerAdapter(options.controllerAddress, this.tokens, this.payments);
    this.controller = new MintLockController({
      administrator: options.administrator,
      maxSupply: options.maxSupply,
      minMintAmount: options.minMintAmount,
      ledger,
      clock: this.clock,
      logger: this.logger
    });

    this.controller.on('committed', () => this.schedulePersist());
  }

  async initialize(): Promise<void> {
    if (!this.store) {
      this.logger.log('[Mint Node] Running without persistence');
      return;
    }

    const checkpoint = await this.store.load();
    if (!checkpoint) {
      this.logger.log('[Mint Node] No checkpoint found, starting fresh');
      return;
    }

    if (checkpoint.controller.configuration.paymentAssetAddress !== this.payments.assetAddress) {
      throw new ConfigError(
        `checkpoint uses payment asset ${checkpoint.controller.configuration.paymentAssetAddress}, ` +
          `node is configured with ${this.payments.assetAddress}`
      );
    }

    this.controller.restore(checkpoint.controller);
    this.tokens.restore(checkpoint.tokens);
    this.payments.restore(checkpoint.payments);
    this.logger.log(
      `[Mint Node] Restored checkpoint: ${checkpoint.controller.mintCount} mints, ` +
        `${this.tokens.totalSupply()} live tokens`
    );
  }

  /**
   * Grants the controller an allowance over the owner's payment balance.
   */
  approvePayment(owner: Address, amount: number): number {
    this.payments.approve(owner, this.controllerAddress, amount);
    this.schedulePersist();
    return this.payments.allowance(owner, this.controllerAddress);
  }

  /**
   * Issues payment units on the local asset. Administrator only.
   */
  creditPayment(caller: Address, to: Address, amount: number): number {
    if (caller !== this.controller.getAdministrator()) {
      throw new AuthorizationError(`${caller} is not the administrator`, { caller });
    }
    if (to.trim() === '') {
      throw new MintError(MintErrorCode.INVALID_CONFIGURATION, 'credit recipient must be a non-empty address');
    }
    this.payments.credit(to, amount);
    this.schedulePersist();
    return this.payments.balanceOf(to);
  }

  checkpoint(): MintCheckpoint {
    return {
      version: CHECKPOINT_VERSION,
      savedAt: this.clock(),
      controller: this.controller.snapshot(),
      tokens: this.tokens.snapshot(),
      payments: this.payments.snapshot()
    };
  }

  /**
   * Resolves once every scheduled checkpoint write has settled.
   */
  flush(): Promise<void> {
    return this.persisting;
  }

  private schedulePersist(): void {
    const store = this.store;
    if (!store) {
      return;
    }

    const checkpoint = this.checkpoint();
    this.persisting = this.persisting
      .then(() => store.save(checkpoint))
      .catch((error: unknown) => {
        this.logger.error('[State Store] Failed to save checkpoint', error);
      });
  }
}
