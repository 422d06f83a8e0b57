import { EventEmitter } from 'events';
import {
  Address,
  DirectMintRequest,
  DistributionReceipt,
  Logger,
  MintConfiguration,
  MintKind,
  MintReceipt,
  Notification,
  NotificationDraft,
  NotificationType,
  PaidMintRequest,
  TokenId,
  TokenRecord,
  TokenState,
  TokenView
} from '../types';
import {
  AuthorizationError,
  MintError,
  MintErrorCode,
  PaymentError,
  PaymentFailedError
} from '../core/errors';
import { calculateNotificationId } from '../core/hashing';
import { PaymentDistributor } from '../core/payment-distribution';
import { LockTransition, TokenLockStateMachine } from '../core/state-machine';
import { Transactional, UnitOfWork } from '../core/unit-of-work';
import { LedgerAdapter, PaymentTransferCapability } from '../ledger/ledger-adapter';

export interface MintControllerOptions {
  administrator: Address;
  maxSupply: number;
  minMintAmount: number;
  ledger: LedgerAdapter;
  clock?: () => number;
  logger?: Logger;
  maxHistory?: number;
}

export interface ControllerSnapshot {
  administrator: Address;
  configuration: MintConfiguration;
  minted: TokenId[];
  locks: Array<[TokenId, boolean]>;
  mintCount: number;
  notificationSequence: number;
}

enum Access {
  ADMINISTRATOR = 'ADMINISTRATOR',
  HOLDER = 'HOLDER'
}

class NotificationOutbox implements Transactional<NotificationDraft[]> {
  private queued: NotificationDraft[] = [];

  push(draft: NotificationDraft): void {
    this.queued.push(draft);
  }

  drain(): NotificationDraft[] {
    const drained = this.queued;
    this.queued = [];
    return drained;
  }

  snapshot(): NotificationDraft[] {
    return [...this.queued];
  }

  restore(snapshot: NotificationDraft[]): void {
    this.queued = [...snapshot];
  }
}

function isAmount(value: unknown): value is number {
  return typeof value === 'number' && Number.isSafeInteger(value) && value >= 0;
}

/**
 * Mint & Lock Controller.
 *
 * Owns the minted registry, per-token lock flags, the mint configuration and
 * the administrator identity. Every mutating entry point runs as one unit of
 * work over this controller, the token store and the active payment asset:
 * it commits entirely or leaves no trace, and a nested call while one is in
 * flight is rejected with REENTRANT.
 *
 * Notifications are queued inside the unit and emitted once it commits.
 */
export class MintLockController extends EventEmitter implements Transactional<ControllerSnapshot> {
  private administrator: Address;
  private configuration: MintConfiguration;
  private minted: Set<TokenId> = new Set();
  private locks: Map<TokenId, boolean> = new Map();
  private mintCount: number = 0;
  private notificationSequence: number = 0;
  private history: Notification[] = [];
  private maxHistory: number;
  private ledger: LedgerAdapter;
  private distributor: PaymentDistributor = new PaymentDistributor();
  private outbox: NotificationOutbox = new NotificationOutbox();
  private unitOfWork: UnitOfWork;
  private clock: () => number;
  private logger: Logger;

  constructor(options: MintControllerOptions) {
    super();
    this.assertAddress(options.administrator, 'administrator');
    this.assertMaxSupply(options.maxSupply);
    this.assertMinMintAmount(options.minMintAmount);
    this.assertAddress(options.ledger.paymentAsset.assetAddress, 'payment asset address');

    this.administrator = options.administrator;
    this.configuration = {
      maxSupply: options.maxSupply,
      minMintAmount: options.minMintAmount,
      paymentAssetAddress: options.ledger.paymentAsset.assetAddress
    };
    this.ledger = options.ledger;
    this.clock = options.clock ?? (() => Date.now());
    this.logger = options.logger ?? console;
    this.maxHistory = options.maxHistory ?? 1000;
    this.unitOfWork = new UnitOfWork([this, this.ledger, this.outbox]);
  }

  /**
   * Paid mint: validates supply, uniqueness and minimum payment, splits the
   * declared total from the buyer to the commission recipients with the
   * remainder to the administrator, then records the token locked and owned
   * by the buyer.
   */
  mintWithPayment(caller: Address, request: PaidMintRequest): MintReceipt {
    const receipt = this.execute(caller, Access.ADMINISTRATOR, (configuration) => {
      this.assertAddress(request.buyer, 'buyer');
      request.recipients.forEach((recipient, index) => this.assertAddress(recipient, `recipient ${index}`));
      this.assertMintable(request.tokenId, configuration);

      if (!isAmount(request.declaredTotal) || request.declaredTotal < configuration.minMintAmount) {
        throw new MintError(
          MintErrorCode.BELOW_MINIMUM,
          `declared total ${request.declaredTotal} is below the minimum of ${configuration.minMintAmount}`,
          { declaredTotal: request.declaredTotal, minMintAmount: configuration.minMintAmount }
        );
      }

      let distribution: DistributionReceipt;
      try {
        distribution = this.distributor.distribute(this.ledger, {
          payer: request.buyer,
          recipients: request.recipients,
          amounts: request.amounts,
          declaredTotal: request.declaredTotal,
          residualBeneficiary: this.administrator
        });
      } catch (error) {
        if (error instanceof PaymentError) {
          throw new PaymentFailedError(error);
        }
        throw error;
      }

      const token = this.recordMint(MintKind.PAYMENT, request.buyer, request.tokenId, request.uri, request.declaredTotal);
      return { token, distribution, mintCount: this.mintCount, timestamp: this.clock() };
    });

    this.logger.log(
      `[Mint Controller] Minted token ${request.tokenId} to ${request.buyer} for ${request.declaredTotal} ` +
        `(residual ${receipt.distribution.residual})`
    );
    return receipt;
  }

  /**
   * Administrative mint without payment. The token starts locked.
   */
  privilegedMint(caller: Address, request: DirectMintRequest): TokenRecord {
    const token = this.execute(caller, Access.ADMINISTRATOR, (configuration) => {
      this.assertAddress(request.to, 'recipient');
      this.assertMintable(request.tokenId, configuration);
      return this.recordMint(MintKind.PRIVILEGED, request.to, request.tokenId, request.uri, 0);
    });

    this.logger.log(`[Mint Controller] Privileged mint of token ${request.tokenId} to ${request.to}`);
    return token;
  }

  /**
   * Administrative mint without payment. The token starts unlocked.
   */
  giftMint(caller: Address, request: DirectMintRequest): TokenRecord {
    const token = this.execute(caller, Access.ADMINISTRATOR, (configuration) => {
      this.assertAddress(request.to, 'recipient');
      this.assertMintable(request.tokenId, configuration);
      return this.recordMint(MintKind.GIFT, request.to, request.tokenId, request.uri, 0);
    });

    this.logger.log(`[Mint Controller] Gifted token ${request.tokenId} to ${request.to}`);
    return token;
  }

  setLock(caller: Address, tokenId: TokenId, blocked: boolean): TokenRecord {
    return this.execute(caller, Access.ADMINISTRATOR, () => {
      const transition = blocked ? LockTransition.SET_LOCK : LockTransition.CLEAR_LOCK;
      TokenLockStateMachine.apply(tokenId, this.tokenState(tokenId), transition);

      this.locks.set(tokenId, blocked);
      this.notify({ type: NotificationType.LOCK_CHANGED, tokenId, locked: blocked, timestamp: this.clock() });
      return this.requireRecord(tokenId);
    });
  }

  /**
   * Clears the lock and hands the token to `to` in one step. Only valid
   * while the token is locked.
   */
  unlockAndTransfer(caller: Address, tokenId: TokenId, to: Address): TokenRecord {
    const record = this.execute(caller, Access.ADMINISTRATOR, () => {
      this.assertAddress(to, 'recipient');
      TokenLockStateMachine.apply(tokenId, this.tokenState(tokenId), LockTransition.UNLOCK_AND_TRANSFER);

      const from = this.ledger.ownerOf(tokenId);
      this.locks.set(tokenId, false);
      this.ledger.transferToken(from, to, tokenId);
      this.notify({ type: NotificationType.UNLOCKED, tokenId, from, to, timestamp: this.clock() });
      return this.requireRecord(tokenId);
    });

    this.logger.log(`[Mint Controller] Unlocked token ${tokenId} and transferred it to ${to}`);
    return record;
  }

  /**
   * Holder-initiated transfer. Refused while the token is locked.
   */
  transfer(caller: Address, from: Address, to: Address, tokenId: TokenId): TokenRecord {
    return this.execute(caller, Access.HOLDER, () => {
      this.assertAddress(from, 'sender');
      this.assertAddress(to, 'recipient');
      TokenLockStateMachine.apply(tokenId, this.tokenState(tokenId), LockTransition.TRANSFER);

      const owner = this.ledger.ownerOf(tokenId);
      if (owner !== from) {
        throw new AuthorizationError(`token ${tokenId} is not owned by ${from}`, { tokenId, from });
      }
      if (caller !== from) {
        throw new AuthorizationError(`${caller} may not transfer token ${tokenId}`, { tokenId, caller });
      }

      this.ledger.transferToken(from, to, tokenId);
      this.notify({ type: NotificationType.TRANSFERRED, tokenId, from, to, timestamp: this.clock() });
      return this.requireRecord(tokenId);
    });
  }

  /**
   * Removes the token from the live set. The ID stays in the minted
   * registry and can never be minted again.
   */
  burn(caller: Address, tokenId: TokenId): void {
    this.execute(caller, Access.ADMINISTRATOR, () => {
      TokenLockStateMachine.apply(tokenId, this.tokenState(tokenId), LockTransition.BURN);

      const burned = this.ledger.burnToken(tokenId);
      this.locks.delete(tokenId);
      this.notify({ type: NotificationType.BURNED, tokenId, owner: burned.owner, timestamp: this.clock() });
    });

    this.logger.log(`[Mint Controller] Burned token ${tokenId}`);
  }

  setMaxSupply(caller: Address, maxSupply: number): MintConfiguration {
    return this.execute(caller, Access.ADMINISTRATOR, () => {
      this.assertMaxSupply(maxSupply);
      const highest = this.highestMinted();
      if (maxSupply < highest) {
        throw new MintError(
          MintErrorCode.INVALID_CONFIGURATION,
          `max supply ${maxSupply} is below already minted token ${highest}`,
          { maxSupply, highest }
        );
      }
      this.configuration.maxSupply = maxSupply;
      return this.configurationChanged();
    });
  }

  setMinMintAmount(caller: Address, minMintAmount: number): MintConfiguration {
    return this.execute(caller, Access.ADMINISTRATOR, () => {
      this.assertMinMintAmount(minMintAmount);
      this.configuration.minMintAmount = minMintAmount;
      return this.configurationChanged();
    });
  }

  setPaymentAsset(caller: Address, payments: PaymentTransferCapability): MintConfiguration {
    return this.execute(caller, Access.ADMINISTRATOR, () => {
      this.assertAddress(payments.assetAddress, 'payment asset address');
      this.ledger.usePaymentAsset(payments);
      this.configuration.paymentAssetAddress = payments.assetAddress;
      return this.configurationChanged();
    });
  }

  setTokenUri(caller: Address, tokenId: TokenId, uri: string): TokenRecord {
    return this.execute(caller, Access.ADMINISTRATOR, () => {
      this.ledger.setTokenUri(tokenId, uri);
      return this.requireRecord(tokenId);
    });
  }

  transferAdministration(caller: Address, newAdministrator: Address): Address {
    const current = this.execute(caller, Access.ADMINISTRATOR, () => {
      this.assertAddress(newAdministrator, 'administrator');
      const previous = this.administrator;
      this.administrator = newAdministrator;
      this.notify({
        type: NotificationType.ADMINISTRATOR_CHANGED,
        previous,
        current: newAdministrator,
        timestamp: this.clock()
      });
      return newAdministrator;
    });

    this.logger.log(`[Mint Controller] Administration transferred to ${current}`);
    return current;
  }

  getAdministrator(): Address {
    return this.administrator;
  }

  getConfiguration(): MintConfiguration {
    return { ...this.configuration };
  }

  isLocked(tokenId: TokenId): boolean {
    return this.locks.get(tokenId) ?? false;
  }

  isMinted(tokenId: TokenId): boolean {
    return this.minted.has(tokenId);
  }

  totalMinted(): number {
    return this.mintCount;
  }

  totalSupply(): number {
    return this.ledger.ownership.totalSupply();
  }

  getToken(tokenId: TokenId): TokenView {
    const state = this.tokenState(tokenId);
    const live = state === TokenState.LOCKED || state === TokenState.UNLOCKED;
    return {
      tokenId,
      state,
      minted: this.minted.has(tokenId),
      locked: this.isLocked(tokenId),
      owner: live ? this.ledger.ownerOf(tokenId) : null,
      uri: live ? this.ledger.tokenUri(tokenId) : null
    };
  }

  tokensOfOwner(owner: Address): TokenRecord[] {
    return this.ledger.ownership.tokensOfOwner(owner).map((tokenId) => this.requireRecord(tokenId));
  }

  getHistory(): Notification[] {
    return [...this.history];
  }

  snapshot(): ControllerSnapshot {
    return {
      administrator: this.administrator,
      configuration: { ...this.configuration },
      minted: Array.from(this.minted),
      locks: Array.from(this.locks.entries()),
      mintCount: this.mintCount,
      notificationSequence: this.notificationSequence
    };
  }

  restore(snapshot: ControllerSnapshot): void {
    this.administrator = snapshot.administrator;
    this.configuration = { ...snapshot.configuration };
    this.minted = new Set(snapshot.minted);
    this.locks = new Map(snapshot.locks);
    this.mintCount = snapshot.mintCount;
    this.notificationSequence = snapshot.notificationSequence;
  }

  private execute<T>(caller: Address, access: Access, work: (configuration: MintConfiguration) => T): T {
    const result = this.unitOfWork.run(() => {
      if (access === Access.ADMINISTRATOR) {
        this.assertAdministrator(caller);
      }
      return work({ ...this.configuration });
    });

    this.publish();
    return result;
  }

  private publish(): void {
    const committed = this.outbox.drain();
    if (committed.length === 0) {
      return;
    }

    for (const draft of committed) {
      this.notificationSequence += 1;
      const notification: Notification = {
        ...draft,
        notificationId: calculateNotificationId(this.notificationSequence, draft)
      };

      this.history.push(notification);
      if (this.history.length > this.maxHistory) {
        this.history.shift();
      }
      this.deliver(notification.type, notification);
    }

    this.deliver('committed', committed.length);
  }

  // Runs after commit: listener errors are logged, never rethrown.
  private deliver(event: string, payload: Notification | number): void {
    try {
      this.emit(event, payload);
    } catch (error) {
      this.logger.error('[Mint Controller] Listener failed', error);
    }
  }

  private highestMinted(): TokenId {
    let highest = 0;
    for (const tokenId of this.minted) {
      if (tokenId > highest) {
        highest = tokenId;
      }
    }
    return highest;
  }

  private recordMint(kind: MintKind, to: Address, tokenId: TokenId, uri: string, amount: number): TokenRecord {
    const next = TokenLockStateMachine.apply(
      tokenId,
      this.tokenState(tokenId),
      TokenLockStateMachine.mintTransition(kind)
    );

    this.ledger.createToken(tokenId, to, uri);
    this.minted.add(tokenId);
    this.locks.set(tokenId, next === TokenState.LOCKED);
    this.mintCount += 1;
    this.notify({ type: NotificationType.MINTED, kind, to, tokenId, amount, timestamp: this.clock() });

    return this.requireRecord(tokenId);
  }

  private notify(draft: NotificationDraft): void {
    this.outbox.push(draft);
  }

  private configurationChanged(): MintConfiguration {
    const configuration = { ...this.configuration };
    this.notify({ type: NotificationType.CONFIGURATION_CHANGED, configuration, timestamp: this.clock() });
    return configuration;
  }

  private tokenState(tokenId: TokenId): TokenState {
    if (this.ledger.exists(tokenId)) {
      return this.isLocked(tokenId) ? TokenState.LOCKED : TokenState.UNLOCKED;
    }
    return this.minted.has(tokenId) ? TokenState.BURNED : TokenState.NON_EXISTENT;
  }

  private requireRecord(tokenId: TokenId): TokenRecord {
    return {
      tokenId,
      owner: this.ledger.ownerOf(tokenId),
      uri: this.ledger.tokenUri(tokenId),
      locked: this.isLocked(tokenId)
    };
  }

  private assertAdministrator(caller: Address): void {
    if (caller !== this.administrator) {
      throw new AuthorizationError(`${caller} is not the administrator`, { caller });
    }
  }

  private assertMintable(tokenId: TokenId, configuration: MintConfiguration): void {
    if (!Number.isSafeInteger(tokenId) || tokenId < 1 || tokenId > configuration.maxSupply) {
      throw new MintError(
        MintErrorCode.SUPPLY_EXCEEDED,
        `token ${tokenId} is outside 1..${configuration.maxSupply}`,
        { tokenId, maxSupply: configuration.maxSupply }
      );
    }
    if (this.minted.has(tokenId) || this.ledger.exists(tokenId)) {
      throw new MintError(MintErrorCode.ALREADY_MINTED, `token ${tokenId} was already minted`, { tokenId });
    }
  }

  private assertAddress(value: unknown, field: string): void {
    if (typeof value !== 'string' || value.trim() === '') {
      throw new MintError(MintErrorCode.INVALID_CONFIGURATION, `${field} must be a non-empty address`, { field });
    }
  }

  private assertMaxSupply(maxSupply: number): void {
    if (!Number.isSafeInteger(maxSupply) || maxSupply < 1) {
      throw new MintError(MintErrorCode.INVALID_CONFIGURATION, `invalid max supply: ${maxSupply}`, { maxSupply });
    }
  }

  private assertMinMintAmount(minMintAmount: number): void {
    if (!isAmount(minMintAmount)) {
      throw new MintError(
        MintErrorCode.INVALID_CONFIGURATION,
        `invalid minimum mint amount: ${minMintAmount}`,
        { minMintAmount }
      );
    }
  }
}
