import { Address, TokenId } from '../types';
import { Transactional } from '../core/unit-of-work';

export interface PaymentTransferEvent {
  spender: Address;
  from: Address;
  to: Address;
  amount: number;
}

/**
 * Fungible payment asset. transferFrom debits `owner` against the allowance
 * it granted to `spender` and reports false when balance or allowance is
 * short.
 */
export interface PaymentTransferCapability extends Transactional<unknown> {
  readonly assetAddress: Address;
  transferFrom(spender: Address, owner: Address, recipient: Address, amount: number): boolean;
  balanceOf(owner: Address): number;
  allowance(owner: Address, spender: Address): number;
}

export interface OwnedToken {
  tokenId: TokenId;
  owner: Address;
  uri: string;
}

export interface OwnershipStore extends Transactional<unknown> {
  create(tokenId: TokenId, owner: Address, uri: string): OwnedToken;
  exists(tokenId: TokenId): boolean;
  ownerOf(tokenId: TokenId): Address;
  tokenUri(tokenId: TokenId): string;
  setTokenUri(tokenId: TokenId, uri: string): void;
  transfer(from: Address, to: Address, tokenId: TokenId): void;
  burn(tokenId: TokenId): OwnedToken;
  totalSupply(): number;
  tokenByIndex(index: number): TokenId;
  tokensOfOwner(owner: Address): TokenId[];
  balanceOf(owner: Address): number;
}

export interface LedgerAdapterSnapshot {
  payments: PaymentTransferCapability;
  paymentState: unknown;
  storeState: unknown;
}

/**
 * Binds the ownership store and the active payment asset behind the
 * primitives the mint controller calls. The controller's own address is the
 * spender every payment is drawn through.
 */
export class LedgerAdapter implements Transactional<LedgerAdapterSnapshot> {
  readonly spender: Address;
  private store: OwnershipStore;
  private payments: PaymentTransferCapability;

  constructor(spender: Address, store: OwnershipStore, payments: PaymentTransferCapability) {
    this.spender = spender;
    this.store = store;
    this.payments = payments;
  }

  get paymentAsset(): PaymentTransferCapability {
    return this.payments;
  }

  get ownership(): OwnershipStore {
    return this.store;
  }

  usePaymentAsset(payments: PaymentTransferCapability): void {
    this.payments = payments;
  }

  transferPayment(from: Address, to: Address, amount: number): boolean {
    return this.payments.transferFrom(this.spender, from, to, amount);
  }

  createToken(tokenId: TokenId, owner: Address, uri: string): OwnedToken {
    return this.store.create(tokenId, owner, uri);
  }

  setTokenUri(tokenId: TokenId, uri: string): void {
    this.store.setTokenUri(tokenId, uri);
  }

  ownerOf(tokenId: TokenId): Address {
    return this.store.ownerOf(tokenId);
  }

  tokenUri(tokenId: TokenId): string {
    return this.store.tokenUri(tokenId);
  }

  exists(tokenId: TokenId): boolean {
    return this.store.exists(tokenId);
  }

  transferToken(from: Address, to: Address, tokenId: TokenId): void {
    this.store.transfer(from, to, tokenId);
  }

  burnToken(tokenId: TokenId): OwnedToken {
    return this.store.burn(tokenId);
  }

  snapshot(): LedgerAdapterSnapshot {
    return {
      payments: this.payments,
      paymentState: this.payments.snapshot(),
      storeState: this.store.snapshot()
    };
  }

  restore(snapshot: LedgerAdapterSnapshot): void {
    this.payments = snapshot.payments;
    this.payments.restore(snapshot.paymentState);
    this.store.restore(snapshot.storeState);
  }
}
