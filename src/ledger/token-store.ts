import { Address, TokenId } from '../types';
import { AuthorizationError, MintError, MintErrorCode } from '../core/errors';
import { OwnedToken, OwnershipStore } from './ledger-adapter';

export interface TokenStoreSnapshot {
  tokens: OwnedToken[];
}

export class InMemoryTokenStore implements OwnershipStore {
  private tokens: Map<TokenId, OwnedToken> = new Map();

  create(tokenId: TokenId, owner: Address, uri: string): OwnedToken {
    if (this.tokens.has(tokenId)) {
      throw new MintError(MintErrorCode.ALREADY_MINTED, `token ${tokenId} already exists`, { tokenId });
    }

    const token: OwnedToken = { tokenId, owner, uri };
    this.tokens.set(tokenId, token);
    return { ...token };
  }

  exists(tokenId: TokenId): boolean {
    return this.tokens.has(tokenId);
  }

  ownerOf(tokenId: TokenId): Address {
    return this.require(tokenId).owner;
  }

  tokenUri(tokenId: TokenId): string {
    return this.require(tokenId).uri;
  }

  setTokenUri(tokenId: TokenId, uri: string): void {
    this.require(tokenId).uri = uri;
  }

  transfer(from: Address, to: Address, tokenId: TokenId): void {
    const token = this.require(tokenId);
    if (token.owner !== from) {
      throw new AuthorizationError(`token ${tokenId} is not owned by ${from}`, { tokenId, from });
    }
    token.owner = to;
  }

  burn(tokenId: TokenId): OwnedToken {
    const token = this.require(tokenId);
    this.tokens.delete(tokenId);
    return { ...token };
  }

  totalSupply(): number {
    return this.tokens.size;
  }

  tokenByIndex(index: number): TokenId {
    const ids = Array.from(this.tokens.keys());
    if (!Number.isInteger(index) || index < 0 || index >= ids.length) {
      throw new MintError(MintErrorCode.TOKEN_NOT_FOUND, `no token at index ${index}`, { index });
    }
    return ids[index];
  }

  tokensOfOwner(owner: Address): TokenId[] {
    return Array.from(this.tokens.values())
      .filter((token) => token.owner === owner)
      .map((token) => token.tokenId);
  }

  balanceOf(owner: Address): number {
    return this.tokensOfOwner(owner).length;
  }

  snapshot(): TokenStoreSnapshot {
    return { tokens: Array.from(this.tokens.values()).map((token) => ({ ...token })) };
  }

  restore(snapshot: TokenStoreSnapshot): void {
    this.tokens = new Map(snapshot.tokens.map((token): [TokenId, OwnedToken] => [token.tokenId, { ...token }]));
  }

  private require(tokenId: TokenId): OwnedToken {
    const token = this.tokens.get(tokenId);
    if (!token) {
      throw new MintError(MintErrorCode.TOKEN_NOT_FOUND, `token ${tokenId} does not exist`, { tokenId });
    }
    return token;
  }
}
