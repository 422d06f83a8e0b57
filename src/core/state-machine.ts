import { MintKind, TokenId, TokenState } from '../types';
import { MintError, MintErrorCode } from './errors';

export enum LockTransition {
  MINT_LOCKED = 'MINT_LOCKED',
  MINT_UNLOCKED = 'MINT_UNLOCKED',
  SET_LOCK = 'SET_LOCK',
  CLEAR_LOCK = 'CLEAR_LOCK',
  UNLOCK_AND_TRANSFER = 'UNLOCK_AND_TRANSFER',
  TRANSFER = 'TRANSFER',
  BURN = 'BURN'
}

const transitions: Record<TokenState, LockTransition[]> = {
  [TokenState.NON_EXISTENT]: [LockTransition.MINT_LOCKED, LockTransition.MINT_UNLOCKED],
  [TokenState.LOCKED]: [
    LockTransition.SET_LOCK,
    LockTransition.CLEAR_LOCK,
    LockTransition.UNLOCK_AND_TRANSFER,
    LockTransition.BURN
  ],
  [TokenState.UNLOCKED]: [
    LockTransition.SET_LOCK,
    LockTransition.CLEAR_LOCK,
    LockTransition.TRANSFER,
    LockTransition.BURN
  ],
  [TokenState.BURNED]: []
};

export class TokenLockStateMachine {
  static isValidTransition(current: TokenState, transition: LockTransition): boolean {
    return transitions[current].includes(transition);
  }

  static mintTransition(kind: MintKind): LockTransition {
    return kind === MintKind.GIFT ? LockTransition.MINT_UNLOCKED : LockTransition.MINT_LOCKED;
  }

  static getNextState(current: TokenState, transition: LockTransition): TokenState {
    switch (transition) {
      case LockTransition.MINT_LOCKED:
      case LockTransition.SET_LOCK:
        return TokenState.LOCKED;

      case LockTransition.MINT_UNLOCKED:
      case LockTransition.CLEAR_LOCK:
      case LockTransition.UNLOCK_AND_TRANSFER:
        return TokenState.UNLOCKED;

      case LockTransition.TRANSFER:
        return current;

      case LockTransition.BURN:
        return TokenState.BURNED;
    }
  }

  /**
   * Resolves the state a token moves to, or throws the error a caller sees
   * for that rejected transition.
   */
  static apply(tokenId: TokenId, current: TokenState, transition: LockTransition): TokenState {
    if (this.isValidTransition(current, transition)) {
      return this.getNextState(current, transition);
    }

    switch (current) {
      case TokenState.BURNED:
        if (transition === LockTransition.MINT_LOCKED || transition === LockTransition.MINT_UNLOCKED) {
          throw new MintError(MintErrorCode.ALREADY_MINTED, `token ${tokenId} was already minted`, { tokenId });
        }
        throw new MintError(MintErrorCode.TOKEN_NOT_FOUND, `token ${tokenId} was burned`, { tokenId });

      case TokenState.NON_EXISTENT:
        throw new MintError(MintErrorCode.TOKEN_NOT_FOUND, `token ${tokenId} does not exist`, { tokenId });

      case TokenState.LOCKED:
        if (transition === LockTransition.TRANSFER) {
          throw new MintError(MintErrorCode.TRANSFER_BLOCKED, `token ${tokenId} is locked`, { tokenId });
        }
        throw new MintError(MintErrorCode.ALREADY_MINTED, `token ${tokenId} was already minted`, { tokenId });

      case TokenState.UNLOCKED:
        if (transition === LockTransition.UNLOCK_AND_TRANSFER) {
          throw new MintError(MintErrorCode.ALREADY_UNLOCKED, `token ${tokenId} is already unlocked`, { tokenId });
        }
        throw new MintError(MintErrorCode.ALREADY_MINTED, `token ${tokenId} was already minted`, { tokenId });
    }
  }
}
