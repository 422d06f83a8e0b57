import { Request, Response } from 'express';
import { requireCaller } from '../auth/request-auth';
import {
  AuthorizationError,
  MintError,
  MintErrorCode,
  PaymentFailedError,
  ProtocolError,
  RequestValidationError
} from '../core/errors';
import { MintNode } from '../node/mint-node';
import { Logger, TokenId } from '../types';

type Body = Record<string, unknown>;

function readBody(req: Request): Body {
  const body: unknown = req.body;
  if (typeof body !== 'object' || body === null || Array.isArray(body)) {
    throw new RequestValidationError('request body must be a JSON object');
  }
  return { ...body };
}

function readString(body: Body, field: string): string {
  const value = body[field];
  if (typeof value !== 'string') {
    throw new RequestValidationError(`${field} must be a string`, { field });
  }
  return value;
}

function readInteger(body: Body, field: string): number {
  const value = body[field];
  if (typeof value !== 'number' || !Number.isSafeInteger(value)) {
    throw new RequestValidationError(`${field} must be an integer`, { field });
  }
  return value;
}

function readOptionalInteger(body: Body, field: string): number | undefined {
  return body[field] === undefined ? undefined : readInteger(body, field);
}

function readBoolean(body: Body, field: string): boolean {
  const value = body[field];
  if (typeof value !== 'boolean') {
    throw new RequestValidationError(`${field} must be a boolean`, { field });
  }
  return value;
}

function readStringArray(body: Body, field: string): string[] {
  const value = body[field];
  if (!Array.isArray(value)) {
    throw new RequestValidationError(`${field} must be an array of strings`, { field });
  }
  return value.map((entry: unknown, index) => {
    if (typeof entry !== 'string') {
      throw new RequestValidationError(`${field}[${index}] must be a string`, { field, index });
    }
    return entry;
  });
}

function readIntegerArray(body: Body, field: string): number[] {
  const value = body[field];
  if (!Array.isArray(value)) {
    throw new RequestValidationError(`${field} must be an array of integers`, { field });
  }
  return value.map((entry: unknown, index) => {
    if (typeof entry !== 'number' || !Number.isSafeInteger(entry)) {
      throw new RequestValidationError(`${field}[${index}] must be an integer`, { field, index });
    }
    return entry;
  });
}

function readTokenId(req: Request): TokenId {
  const raw = req.params.tokenId;
  if (!/^\d+$/.test(raw)) {
    throw new RequestValidationError('tokenId must be a positive integer', { tokenId: raw });
  }
  return parseInt(raw, 10);
}

export function statusForError(error: unknown): number {
  if (error instanceof AuthorizationError) {
    return 403;
  }
  if (error instanceof MintError) {
    if (error.code === MintErrorCode.TOKEN_NOT_FOUND) return 404;
    if (error.code === MintErrorCode.REENTRANT) return 409;
    return 400;
  }
  if (error instanceof ProtocolError) {
    return 400;
  }
  return 500;
}

function sendError(res: Response, error: unknown, logger: Logger): void {
  const status = statusForError(error);
  if (error instanceof PaymentFailedError) {
    res.status(status).json({
      success: false,
      error: error.message,
      code: error.code,
      reason: error.reason.code,
      index: error.reason.index
    });
    return;
  }
  if (error instanceof ProtocolError) {
    res.status(status).json({ success: false, error: error.message, code: error.code });
    return;
  }

  logger.error('[Mint API] Unexpected error', error);
  res.status(status).json({ success: false, error: 'internal error' });
}

/**
 * HTTP handlers over a MintNode. Mutating handlers expect the request
 * authenticator to have attached the signed caller.
 */
export class TokenAPI {
  private node: MintNode;
  private logger: Logger;

  constructor(node: MintNode, logger: Logger = console) {
    this.node = node;
    this.logger = logger;
  }

  /**
   * GET /api/config
   */
  getConfig(req: Request, res: Response): void {
    const controller = this.node.controller;
    res.json({
      success: true,
      administrator: controller.getAdministrator(),
      configuration: controller.getConfiguration(),
      totalMinted: controller.totalMinted(),
      totalSupply: controller.totalSupply()
    });
  }

  /**
   * GET /api/token/:tokenId
   */
  getToken(req: Request, res: Response): void {
    try {
      const token = this.node.controller.getToken(readTokenId(req));
      res.json({ success: true, token });
    } catch (error) {
      sendError(res, error, this.logger);
    }
  }

  /**
   * GET /api/owner/:address/tokens
   */
  getOwnerTokens(req: Request, res: Response): void {
    const tokens = this.node.controller.tokensOfOwner(req.params.address);
    res.json({ success: true, owner: req.params.address, tokens });
  }

  /**
   * GET /api/payment/:address
   */
  getPaymentAccount(req: Request, res: Response): void {
    const address = req.params.address;
    res.json({
      success: true,
      address,
      asset: this.node.payments.assetAddress,
      balance: this.node.payments.balanceOf(address),
      allowance: this.node.payments.allowance(address, this.node.controllerAddress)
    });
  }

  /**
   * POST /api/token/mint
   */
  mintWithPayment(req: Request, res: Response): void {
    try {
      const body = readBody(req);
      const receipt = this.node.controller.mintWithPayment(requireCaller(req), {
        buyer: readString(body, 'buyer'),
        tokenId: readInteger(body, 'tokenId'),
        recipients: readStringArray(body, 'recipients'),
        amounts: readIntegerArray(body, 'amounts'),
        uri: readString(body, 'uri'),
        declaredTotal: readInteger(body, 'declaredTotal')
      });
      res.json({ success: true, receipt });
    } catch (error) {
      sendError(res, error, this.logger);
    }
  }

  /**
   * POST /api/token/privileged-mint
   */
  privilegedMint(req: Request, res: Response): void {
    try {
      const body = readBody(req);
      const token = this.node.controller.privilegedMint(requireCaller(req), {
        to: readString(body, 'to'),
        tokenId: readInteger(body, 'tokenId'),
        uri: readString(body, 'uri')
      });
      res.json({ success: true, token });
    } catch (error) {
      sendError(res, error, this.logger);
    }
  }

  /**
   * POST /api/token/gift
   */
  giftMint(req: Request, res: Response): void {
    try {
      const body = readBody(req);
      const token = this.node.controller.giftMint(requireCaller(req), {
        to: readString(body, 'to'),
        tokenId: readInteger(body, 'tokenId'),
        uri: readString(body, 'uri')
      });
      res.json({ success: true, token });
    } catch (error) {
      sendError(res, error, this.logger);
    }
  }

  /**
   * POST /api/token/:tokenId/lock
   */
  setLock(req: Request, res: Response): void {
    try {
      const body = readBody(req);
      const token = this.node.controller.setLock(requireCaller(req), readTokenId(req), readBoolean(body, 'blocked'));
      res.json({ success: true, token });
    } catch (error) {
      sendError(res, error, this.logger);
    }
  }

  /**
   * POST /api/token/:tokenId/unlock-transfer
   */
  unlockAndTransfer(req: Request, res: Response): void {
    try {
      const body = readBody(req);
      const token = this.node.controller.unlockAndTransfer(requireCaller(req), readTokenId(req), readString(body, 'to'));
      res.json({ success: true, token });
    } catch (error) {
      sendError(res, error, this.logger);
    }
  }

  /**
   * POST /api/token/:tokenId/transfer
   */
  transfer(req: Request, res: Response): void {
    try {
      const body = readBody(req);
      const token = this.node.controller.transfer(
        requireCaller(req),
        readString(body, 'from'),
        readString(body, 'to'),
        readTokenId(req)
      );
      res.json({ success: true, token });
    } catch (error) {
      sendError(res, error, this.logger);
    }
  }

  /**
   * POST /api/token/:tokenId/burn
   */
  burn(req: Request, res: Response): void {
    try {
      const tokenId = readTokenId(req);
      this.node.controller.burn(requireCaller(req), tokenId);
      res.json({ success: true, tokenId });
    } catch (error) {
      sendError(res, error, this.logger);
    }
  }

  /**
   * POST /api/admin/config
   * Either field may be omitted; both are applied in order.
   */
  updateConfig(req: Request, res: Response): void {
    try {
      const body = readBody(req);
      const caller = requireCaller(req);
      const maxSupply = readOptionalInteger(body, 'maxSupply');
      const minMintAmount = readOptionalInteger(body, 'minMintAmount');
      if (maxSupply === undefined && minMintAmount === undefined) {
        throw new RequestValidationError('maxSupply or minMintAmount is required');
      }

      if (maxSupply !== undefined) {
        this.node.controller.setMaxSupply(caller, maxSupply);
      }
      if (minMintAmount !== undefined) {
        this.node.controller.setMinMintAmount(caller, minMintAmount);
      }
      res.json({ success: true, configuration: this.node.controller.getConfiguration() });
    } catch (error) {
      sendError(res, error, this.logger);
    }
  }

  /**
   * POST /api/admin/administrator
   */
  transferAdministration(req: Request, res: Response): void {
    try {
      const body = readBody(req);
      const administrator = this.node.controller.transferAdministration(
        requireCaller(req),
        readString(body, 'administrator')
      );
      res.json({ success: true, administrator });
    } catch (error) {
      sendError(res, error, this.logger);
    }
  }

  /**
   * POST /api/admin/token-uri
   */
  setTokenUri(req: Request, res: Response): void {
    try {
      const body = readBody(req);
      const token = this.node.controller.setTokenUri(
        requireCaller(req),
        readInteger(body, 'tokenId'),
        readString(body, 'uri')
      );
      res.json({ success: true, token });
    } catch (error) {
      sendError(res, error, this.logger);
    }
  }

  /**
   * POST /api/payment/approve
   * The signer approves the controller to draw up to `amount`.
   */
  approvePayment(req: Request, res: Response): void {
    try {
      const body = readBody(req);
      const owner = requireCaller(req);
      const allowance = this.node.approvePayment(owner, readInteger(body, 'amount'));
      res.json({ success: true, owner, allowance });
    } catch (error) {
      sendError(res, error, this.logger);
    }
  }

  /**
   * POST /api/payment/credit
   */
  creditPayment(req: Request, res: Response): void {
    try {
      const body = readBody(req);
      const to = readString(body, 'to');
      const balance = this.node.creditPayment(requireCaller(req), to, readInteger(body, 'amount'));
      res.json({ success: true, address: to, balance });
    } catch (error) {
      sendError(res, error, this.logger);
    }
  }
}
