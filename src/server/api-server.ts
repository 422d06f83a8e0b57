import express, { NextFunction, Request, Response } from 'express';
import { Server } from 'http';
import { RequestAuthenticator } from '../auth/request-auth';
import { RequestValidationError } from '../core/errors';
import { MintNode } from '../node/mint-node';
import { TokenAPI } from '../token/token-api';
import { Logger } from '../types';

export interface MintAPIServerOptions {
  port: number;
  signatureMaxSkewSeconds: number;
  clock?: () => number;
  logger?: Logger;
}

export class MintAPIServer {
  private app: express.Application;
  private node: MintNode;
  private tokenApi: TokenAPI;
  private authenticator: RequestAuthenticator;
  private port: number;
  private logger: Logger;
  private server?: Server;

  constructor(node: MintNode, options: MintAPIServerOptions) {
    this.app = express();
    this.node = node;
    this.logger = options.logger ?? console;
    this.tokenApi = new TokenAPI(node, this.logger);
    this.authenticator = new RequestAuthenticator({
      maxSkewSeconds: options.signatureMaxSkewSeconds,
      clock: options.clock
    });
    this.port = options.port;
    this.setupMiddleware();
    this.setupRoutes();
  }

  get application(): express.Application {
    return this.app;
  }

  private setupMiddleware(): void {
    this.app.use(express.json());

    this.app.use((req, res, next) => {
      res.header('Access-Control-Allow-Origin', '*');
      res.header('Access-Control-Allow-Methods', 'GET, POST, OPTIONS');
      res.header('Access-Control-Allow-Headers', 'Content-Type, x-signer-pubkey, x-signature, x-timestamp');

      if (req.method === 'OPTIONS') {
        res.sendStatus(200);
      } else {
        next();
      }
    });
  }

  private setupRoutes(): void {
    const api = this.tokenApi;
    const signed = this.authenticator.middleware();

    this.app.get('/health', (req: Request, res: Response) => {
      res.json({ status: 'healthy', administrator: this.node.controller.getAdministrator() });
    });

    this.app.get('/api/config', (req: Request, res: Response) => api.getConfig(req, res));
    this.app.get('/api/token/:tokenId', (req: Request, res: Response) => api.getToken(req, res));
    this.app.get('/api/owner/:address/tokens', (req: Request, res: Response) => api.getOwnerTokens(req, res));
    this.app.get('/api/payment/:address', (req: Request, res: Response) => api.getPaymentAccount(req, res));

    this.app.post('/api/token/mint', signed, (req: Request, res: Response) => api.mintWithPayment(req, res));
    this.app.post('/api/token/privileged-mint', signed, (req: Request, res: Response) => api.privilegedMint(req, res));
    this.app.post('/api/token/gift', signed, (req: Request, res: Response) => api.giftMint(req, res));
    this.app.post('/api/token/:tokenId/lock', signed, (req: Request, res: Response) => api.setLock(req, res));
    this.app.post('/api/token/:tokenId/unlock-transfer', signed, (req: Request, res: Response) =>
      api.unlockAndTransfer(req, res)
    );
    this.app.post('/api/token/:tokenId/transfer', signed, (req: Request, res: Response) => api.transfer(req, res));
    this.app.post('/api/token/:tokenId/burn', signed, (req: Request, res: Response) => api.burn(req, res));

    this.app.post('/api/admin/config', signed, (req: Request, res: Response) => api.updateConfig(req, res));
    this.app.post('/api/admin/administrator', signed, (req: Request, res: Response) =>
      api.transferAdministration(req, res)
    );
    this.app.post('/api/admin/token-uri', signed, (req: Request, res: Response) => api.setTokenUri(req, res));

    this.app.post('/api/payment/approve', signed, (req: Request, res: Response) => api.approvePayment(req, res));
    this.app.post('/api/payment/credit', signed, (req: Request, res: Response) => api.creditPayment(req, res));

    // Malformed JSON bodies surface here from express.json().
    this.app.use((error: unknown, req: Request, res: Response, next: NextFunction) => {
      if (res.headersSent) {
        next(error);
        return;
      }
      const invalid = new RequestValidationError('malformed request body');
      res.status(400).json({ success: false, error: invalid.message, code: invalid.code });
    });
  }

  async start(): Promise<number> {
    return new Promise((resolve, reject) => {
      const server = this.app.listen(this.port, () => {
        const address = server.address();
        const port = typeof address === 'object' && address !== null ? address.port : this.port;
        this.logger.log(`[Mint API] Server listening on port ${port}`);
        resolve(port);
      });
      server.on('error', reject);
      this.server = server;
    });
  }

  async stop(): Promise<void> {
    const server = this.server;
    if (!server) {
      return;
    }

    await new Promise<void>((resolve, reject) => {
      server.close((error) => (error ? reject(error) : resolve()));
      server.closeIdleConnections();
    });
    this.server = undefined;
    await this.node.flush();
    this.logger.log('[Mint API] Server stopped');
  }
}
