import { expect } from 'chai';
import axios from 'axios';
import { MintApiError, MintClient } from '../src/client/mint-client';
import { generateKeyPair, KeyPair } from '../src/crypto';
import { MintNode } from '../src/node/mint-node';
import { MintAPIServer } from '../src/server/api-server';
import { TokenState, silentLogger } from '../src/types';
import { RecordingLogger, captureRejection } from './fixtures';

describe('MintAPIServer', function () {
  let adminKeys: KeyPair;
  let buyerKeys: KeyPair;
  let node: MintNode;
  let server: MintAPIServer;
  let baseUrl: string;
  let admin: MintClient;
  let buyer: MintClient;
  let serverLogger: RecordingLogger;

  beforeEach(async () => {
    adminKeys = generateKeyPair();
    buyerKeys = generateKeyPair();
    node = new MintNode({
      administrator: adminKeys.address,
      maxSupply: 50,
      minMintAmount: 100,
      paymentAssetAddress: 'test-credits',
      controllerAddress: 'mint-controller',
      logger: silentLogger
    });
    await node.initialize();

    serverLogger = new RecordingLogger();
    server = new MintAPIServer(node, { port: 0, signatureMaxSkewSeconds: 300, logger: serverLogger });
    const port = await server.start();
    baseUrl = `http://127.0.0.1:${port}`;
    admin = new MintClient(baseUrl, adminKeys);
    buyer = new MintClient(baseUrl, buyerKeys);

    await admin.creditPayment(buyerKeys.address, 1000);
    await buyer.approvePayment(1000);
  });

  afterEach(async () => {
    await server.stop();
  });

  it('reports the configuration', async () => {
    const config = await buyer.getConfig();

    expect(config.administrator).to.equal(adminKeys.address);
    expect(config.configuration).to.deep.equal({
      maxSupply: 50,
      minMintAmount: 100,
      paymentAssetAddress: 'test-credits'
    });
    expect(config.totalMinted).to.equal(0);
  });

  it('runs a paid mint, unlock and holder transfer end to end', async () => {
    const receipt = await admin.mintWithPayment({
      buyer: buyerKeys.address,
      tokenId: 7,
      recipients: ['alice', 'bob'],
      amounts: [30, 20],
      uri: 'ipfs://7',
      declaredTotal: 100
    });
    expect(receipt.token).to.deep.equal({ tokenId: 7, owner: buyerKeys.address, uri: 'ipfs://7', locked: true });

    const blocked = await captureRejection(() => buyer.transfer(7, buyerKeys.address, 'friend'));
    expect(blocked).to.be.instanceOf(MintApiError);
    expect(blocked).to.have.property('status', 400);
    expect(blocked).to.have.nested.property('failure.code', 'TRANSFER_BLOCKED');

    await admin.setLock(7, false);
    const moved = await buyer.transfer(7, buyerKeys.address, 'friend');
    expect(moved.owner).to.equal('friend');

    const view = await buyer.getToken(7);
    expect(view.state).to.equal(TokenState.UNLOCKED);

    const account = await buyer.getPaymentAccount(adminKeys.address);
    expect(account.balance).to.equal(50);
    const buyerAccount = await buyer.getPaymentAccount(buyerKeys.address);
    expect([buyerAccount.balance, buyerAccount.allowance]).to.deep.equal([900, 900]);
  });

  it('returns the distribution failure reason', async () => {
    const error = await captureRejection(() =>
      admin.mintWithPayment({
        buyer: buyerKeys.address,
        tokenId: 8,
        recipients: ['alice', 'bob'],
        amounts: [60, 50],
        uri: 'ipfs://8',
        declaredTotal: 100
      })
    );

    expect(error).to.have.property('status', 400);
    expect(error).to.have.property('failure').that.deep.equals({
      success: false,
      error: 'payment failed: commissions 110 exceed declared total 100',
      code: 'PAYMENT_FAILED',
      reason: 'AMOUNTS_EXCEED_TOTAL'
    });
  });

  it('refuses administrative calls from other signers', async () => {
    const error = await captureRejection(() => buyer.giftMint({ to: buyerKeys.address, tokenId: 1, uri: 'ipfs://1' }));

    expect(error).to.have.property('status', 403);
    expect(error).to.have.nested.property('failure.code', 'UNAUTHORIZED');
  });

  it('rejects unsigned mutations', async () => {
    const response = await axios.post(
      `${baseUrl}/api/token/gift`,
      { to: 'someone', tokenId: 1, uri: 'ipfs://1' },
      { validateStatus: () => true }
    );

    expect(response.status).to.equal(401);
    expect(response.data).to.deep.equal({
      success: false,
      error: 'missing request signature headers',
      code: 'UNAUTHORIZED'
    });
  });

  it('rejects unlocking a token that is already unlocked', async () => {
    await admin.privilegedMint({ to: 'holder', tokenId: 1, uri: 'ipfs://1' });
    await admin.setLock(1, false);

    const error = await captureRejection(() => admin.unlockAndTransfer(1, 'someone'));

    expect(error).to.have.property('status', 400);
    expect(error).to.have.nested.property('failure.code', 'ALREADY_UNLOCKED');
  });

  it('hides unexpected failures and logs them through the server logger', async () => {
    const failure = new Error('ledger offline');
    node.payments.credit = () => {
      throw failure;
    };

    const error = await captureRejection(() => admin.creditPayment(buyerKeys.address, 5));

    expect(error).to.have.property('status', 500);
    expect(error).to.have.property('failure').that.deep.equals({ success: false, error: 'internal error' });
    expect(serverLogger.errors).to.deep.equal([{ message: '[Mint API] Unexpected error', error: failure }]);
  });

  it('rejects malformed token IDs', async () => {
    const badId = await axios.get(`${baseUrl}/api/token/abc`, { validateStatus: () => true });
    expect(badId.status).to.equal(400);
    expect(badId.data).to.have.property('code', 'BAD_REQUEST');
  });

  it('burns tokens and updates configuration', async () => {
    await admin.giftMint({ to: buyerKeys.address, tokenId: 3, uri: 'ipfs://3' });
    await admin.burn(3);

    const view = await buyer.getToken(3);
    expect(view).to.deep.equal({
      tokenId: 3,
      state: TokenState.BURNED,
      minted: true,
      locked: false,
      owner: null,
      uri: null
    });

    const configuration = await admin.updateConfig({ maxSupply: 20, minMintAmount: 10 });
    expect(configuration).to.deep.equal({ maxSupply: 20, minMintAmount: 10, paymentAssetAddress: 'test-credits' });
  });

  it('hands administration to another key', async () => {
    const successor = await admin.transferAdministration(buyerKeys.address);
    expect(successor).to.equal(buyerKeys.address);

    const token = await buyer.privilegedMint({ to: buyerKeys.address, tokenId: 2, uri: 'ipfs://2' });
    expect(token.locked).to.equal(true);

    const updated = await buyer.setTokenUri(2, 'ipfs://2-final');
    expect(updated.uri).to.equal('ipfs://2-final');
  });
});
