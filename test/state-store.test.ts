import { expect } from 'chai';
import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import { ConfigError } from '../src/core/errors';
import { MintNode } from '../src/node/mint-node';
import { loadOrCreateAdminKeys, readAdminKeys } from '../src/node/admin-keys';
import { FileStateStore } from '../src/store/state-store';
import { silentLogger } from '../src/types';
import { ADMIN, BUYER, NOW, captureError, captureRejection } from './fixtures';

function createNode(store: FileStateStore, paymentAssetAddress: string = 'test-credits'): MintNode {
  return new MintNode({
    administrator: ADMIN,
    maxSupply: 100,
    minMintAmount: 100,
    paymentAssetAddress,
    controllerAddress: 'mint-controller',
    store,
    clock: () => NOW,
    logger: silentLogger
  });
}

describe('FileStateStore', function () {
  let dataDir: string;
  let store: FileStateStore;

  beforeEach(async () => {
    dataDir = await fs.promises.mkdtemp(path.join(os.tmpdir(), 'mint-state-'));
    store = new FileStateStore(dataDir);
  });

  afterEach(async () => {
    await fs.promises.rm(dataDir, { recursive: true, force: true });
  });

  it('returns null before the first checkpoint', async () => {
    expect(await store.load()).to.equal(null);
  });

  it('writes the checkpoint atomically and reads it back', async () => {
    const node = createNode(store);
    const checkpoint = node.checkpoint();

    await store.save(checkpoint);

    expect(await store.load()).to.deep.equal(checkpoint);
    expect(fs.existsSync(`${store.location}.tmp`)).to.equal(false);
  });

  it('rejects checkpoints from another format version', async () => {
    await fs.promises.writeFile(store.location, JSON.stringify({ version: '0.1.0' }), 'utf8');

    const error = await captureRejection(() => store.load());

    expect(error).to.be.instanceOf(ConfigError);
    expect(error).to.have.property('message', 'unsupported checkpoint version: 0.1.0');
  });

  describe('MintNode persistence', function () {
    it('restores tokens, balances and allowances after a restart', async () => {
      const node = createNode(store);
      await node.initialize();
      node.creditPayment(ADMIN, BUYER, 500);
      node.approvePayment(BUYER, 300);
      node.controller.mintWithPayment(ADMIN, {
        buyer: BUYER,
        tokenId: 9,
        recipients: ['alice'],
        amounts: [40],
        uri: 'ipfs://9',
        declaredTotal: 120
      });
      await node.flush();

      const restarted = createNode(store);
      await restarted.initialize();

      expect(restarted.controller.getToken(9)).to.include({ owner: BUYER, locked: true, minted: true });
      expect(restarted.controller.totalMinted()).to.equal(1);
      expect(restarted.payments.balanceOf(BUYER)).to.equal(380);
      expect(restarted.payments.balanceOf(ADMIN)).to.equal(80);
      expect(restarted.payments.allowance(BUYER, 'mint-controller')).to.equal(180);
    });

    it('refuses a checkpoint written for another payment asset', async () => {
      const node = createNode(store);
      node.creditPayment(ADMIN, BUYER, 10);
      await node.flush();

      const error = await captureRejection(() => createNode(store, 'other-credits').initialize());
      expect(error).to.be.instanceOf(ConfigError);
    });

    it('only lets the administrator credit payments', () => {
      const node = createNode(store);
      expect(captureError(() => node.creditPayment(BUYER, BUYER, 10))).to.have.property('code', 'UNAUTHORIZED');
    });
  });

  describe('administrator keys', function () {
    it('generates keys once and reads them back', () => {
      const first = loadOrCreateAdminKeys(dataDir);
      const second = loadOrCreateAdminKeys(dataDir);

      expect(first.created).to.equal(true);
      expect(second.created).to.equal(false);
      expect(second.keys).to.deep.equal(first.keys);
    });

    it('reports a missing key file as null', () => {
      expect(readAdminKeys(dataDir)).to.equal(null);
    });
  });
});
