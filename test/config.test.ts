import { expect } from 'chai';
import { DEFAULT_CONFIG, parseConfig } from '../src/config';
import { ConfigError } from '../src/core/errors';
import { captureError } from './fixtures';

describe('parseConfig', function () {
  it('falls back to defaults for missing or blank variables', () => {
    expect(parseConfig({ MINT_PORT: '', MINT_ADMIN_ADDRESS: '  ' })).to.deep.equal({
      ...DEFAULT_CONFIG,
      administratorAddress: undefined
    });
  });

  it('reads every variable', () => {
    const config = parseConfig({
      MINT_PORT: '8080',
      MINT_DATA_DIR: '/var/lib/mint',
      MINT_ADMIN_ADDRESS: ' admin-address ',
      MINT_MAX_SUPPLY: '500',
      MINT_MIN_AMOUNT: '0',
      MINT_PAYMENT_ASSET: 'usd-credits',
      MINT_CONTROLLER_ADDRESS: 'controller-1',
      MINT_SIGNATURE_MAX_SKEW: '60'
    });

    expect(config).to.deep.equal({
      port: 8080,
      dataDir: '/var/lib/mint',
      administratorAddress: 'admin-address',
      maxSupply: 500,
      minMintAmount: 0,
      paymentAssetAddress: 'usd-credits',
      controllerAddress: 'controller-1',
      signatureMaxSkewSeconds: 60
    });
  });

  it('rejects non-integer values', () => {
    const error = captureError(() => parseConfig({ MINT_MIN_AMOUNT: '12.5' }));

    expect(error).to.be.instanceOf(ConfigError);
    expect(error).to.have.property('message', 'MINT_MIN_AMOUNT must be an integer, got "12.5"');
  });

  it('rejects a max supply below one', () => {
    const error = captureError(() => parseConfig({ MINT_MAX_SUPPLY: '0' }));
    expect(error).to.have.property('message', 'MINT_MAX_SUPPLY must be at least 1, got 0');
  });
});
