#!/usr/bin/env node

import { Command } from 'commander';
import { loadConfig } from '../config';
import { generateKeyPair } from '../crypto';
import { adminKeysPath, loadOrCreateAdminKeys, readAdminKeys } from '../node/admin-keys';
import { MintNode } from '../node/mint-node';
import { MintAPIServer } from '../server/api-server';
import { FileStateStore } from '../store/state-store';

const program = new Command();

function parseInteger(value: string): number {
  const parsed = parseInt(value, 10);
  if (!Number.isSafeInteger(parsed) || String(parsed) !== value.trim()) {
    throw new Error(`Expected an integer, got "${value}"`);
  }
  return parsed;
}

program
  .name('mint-service')
  .description('Split-payment mint service with transfer locks')
  .version('1.0.0');

program
  .command('start')
  .description('Start the mint service')
  .option('-p, --port <port>', 'Port to listen on', parseInteger)
  .option('-d, --data-dir <dir>', 'Data directory')
  .option('--max-supply <count>', 'Highest mintable token ID', parseInteger)
  .option('--min-amount <amount>', 'Minimum accepted mint payment', parseInteger)
  .action(async (options: { port?: number; dataDir?: string; maxSupply?: number; minAmount?: number }) => {
    const config = loadConfig();
    const dataDir = options.dataDir ?? config.dataDir;
    const port = options.port ?? config.port;

    let administrator = config.administratorAddress;
    if (!administrator) {
      const { keys, created } = loadOrCreateAdminKeys(dataDir);
      if (created) {
        console.log(`🔑 Generated administrator keys: ${adminKeysPath(dataDir)}`);
        console.log('⚠️  IMPORTANT: Backup the administrator private key securely!\n');
      }
      administrator = keys.address;
    }

    const store = new FileStateStore(dataDir);
    const node = new MintNode({
      administrator,
      maxSupply: options.maxSupply ?? config.maxSupply,
      minMintAmount: options.minAmount ?? config.minMintAmount,
      paymentAssetAddress: config.paymentAssetAddress,
      controllerAddress: config.controllerAddress,
      store
    });
    await node.initialize();

    const controllerConfig = node.controller.getConfiguration();
    console.log('📋 Mint Service Configuration:');
    console.log(`   Administrator: ${node.controller.getAdministrator()}`);
    console.log(`   Max Supply: ${controllerConfig.maxSupply}`);
    console.log(`   Min Mint Amount: ${controllerConfig.minMintAmount}`);
    console.log(`   Payment Asset: ${controllerConfig.paymentAssetAddress}`);
    console.log(`   State File: ${store.location}\n`);

    const server = new MintAPIServer(node, {
      port,
      signatureMaxSkewSeconds: config.signatureMaxSkewSeconds
    });
    const boundPort = await server.start();

    console.log(`🔍 API: http://localhost:${boundPort}/api`);
    console.log('Press Ctrl+C to stop\n');

    const shutdown = (): void => {
      server
        .stop()
        .then(() => process.exit(0))
        .catch((error: unknown) => {
          console.error('Failed to stop cleanly:', error);
          process.exit(1);
        });
    };
    process.once('SIGINT', shutdown);
    process.once('SIGTERM', shutdown);
  });

program
  .command('generate-keys')
  .description('Generate a key pair for an administrator or API caller')
  .action(() => {
    const keys = generateKeyPair();

    console.log('Public Key:');
    console.log(keys.publicKey);
    console.log('\nAddress:');
    console.log(keys.address);
    console.log('\n⚠️  PRIVATE KEY (KEEP SECRET!):');
    console.log(keys.privateKey);
  });

program
  .command('info')
  .description('Show the administrator identity stored in the data directory')
  .option('-d, --data-dir <dir>', 'Data directory')
  .action((options: { dataDir?: string }) => {
    const config = loadConfig();
    const dataDir = options.dataDir ?? config.dataDir;
    const keys = readAdminKeys(dataDir);

    if (!keys) {
      console.log('❌ No administrator keys found. Run "mint-service start" first.');
      return;
    }

    console.log('Administrator Address:');
    console.log(keys.address);
    console.log('\nPublic Key:');
    console.log(keys.publicKey);
    console.log('\nData Directory:');
    console.log(dataDir);
  });

program.parseAsync().catch((error: unknown) => {
  console.error(error);
  process.exit(1);
});
