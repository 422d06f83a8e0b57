import {
  MintNode,
  MintAPIServer,
  MintClient,
  MintApiError,
  generateKeyPair,
  NotificationType,
  Notification
} from '../src';

async function runDemo() {
  console.log('=== Split-Payment Mint Service - Demo ===\n');

  console.log('Step 1: Starting an in-memory mint service...');
  const adminKeys = generateKeyPair();
  const buyerKeys = generateKeyPair();

  const node = new MintNode({
    administrator: adminKeys.address,
    maxSupply: 100,
    minMintAmount: 100,
    paymentAssetAddress: 'demo-credits',
    controllerAddress: 'mint-controller'
  });
  await node.initialize();

  node.controller.on(NotificationType.MINTED, (notification: Notification) => {
    console.log(`   📣 ${notification.type} (${notification.notificationId.substring(0, 12)}...)`);
  });

  const server = new MintAPIServer(node, { port: 0, signatureMaxSkewSeconds: 300 });
  const port = await server.start();
  const admin = new MintClient(`http://localhost:${port}`, adminKeys);
  const buyer = new MintClient(`http://localhost:${port}`, buyerKeys);
  console.log(`✓ Administrator: ${adminKeys.address}`);
  console.log(`✓ Buyer: ${buyerKeys.address}\n`);

  console.log('Step 2: Funding the buyer...');
  await admin.creditPayment(buyerKeys.address, 1000);
  await buyer.approvePayment(1000);
  console.log('✓ Buyer holds 1000 credits and approved the controller\n');

  console.log('Step 3: Paid mint of token 7 (commissions 30 + 20 of 100)...');
  const receipt = await admin.mintWithPayment({
    buyer: buyerKeys.address,
    tokenId: 7,
    recipients: ['gallery', 'artist'],
    amounts: [30, 20],
    uri: 'ipfs://demo/7',
    declaredTotal: 100
  });
  for (const payout of receipt.distribution.payouts) {
    console.log(`   ${payout.recipient}: +${payout.amount}`);
  }
  console.log(`   administrator (residual): +${receipt.distribution.residual}`);
  console.log(`✓ Token 7 owned by buyer, locked: ${receipt.token.locked}\n`);

  console.log('Step 4: Buyer tries to transfer while locked...');
  try {
    await buyer.transfer(7, buyerKeys.address, 'friend');
  } catch (error) {
    if (!(error instanceof MintApiError)) throw error;
    console.log(`✓ Refused: ${error.failure.code}\n`);
  }

  console.log('Step 5: Administrator clears the lock...');
  await admin.setLock(7, false);
  const moved = await buyer.transfer(7, buyerKeys.address, 'friend');
  console.log(`✓ Token 7 now owned by ${moved.owner}\n`);

  console.log('Step 6: Re-minting token 7 is refused...');
  try {
    await admin.giftMint({ to: 'friend', tokenId: 7, uri: 'ipfs://demo/7b' });
  } catch (error) {
    if (!(error instanceof MintApiError)) throw error;
    console.log(`✓ Refused: ${error.failure.code}\n`);
  }

  const config = await admin.getConfig();
  console.log('=== Summary ===');
  console.log(`Minted: ${config.totalMinted}, live supply: ${config.totalSupply}`);

  await server.stop();
}

runDemo().catch((error: unknown) => {
  console.error('Demo failed:', error);
  process.exit(1);
});
