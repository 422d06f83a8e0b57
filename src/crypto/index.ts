import * as crypto from 'crypto';
import * as ecc from 'tiny-secp256k1';
import { ECPairFactory } from 'ecpair';
import * as bitcoin from 'bitcoinjs-lib';

const ECPair = ECPairFactory(ecc);

export interface KeyPair {
  privateKey: string;
  publicKey: string;
  address: string;
}

export function sha256(data: string | Buffer): string {
  const buffer = typeof data === 'string' ? Buffer.from(data, 'utf8') : data;
  return crypto.createHash('sha256').update(buffer).digest('hex');
}

export function generateKeyPair(): KeyPair {
  const keyPair = ECPair.makeRandom();
  if (!keyPair.privateKey) {
    throw new Error('Generated key pair has no private key');
  }

  const publicKey = keyPair.publicKey.toString('hex');
  return {
    privateKey: keyPair.privateKey.toString('hex'),
    publicKey,
    address: publicKeyToAddress(publicKey)
  };
}

export function keyPairFromPrivateKey(privateKeyHex: string): KeyPair {
  const keyPair = ECPair.fromPrivateKey(Buffer.from(privateKeyHex, 'hex'));
  const publicKey = keyPair.publicKey.toString('hex');
  return {
    privateKey: privateKeyHex,
    publicKey,
    address: publicKeyToAddress(publicKey)
  };
}

export function signMessage(message: string, privateKeyHex: string): string {
  const messageHash = Buffer.from(sha256(message), 'hex');
  const privateKey = Buffer.from(privateKeyHex, 'hex');

  const signature = ecc.sign(messageHash, privateKey);
  return Buffer.from(signature).toString('hex');
}

export function verifySignature(message: string, signature: string, publicKeyHex: string): boolean {
  try {
    const messageHash = Buffer.from(sha256(message), 'hex');
    const publicKey = Buffer.from(publicKeyHex, 'hex');
    const signatureBuffer = Buffer.from(signature, 'hex');

    return ecc.verify(messageHash, publicKey, signatureBuffer);
  } catch (error) {
    return false;
  }
}

export function publicKeyToAddress(publicKeyHex: string): string {
  const { address } = bitcoin.payments.p2pkh({
    pubkey: Buffer.from(publicKeyHex, 'hex'),
    network: bitcoin.networks.bitcoin
  });
  if (!address) {
    throw new Error('Unable to derive address from public key');
  }
  return address;
}

export function isValidPublicKey(publicKeyHex: string): boolean {
  if (!/^[0-9a-fA-F]+$/.test(publicKeyHex)) {
    return false;
  }
  return ecc.isPoint(Buffer.from(publicKeyHex, 'hex'));
}
