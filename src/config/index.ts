import * as dotenv from 'dotenv';
import { ConfigError } from '../core/errors';

export interface ServiceConfig {
  port: number;
  dataDir: string;
  administratorAddress?: string;
  maxSupply: number;
  minMintAmount: number;
  paymentAssetAddress: string;
  controllerAddress: string;
  signatureMaxSkewSeconds: number;
}

export type Environment = Record<string, string | undefined>;

export const DEFAULT_CONFIG: ServiceConfig = {
  port: 3000,
  dataDir: './mint-data',
  maxSupply: 10000,
  minMintAmount: 100,
  paymentAssetAddress: 'local-credits',
  controllerAddress: 'mint-controller',
  signatureMaxSkewSeconds: 300
};

function readInteger(env: Environment, name: string, fallback: number, min: number): number {
  const raw = env[name];
  if (raw === undefined || raw.trim() === '') {
    return fallback;
  }

  if (!/^\d+$/.test(raw.trim())) {
    throw new ConfigError(`${name} must be an integer, got "${raw}"`, { name, raw });
  }
  const value = parseInt(raw, 10);
  if (!Number.isSafeInteger(value) || value < min) {
    throw new ConfigError(`${name} must be at least ${min}, got ${raw}`, { name, raw });
  }
  return value;
}

function readString(env: Environment, name: string, fallback: string): string {
  const raw = env[name];
  return raw === undefined || raw.trim() === '' ? fallback : raw.trim();
}

export function parseConfig(env: Environment): ServiceConfig {
  const administratorAddress = env.MINT_ADMIN_ADDRESS?.trim();

  return {
    port: readInteger(env, 'MINT_PORT', DEFAULT_CONFIG.port, 0),
    dataDir: readString(env, 'MINT_DATA_DIR', DEFAULT_CONFIG.dataDir),
    administratorAddress: administratorAddress ? administratorAddress : undefined,
    maxSupply: readInteger(env, 'MINT_MAX_SUPPLY', DEFAULT_CONFIG.maxSupply, 1),
    minMintAmount: readInteger(env, 'MINT_MIN_AMOUNT', DEFAULT_CONFIG.minMintAmount, 0),
    paymentAssetAddress: readString(env, 'MINT_PAYMENT_ASSET', DEFAULT_CONFIG.paymentAssetAddress),
    controllerAddress: readString(env, 'MINT_CONTROLLER_ADDRESS', DEFAULT_CONFIG.controllerAddress),
    signatureMaxSkewSeconds: readInteger(
      env,
      'MINT_SIGNATURE_MAX_SKEW',
      DEFAULT_CONFIG.signatureMaxSkewSeconds,
      1
    )
  };
}

/**
 * Reads .env into process.env (existing variables win) and parses it.
 */
export function loadConfig(): ServiceConfig {
  dotenv.config();
  return parseConfig(process.env);
}
