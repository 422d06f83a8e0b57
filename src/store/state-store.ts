import * as fs from 'fs';
import * as path from 'path';
import { ControllerSnapshot } from '../token/mint-controller';
import { TokenStoreSnapshot } from '../ledger/token-store';
import { PaymentLedgerSnapshot } from '../ledger/payment-ledger';
import { ConfigError } from '../core/errors';

export const CHECKPOINT_VERSION = '1.0.0';

export interface MintCheckpoint {
  version: string;
  savedAt: number;
  controller: ControllerSnapshot;
  tokens: TokenStoreSnapshot;
  payments: PaymentLedgerSnapshot;
}

export interface StateStore {
  load(): Promise<MintCheckpoint | null>;
  save(checkpoint: MintCheckpoint): Promise<void>;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

export function assertValidCheckpoint(value: unknown): asserts value is MintCheckpoint {
  if (!isRecord(value)) {
    throw new ConfigError('checkpoint must be an object');
  }
  if (value.version !== CHECKPOINT_VERSION) {
    throw new ConfigError(`unsupported checkpoint version: ${String(value.version)}`);
  }
  if (typeof value.savedAt !== 'number') {
    throw new ConfigError('checkpoint savedAt is required');
  }

  const controller = value.controller;
  if (
    !isRecord(controller) ||
    typeof controller.administrator !== 'string' ||
    !isRecord(controller.configuration) ||
    !Array.isArray(controller.minted) ||
    !Array.isArray(controller.locks) ||
    typeof controller.mintCount !== 'number'
  ) {
    throw new ConfigError('checkpoint controller state is malformed');
  }
  if (!isRecord(value.tokens) || !Array.isArray(value.tokens.tokens)) {
    throw new ConfigError('checkpoint token state is malformed');
  }
  if (
    !isRecord(value.payments) ||
    !Array.isArray(value.payments.balances) ||
    !Array.isArray(value.payments.allowances)
  ) {
    throw new ConfigError('checkpoint payment state is malformed');
  }
}

/**
 * Single JSON checkpoint in the data directory. Writes go to a temporary
 * file first and are renamed over the previous checkpoint.
 */
export class FileStateStore implements StateStore {
  private filePath: string;

  constructor(dataDir: string, fileName: string = 'mint-state.json') {
    this.filePath = path.join(dataDir, fileName);
  }

  get location(): string {
    return this.filePath;
  }

  async load(): Promise<MintCheckpoint | null> {
    let raw: string;
    try {
      raw = await fs.promises.readFile(this.filePath, 'utf8');
    } catch (error) {
      if (error && typeof error === 'object' && 'code' in error && error.code === 'ENOENT') {
        return null;
      }
      throw error;
    }

    const parsed: unknown = JSON.parse(raw);
    assertValidCheckpoint(parsed);
    return parsed;
  }

  async save(checkpoint: MintCheckpoint): Promise<void> {
    assertValidCheckpoint(checkpoint);
    await fs.promises.mkdir(path.dirname(this.filePath), { recursive: true });

    const tempPath = `${this.filePath}.tmp`;
    await fs.promises.writeFile(tempPath, JSON.stringify(checkpoint, null, 2), 'utf8');
    await fs.promises.rename(tempPath, this.filePath);
  }
}
