export type Address = string;
export type TokenId = number;

export enum TokenState {
  NON_EXISTENT = "NON_EXISTENT",
  LOCKED = "LOCKED",
  UNLOCKED = "UNLOCKED",
  BURNED = "BURNED"
}

export enum MintKind {
  PAYMENT = "PAYMENT",
  PRIVILEGED = "PRIVILEGED",
  GIFT = "GIFT"
}

export interface MintConfiguration {
  maxSupply: number;
  minMintAmount: number;
  paymentAssetAddress: Address;
}

export interface TokenRecord {
  tokenId: TokenId;
  owner: Address;
  uri: string;
  locked: boolean;
}

export interface TokenView {
  tokenId: TokenId;
  state: TokenState;
  minted: boolean;
  locked: boolean;
  owner: Address | null;
  uri: string | null;
}

export interface PaidMintRequest {
  buyer: Address;
  tokenId: TokenId;
  recipients: Address[];
  amounts: number[];
  uri: string;
  declaredTotal: number;
}

export interface DirectMintRequest {
  to: Address;
  tokenId: TokenId;
  uri: string;
}

export interface Payout {
  recipient: Address;
  amount: number;
}

export interface DistributionReceipt {
  payer: Address;
  payouts: Payout[];
  residualBeneficiary: Address;
  residual: number;
  total: number;
}

export interface MintReceipt {
  token: TokenRecord;
  distribution: DistributionReceipt;
  mintCount: number;
  timestamp: number;
}

export enum NotificationType {
  MINTED = "minted",
  LOCK_CHANGED = "lockChanged",
  UNLOCKED = "unlocked",
  TRANSFERRED = "transferred",
  BURNED = "burned",
  CONFIGURATION_CHANGED = "configurationChanged",
  ADMINISTRATOR_CHANGED = "administratorChanged"
}

export interface BaseNotification {
  notificationId: string;
  type: NotificationType;
  timestamp: number;
}

export interface MintedNotification extends BaseNotification {
  type: NotificationType.MINTED;
  kind: MintKind;
  to: Address;
  tokenId: TokenId;
  amount: number;
}

export interface LockChangedNotification extends BaseNotification {
  type: NotificationType.LOCK_CHANGED;
  tokenId: TokenId;
  locked: boolean;
}

export interface UnlockedNotification extends BaseNotification {
  type: NotificationType.UNLOCKED;
  tokenId: TokenId;
  from: Address;
  to: Address;
}

export interface TransferredNotification extends BaseNotification {
  type: NotificationType.TRANSFERRED;
  tokenId: TokenId;
  from: Address;
  to: Address;
}

export interface BurnedNotification extends BaseNotification {
  type: NotificationType.BURNED;
  tokenId: TokenId;
  owner: Address;
}

export interface ConfigurationChangedNotification extends BaseNotification {
  type: NotificationType.CONFIGURATION_CHANGED;
  configuration: MintConfiguration;
}

export interface AdministratorChangedNotification extends BaseNotification {
  type: NotificationType.ADMINISTRATOR_CHANGED;
  previous: Address;
  current: Address;
}

export type Notification =
  | MintedNotification
  | LockChangedNotification
  | UnlockedNotification
  | TransferredNotification
  | BurnedNotification
  | ConfigurationChangedNotification
  | AdministratorChangedNotification;

export type NotificationDraft = Notification extends infer N
  ? N extends Notification
    ? Omit<N, 'notificationId'>
    : never
  : never;

export interface Logger {
  log(message: string): void;
  warn(message: string): void;
  error(message: string, error?: unknown): void;
}

export const silentLogger: Logger = {
  log: () => undefined,
  warn: () => undefined,
  error: () => undefined
};
