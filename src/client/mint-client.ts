import axios, { AxiosInstance } from 'axios';
import { signRequest } from '../auth/request-auth';
import {
  Address,
  DirectMintRequest,
  MintConfiguration,
  MintReceipt,
  PaidMintRequest,
  TokenId,
  TokenRecord,
  TokenView
} from '../types';

export interface ClientKeys {
  privateKey: string;
  publicKey: string;
}

export interface ApiFailure {
  success: false;
  error: string;
  code?: string;
  reason?: string;
  index?: number;
}

export interface ConfigResponse {
  success: true;
  administrator: Address;
  configuration: MintConfiguration;
  totalMinted: number;
  totalSupply: number;
}

export interface PaymentAccount {
  success: true;
  address: Address;
  asset: Address;
  balance: number;
  allowance: number;
}

export class MintApiError extends Error {
  status: number;
  failure: ApiFailure;

  constructor(status: number, failure: ApiFailure) {
    super(failure.error);
    this.status = status;
    this.failure = failure;
    this.name = 'MintApiError';
  }
}

function isFailure(value: unknown): value is ApiFailure {
  return (
    typeof value === 'object' &&
    value !== null &&
    'success' in value &&
    value.success === false &&
    'error' in value &&
    typeof value.error === 'string'
  );
}

/**
 * Signs and sends requests to a mint service. Every POST carries the
 * signature headers for the client's key.
 */
export class MintClient {
  private http: AxiosInstance;
  private keys: ClientKeys;

  constructor(baseUrl: string, keys: ClientKeys, timeoutMs: number = 5000) {
    this.http = axios.create({ baseURL: baseUrl, timeout: timeoutMs, validateStatus: () => true });
    this.keys = keys;
  }

  async getConfig(): Promise<ConfigResponse> {
    return this.get<ConfigResponse>('/api/config');
  }

  async getToken(tokenId: TokenId): Promise<TokenView> {
    const response = await this.get<{ token: TokenView }>(`/api/token/${tokenId}`);
    return response.token;
  }

  async getPaymentAccount(address: Address): Promise<PaymentAccount> {
    return this.get<PaymentAccount>(`/api/payment/${encodeURIComponent(address)}`);
  }

  async approvePayment(amount: number): Promise<number> {
    const response = await this.post<{ allowance: number }>('/api/payment/approve', { amount });
    return response.allowance;
  }

  async creditPayment(to: Address, amount: number): Promise<number> {
    const response = await this.post<{ balance: number }>('/api/payment/credit', { to, amount });
    return response.balance;
  }

  async mintWithPayment(request: PaidMintRequest): Promise<MintReceipt> {
    const response = await this.post<{ receipt: MintReceipt }>('/api/token/mint', request);
    return response.receipt;
  }

  async privilegedMint(request: DirectMintRequest): Promise<TokenRecord> {
    const response = await this.post<{ token: TokenRecord }>('/api/token/privileged-mint', request);
    return response.token;
  }

  async giftMint(request: DirectMintRequest): Promise<TokenRecord> {
    const response = await this.post<{ token: TokenRecord }>('/api/token/gift', request);
    return response.token;
  }

  async setLock(tokenId: TokenId, blocked: boolean): Promise<TokenRecord> {
    const response = await this.post<{ token: TokenRecord }>(`/api/token/${tokenId}/lock`, { blocked });
    return response.token;
  }

  async unlockAndTransfer(tokenId: TokenId, to: Address): Promise<TokenRecord> {
    const response = await this.post<{ token: TokenRecord }>(`/api/token/${tokenId}/unlock-transfer`, { to });
    return response.token;
  }

  async transfer(tokenId: TokenId, from: Address, to: Address): Promise<TokenRecord> {
    const response = await this.post<{ token: TokenRecord }>(`/api/token/${tokenId}/transfer`, { from, to });
    return response.token;
  }

  async burn(tokenId: TokenId): Promise<void> {
    await this.post<{ tokenId: TokenId }>(`/api/token/${tokenId}/burn`, {});
  }

  async updateConfig(update: { maxSupply?: number; minMintAmount?: number }): Promise<MintConfiguration> {
    const response = await this.post<{ configuration: MintConfiguration }>('/api/admin/config', update);
    return response.configuration;
  }

  async transferAdministration(administrator: Address): Promise<Address> {
    const response = await this.post<{ administrator: Address }>('/api/admin/administrator', { administrator });
    return response.administrator;
  }

  async setTokenUri(tokenId: TokenId, uri: string): Promise<TokenRecord> {
    const response = await this.post<{ token: TokenRecord }>('/api/admin/token-uri', { tokenId, uri });
    return response.token;
  }

  private async get<T>(url: string): Promise<T> {
    const response = await this.http.get<T | ApiFailure>(url);
    return this.unwrap<T>(response.status, response.data);
  }

  private async post<T>(url: string, body: object): Promise<T> {
    const headers = signRequest('POST', url, body, this.keys);
    const response = await this.http.post<T | ApiFailure>(url, body, { headers });
    return this.unwrap<T>(response.status, response.data);
  }

  private unwrap<T>(status: number, data: T | ApiFailure): T {
    if (isFailure(data)) {
      throw new MintApiError(status, data);
    }
    if (status >= 400) {
      throw new MintApiError(status, { success: false, error: `HTTP ${status}` });
    }
    return data;
  }
}
