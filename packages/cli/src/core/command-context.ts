/**
 * Command Context - Lazy client and service creation
 *
 * Commands ask the context for what they need; configuration is read from the
 * environment the first time something asks for it.
 */

import { getAddressSetApiConfig, type AddressSetApiConfig } from '@addrset/utils';
import { AddressSetClient, type AddressSetApi } from '@addrset/api-clients';
import { MembershipService } from '@addrset/services';

export const RETRY_INITIAL_DELAY_MS = 500;

/**
 * Options for creating a CommandContext with overrides
 * Useful for testing
 */
export interface CommandContextOptions {
  /** Retries after the first attempt for each request; 0 disables retrying */
  retries?: number;
  /** Use this configuration instead of reading the environment */
  config?: AddressSetApiConfig;
  /** Use this client instead of building one from configuration */
  clientOverride?: AddressSetApi;
}

export class CommandContext {
  private _config: AddressSetApiConfig | null = null;
  private _client: AddressSetApi | null = null;
  private _membership: MembershipService | null = null;
  private readonly _options: CommandContextOptions;

  constructor(options: CommandContextOptions = {}) {
    this._options = options;
  }

  config(): AddressSetApiConfig {
    if (!this._config) {
      this._config = this._options.config ?? getAddressSetApiConfig();
    }
    return this._config;
  }

  client(): AddressSetApi {
    if (!this._client) {
      this._client = this._options.clientOverride ?? this.createClient();
    }
    return this._client;
  }

  membership(): MembershipService {
    if (!this._membership) {
      this._membership = new MembershipService(this.client(), {
        entryDescription: this.config().entryDescription,
      });
    }
    return this._membership;
  }

  private createClient(): AddressSetClient {
    const config = this.config();
    const retries = this._options.retries ?? 0;
    return new AddressSetClient({
      baseURL: config.baseUrl,
      apiKey: config.apiKey,
      timeout: config.timeoutMs,
      retry: retries > 0 ? { maxRetries: retries, initialDelayMs: RETRY_INITIAL_DELAY_MS } : undefined,
    });
  }
}
