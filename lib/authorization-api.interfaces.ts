import { FactoryProvider, ModuleMetadata } from '@nestjs/common';

export interface AuthorizationApiModuleOptions {
  /** Base URL of the authorization API server (e.g., 'https://api.example.com') */
  baseUrl: string;
  /** Service API key for HTTP Basic Auth. Must be used together with `apiSecret`. Mutually exclusive with `token`. */
  apiKey?: string;
  /** Service API secret for HTTP Basic Auth. Must be used together with `apiKey`. Mutually exclusive with `token`. */
  apiSecret?: string;
  /** Bearer access token for the API. Mutually exclusive with `apiKey`/`apiSecret`. */
  token?: string;
  /** Timeout in milliseconds for API requests (default: 5000) */
  timeout?: number;
  /** Set to true to allow unencrypted HTTP connections to the API. NOT RECOMMENDED for production. */
  allowInsecureConnections?: boolean;
}

export interface AuthorizationApiModuleAsyncOptions
  extends Pick<ModuleMetadata, 'imports'> {
  useFactory: (
    ...args: any[]
  ) => Promise<AuthorizationApiModuleOptions> | AuthorizationApiModuleOptions;
  inject?: FactoryProvider['inject'];
}
