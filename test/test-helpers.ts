import { Logger } from '@nestjs/common';
import { AuthorizationResponseFields } from '../lib/AuthorizationResponse';
import { Client, Scope, Service } from '../lib/types';

export function createScope(name: string, overrides: Partial<Scope> = {}): Scope {
  return {
    name,
    defaultEntry: false,
    description: null,
    ...overrides,
  };
}

export function createServiceRecord(overrides: Partial<Service> = {}): Service {
  return {
    number: 5041,
    serviceName: 'Test Service',
    issuer: 'https://as.example.com',
    description: null,
    ...overrides,
  };
}

export function createClient(overrides: Partial<Client> = {}): Client {
  return {
    number: 1140,
    serviceNumber: 5041,
    developer: 'test-developer',
    clientId: 57297408867,
    clientSecret: 'test-client-secret',
    clientType: 'CONFIDENTIAL',
    clientName: 'Test Client',
    description: null,
    redirectUris: ['https://client.example.com/callback'],
    ...overrides,
  };
}

/** Every field set to a non-absent value. */
export function createPopulatedFields(): AuthorizationResponseFields {
  return {
    resultCode: 'A004001',
    resultMessage: '[A004001] A ticket has been issued.',
    action: 'INTERACTION',
    service: createServiceRecord(),
    client: createClient(),
    display: 'POPUP',
    maxAge: 3600,
    scopes: [createScope('openid', { defaultEntry: true }), createScope('email')],
    uiLocales: ['fr-CA', 'en'],
    claimsLocales: ['ja'],
    claims: ['name', 'email'],
    acrEssential: true,
    acrs: ['urn:example:acr:mfa', 'urn:example:acr:pwd'],
    subject: 'alice',
    loginHint: 'alice@example.com',
    lowestPrompt: 'LOGIN',
    responseContent: 'interaction-content',
    ticket: 'test-ticket',
  };
}

export function createSilentLogger(): { logger: Logger; warn: jest.SpyInstance } {
  const logger = new Logger('test');
  const warn = jest.spyOn(logger, 'warn').mockImplementation(() => undefined);
  return { logger, warn };
}
