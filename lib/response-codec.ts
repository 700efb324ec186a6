import { Logger } from '@nestjs/common';
import { AuthorizationResponse } from './AuthorizationResponse';
import {
  ACTIONS,
  CLIENT_TYPES,
  Client,
  DISPLAYS,
  PROMPTS,
  Scope,
  Service,
} from './types';

type JsonObject = Record<string, unknown>;

function isJsonObject(value: unknown): value is JsonObject {
  return value != null && typeof value === 'object' && !Array.isArray(value);
}

function typeName(value: unknown): string {
  return Array.isArray(value) ? 'array' : typeof value;
}

/**
 * Reads typed fields out of one JSON object. A field of the wrong type is
 * reported and read as absent; values are never converted between types.
 */
class FieldReader {
  constructor(
    private readonly obj: JsonObject,
    private readonly path: string,
    private readonly logger?: Logger,
  ) {}

  private present(key: string): unknown {
    const value = this.obj[key];
    return value === null ? undefined : value;
  }

  private ignore(key: string, expected: string, value: unknown): void {
    this.logger?.warn(
      `Ignoring ${this.path}${key}: expected ${expected}, got ${JSON.stringify(value)}`,
    );
  }

  string(key: string): string | null {
    const value = this.present(key);
    if (value === undefined) return null;
    if (typeof value === 'string') return value;
    this.ignore(key, 'string', value);
    return null;
  }

  number(key: string): number {
    const value = this.present(key);
    if (value === undefined) return 0;
    if (typeof value === 'number' && Number.isFinite(value)) return value;
    this.ignore(key, 'number', value);
    return 0;
  }

  boolean(key: string): boolean {
    const value = this.present(key);
    if (value === undefined) return false;
    if (typeof value === 'boolean') return value;
    this.ignore(key, 'boolean', value);
    return false;
  }

  oneOf<T extends string>(key: string, allowed: readonly T[]): T | null {
    const value = this.present(key);
    if (value === undefined) return null;
    const match = allowed.find((candidate) => candidate === value);
    if (match !== undefined) return match;
    this.ignore(key, `one of ${allowed.join('|')}`, value);
    return null;
  }

  strings(key: string): string[] | null {
    const value = this.present(key);
    if (value === undefined) return null;
    if (Array.isArray(value) && value.every((item): item is string => typeof item === 'string')) {
      return [...value];
    }
    this.ignore(key, 'array of strings', value);
    return null;
  }

  object<T>(key: string, parse: (reader: FieldReader) => T): T | null {
    const value = this.present(key);
    if (value === undefined) return null;
    if (isJsonObject(value)) return parse(this.nested(value, key));
    this.ignore(key, 'object', value);
    return null;
  }

  objects<T>(key: string, parse: (reader: FieldReader) => T): T[] | null {
    const value = this.present(key);
    if (value === undefined) return null;
    if (!Array.isArray(value)) {
      this.ignore(key, 'array', value);
      return null;
    }
    const result: T[] = [];
    value.forEach((item, index) => {
      if (isJsonObject(item)) {
        result.push(parse(this.nested(item, `${key}[${index}]`)));
      } else {
        this.ignore(`${key}[${index}]`, 'object', item);
      }
    });
    return result;
  }

  private nested(obj: JsonObject, key: string): FieldReader {
    return new FieldReader(obj, `${this.path}${key}.`, this.logger);
  }
}

function readScope(reader: FieldReader): Scope {
  return {
    name: reader.string('name'),
    defaultEntry: reader.boolean('defaultEntry'),
    description: reader.string('description'),
  };
}

function readService(reader: FieldReader): Service {
  return {
    number: reader.number('number'),
    serviceName: reader.string('serviceName'),
    issuer: reader.string('issuer'),
    description: reader.string('description'),
  };
}

function readClient(reader: FieldReader): Client {
  return {
    number: reader.number('number'),
    serviceNumber: reader.number('serviceNumber'),
    developer: reader.string('developer'),
    clientId: reader.number('clientId'),
    clientSecret: reader.string('clientSecret'),
    clientType: reader.oneOf('clientType', CLIENT_TYPES),
    clientName: reader.string('clientName'),
    description: reader.string('description'),
    redirectUris: reader.strings('redirectUris'),
  };
}

/**
 * Map the JSON body of an `/auth/authorization` response onto an
 * {@link AuthorizationResponse}. Unknown keys are dropped.
 */
export function parseAuthorizationResponse(raw: unknown, logger?: Logger): AuthorizationResponse {
  if (!isJsonObject(raw)) {
    logger?.warn(`Authorization response is not an object (${typeName(raw)}), treating all fields as absent`);
    return new AuthorizationResponse();
  }
  const reader = new FieldReader(raw, '', logger);
  return new AuthorizationResponse({
    resultCode: reader.string('resultCode'),
    resultMessage: reader.string('resultMessage'),
    action: reader.oneOf('action', ACTIONS),
    service: reader.object('service', readService),
    client: reader.object('client', readClient),
    display: reader.oneOf('display', DISPLAYS),
    maxAge: reader.number('maxAge'),
    scopes: reader.objects('scopes', readScope),
    uiLocales: reader.strings('uiLocales'),
    claimsLocales: reader.strings('claimsLocales'),
    claims: reader.strings('claims'),
    acrEssential: reader.boolean('acrEssential'),
    acrs: reader.strings('acrs'),
    subject: reader.string('subject'),
    loginHint: reader.string('loginHint'),
    lowestPrompt: reader.oneOf('lowestPrompt', PROMPTS),
    responseContent: reader.string('responseContent'),
    ticket: reader.string('ticket'),
  });
}
