import 'reflect-metadata';

// Module
export { AuthorizationApiModule } from './authorization-api.module';
export { AUTHORIZATION_API_OPTIONS } from './authorization-api.constants';
export {
  AuthorizationApiModuleOptions,
  AuthorizationApiModuleAsyncOptions,
} from './authorization-api.interfaces';

// API client
export { AuthorizationApiService } from './authorization-api.service';

// Response model
export {
  AuthorizationResponse,
  AuthorizationResponseFields,
  AuthorizationResponseInit,
  AuthorizationResponseJson,
} from './AuthorizationResponse';
export { parseAuthorizationResponse } from './response-codec';
export { ABSENT, listScopeNames, joinStrings } from './summary-utils';

// Types
export {
  Action,
  Display,
  Prompt,
  ClientType,
  ApiResponse,
  Scope,
  Service,
  Client,
  AuthorizationRequest,
} from './types';
