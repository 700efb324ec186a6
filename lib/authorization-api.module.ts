import { DynamicModule, Module } from '@nestjs/common';
import { AUTHORIZATION_API_OPTIONS } from './authorization-api.constants';
import {
  AuthorizationApiModuleAsyncOptions,
  AuthorizationApiModuleOptions,
} from './authorization-api.interfaces';
import { AuthorizationApiService } from './authorization-api.service';

@Module({})
export class AuthorizationApiModule {
  static forRoot(options: AuthorizationApiModuleOptions): DynamicModule {
    return {
      module: AuthorizationApiModule,
      providers: [
        { provide: AUTHORIZATION_API_OPTIONS, useValue: options },
        AuthorizationApiService,
      ],
      exports: [AuthorizationApiService],
      global: true,
    };
  }

  static forRootAsync(asyncOptions: AuthorizationApiModuleAsyncOptions): DynamicModule {
    return {
      module: AuthorizationApiModule,
      imports: [...(asyncOptions.imports ?? [])],
      providers: [
        {
          provide: AUTHORIZATION_API_OPTIONS,
          useFactory: asyncOptions.useFactory,
          inject: asyncOptions.inject ?? [],
        },
        AuthorizationApiService,
      ],
      exports: [AuthorizationApiService],
      global: true,
    };
  }
}
