import {DynamicModule, Module} from '@nestjs/common'
import type {StructuredLogger} from '@hostplane/logging'
import type {ProvisioningStore} from '@hostplane/provisioning'

import type {ServiceConfig} from '../config'
import {HostplaneApiControllerContext} from './controllerContext'
import {CertificatesController} from './controllers/certificatesController'
import {ContentHostingController} from './controllers/contentHostingController'
import {FallbackController} from './controllers/fallbackController'
import {HealthController} from './controllers/healthController'
import {RedirectsController} from './controllers/redirectsController'
import {HOSTPLANE_API_CONFIG, HOSTPLANE_API_LOGGER, HOSTPLANE_API_STORE} from './tokens'

export type HostplaneApiNestModuleOptions = {
  config: ServiceConfig
  store: ProvisioningStore
  logger: StructuredLogger
}

// FallbackController stays last: its wildcard would shadow every route after it.
@Module({
  controllers: [
    HealthController,
    ContentHostingController,
    CertificatesController,
    RedirectsController,
    FallbackController
  ]
})
export class HostplaneApiNestModule {
  public static register(options: HostplaneApiNestModuleOptions): DynamicModule {
    return {
      module: HostplaneApiNestModule,
      providers: [
        {
          provide: HOSTPLANE_API_CONFIG,
          useValue: options.config
        },
        {
          provide: HOSTPLANE_API_STORE,
          useValue: options.store
        },
        {
          provide: HOSTPLANE_API_LOGGER,
          useValue: options.logger
        },
        HostplaneApiControllerContext
      ]
    }
  }
}
