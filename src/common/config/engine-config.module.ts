import { Global, Module } from '@nestjs/common';
import { EngineConfigLoader } from './engine-config.loader';
import { ENGINE_CONFIG } from './engine-config.constants';
import { EngineConfig } from './engine-config.type';

@Global()
@Module({
  providers: [
    EngineConfigLoader,
    {
      provide: ENGINE_CONFIG,
      useFactory: (loader: EngineConfigLoader): Promise<EngineConfig> =>
        loader.load(),
      inject: [EngineConfigLoader],
    },
  ],
  exports: [ENGINE_CONFIG],
})
export class EngineConfigModule {}
