import { Global, Module } from '@nestjs/common';
import { ArsenalConfigService } from './arsenal-config.service.js';

@Global()
@Module({
  providers: [{ provide: ArsenalConfigService, useFactory: () => new ArsenalConfigService() }],
  exports: [ArsenalConfigService],
})
export class ConfigModule {}
