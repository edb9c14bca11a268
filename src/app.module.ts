import { Module } from '@nestjs/common';
import { APP_FILTER } from '@nestjs/core';
import { JwtModule } from '@nestjs/jwt';
import { GameExceptionFilter } from './common/filters/game-exception.filter.js';
import { ConfigModule } from './config/config.module.js';
import { ArsenalConfigService } from './config/arsenal-config.service.js';
import { ContentModule } from './content/content.module.js';
import { EngineModule } from './engine/engine.module.js';
import { ArsenalModule } from './arsenal/arsenal.module.js';
import { BattlesModule } from './battles/battles.module.js';

@Module({
  imports: [
    ConfigModule,
    JwtModule.registerAsync({
      global: true,
      inject: [ArsenalConfigService],
      useFactory: (config: ArsenalConfigService) => ({ secret: config.get().jwtSecret }),
    }),
    ContentModule,
    EngineModule,
    ArsenalModule,
    BattlesModule,
  ],
  providers: [
    {
      provide: APP_FILTER,
      useClass: GameExceptionFilter,
    },
  ],
})
export class AppModule {}
