import { Module } from '@nestjs/common';
import { ConfigModule, ConfigService } from '@nestjs/config';
import {
  ScanTrailModule,
  scanTrailConfigFromEnvironment,
  validateEnvironment,
} from './modules';

@Module({
  imports: [
    ConfigModule.forRoot({
      isGlobal: true,
      validate: validateEnvironment,
    }),
    ScanTrailModule.forRootAsync({
      useFactory: (config: ConfigService) =>
        scanTrailConfigFromEnvironment(config),
      inject: [ConfigService],
    }),
  ],
  controllers: [],
  providers: [],
})
export class AppModule {}
