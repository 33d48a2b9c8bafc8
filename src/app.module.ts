import * as path from 'path';
import { Module } from '@nestjs/common';
import { ConfigModule, ConfigType } from '@nestjs/config';
import { RelayModule } from './modules';
import { relayConfiguration } from './config';

@Module({
  imports: [
    ConfigModule.forRoot({
      isGlobal: true,
      envFilePath: process.env.CONFIG_PATH ?? path.join('config', '.env'),
      load: [relayConfiguration],
    }),
    RelayModule.forRootAsync({
      inject: [relayConfiguration.KEY],
      useFactory: (config: ConfigType<typeof relayConfiguration>) => config,
    }),
  ],
  controllers: [],
  providers: [],
})
export class AppModule {}
