import { Global, Module } from '@nestjs/common';
import { ConfigModule, ConfigService } from '@nestjs/config';
import {
  buildDcvOptions,
  DCV_OPTIONS,
  EnvironmentVariables,
  validate,
} from './dcv.config';

@Global()
@Module({
  imports: [ConfigModule.forRoot({ isGlobal: true, validate })],
  providers: [
    {
      provide: DCV_OPTIONS,
      inject: [ConfigService],
      useFactory: (config: ConfigService<EnvironmentVariables, true>) =>
        buildDcvOptions(config),
    },
  ],
  exports: [DCV_OPTIONS],
})
export class DcvConfigModule {}
