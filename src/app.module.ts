import { Module } from '@nestjs/common';
import { DcvConfigModule } from './config/dcv-config.module';
import { CommandsModule } from './commands/commands.module';

@Module({
  imports: [DcvConfigModule, CommandsModule],
})
export class AppModule {}
