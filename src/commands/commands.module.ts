import { Module } from '@nestjs/common';
import { StatusModule } from '../status/status.module';
import { ValidationModule } from '../validation/validation.module';
import { CommandRunnerService } from './command-runner.service';

@Module({
  imports: [StatusModule, ValidationModule],
  providers: [CommandRunnerService],
  exports: [CommandRunnerService],
})
export class CommandsModule {}
