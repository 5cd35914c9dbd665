import { Module } from '@nestjs/common';
import { CONFIRMER, ConsoleConfirmationService } from './confirmation.service';

@Module({
  providers: [
    ConsoleConfirmationService,
    { provide: CONFIRMER, useExisting: ConsoleConfirmationService },
  ],
  exports: [CONFIRMER],
})
export class ConfirmationModule {}
