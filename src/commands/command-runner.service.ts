// src/commands/command-runner.service.ts
import { Inject, Injectable, Logger } from '@nestjs/common';
import { format } from 'date-fns';
import { DCV_OPTIONS, DcvCommand, DcvOptions } from '../config/dcv.config';
import { DomainStatusService } from '../status/domain-status.service';
import { ValidationScheduler } from '../validation/validation.scheduler';
import {
  DcvError,
  describeError,
  DomainNotFoundError,
} from '../common/errors/dcv.errors';

export enum ExitCode {
  OK = 0,
  FAILURE = 1,
}

/** Dispatches the configured command; the only place exit codes are decided. */
@Injectable()
export class CommandRunnerService {
  private readonly logger = new Logger(CommandRunnerService.name);

  constructor(
    @Inject(DCV_OPTIONS) private readonly options: DcvOptions,
    private readonly status: DomainStatusService,
    private readonly scheduler: ValidationScheduler,
  ) {}

  async run(): Promise<ExitCode> {
    try {
      return this.options.command === DcvCommand.CHECK
        ? await this.check()
        : await this.validate();
    } catch (err) {
      if (err instanceof DcvError) this.logger.error(describeError(err));
      else this.logger.error(describeError(err), err instanceof Error ? err.stack : undefined);
      return ExitCode.FAILURE;
    }
  }

  private async check(): Promise<ExitCode> {
    const [single, ...rest] = this.options.domainNames;
    if (single && rest.length === 0) {
      try {
        const s = await this.status.checkSingle(single);
        const expires = s.ovExpiration ? format(s.ovExpiration, 'yyyy-MM-dd') : 'none';
        this.logger.log(`Domain ${s.name} DCV status: ${s.dcvStatus}, Expiration: ${expires}`);
        return ExitCode.OK;
      } catch (err) {
        if (!(err instanceof DomainNotFoundError)) throw err;
        this.logger.warn(err.message);
        return ExitCode.FAILURE;
      }
    }

    const expiring = await this.status.checkExpiring(this.options.horizonDays);
    this.logger.log(
      `Domains expiring within ${this.options.horizonDays} days: ${expiring.length || 'None!'}`,
    );
    for (const d of expiring) {
      this.logger.log(
        d.expiresOn
          ? `${d.name.padEnd(30)} Expiration: ${format(d.expiresOn, 'yyyy-MM-dd')}`
          : `${d.name.padEnd(30)} No expiration found, must be a new domain.`,
      );
    }
    return ExitCode.OK;
  }

  private async validate(): Promise<ExitCode> {
    const outcome = await this.scheduler.run({
      names: this.options.domainNames,
      file: this.options.domainsFile,
      horizonDays: this.options.horizonDays,
      timeoutSeconds: this.options.timeoutSeconds,
    });
    if (outcome.status === 'nothing-to-do') {
      this.logger.log('No domains to validate, exiting.');
    }
    return ExitCode.OK;
  }
}
