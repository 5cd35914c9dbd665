// src/validation/domain-validation.workflow.ts
import { Inject, Injectable, Logger } from '@nestjs/common';
import {
  DNS_CNAME_TOKEN,
  DnsRecord,
  Domain,
  DomainValidation,
  ValidationResult,
  ValidationToken,
} from '../domains/entities/domain.entity';
import { CA_CLIENT, CaClient } from '../certificate-authority/ca-client.interface';
import { DNS_CLIENT, DnsClient } from '../dns/dns-client.interface';
import { DCV_OPTIONS, DcvOptions } from '../config/dcv.config';
import {
  describeError,
  RecordNotFoundError,
} from '../common/errors/dcv.errors';
import { DELAY, Delay } from './delay.provider';

/** Steps that can fail before a CNAME exists; later steps never abort. */
export type WorkflowState = 'MethodCheck' | 'TokenSubmit' | 'RecordCreate';

type PollOutcome = { valid: boolean; message: string };

export const SUCCESS_MESSAGE = 'Success';

/** Both OV and EV must be active with a completed DCV. */
export function isFullyValidated(
  validations: readonly DomainValidation[],
): boolean {
  const done = (type: string) =>
    validations.some(
      (v) =>
        v.type === type && v.status === 'active' && v.dcvStatus === 'complete',
    );
  return done('ov') && done('ev');
}

export function pollSchedule(
  timeoutSeconds: number,
  pollIntervalSeconds: number,
): { intervalSeconds: number; maxAttempts: number } {
  if (timeoutSeconds <= 0) return { intervalSeconds: 0, maxAttempts: 0 };
  const intervalSeconds = Math.min(pollIntervalSeconds, timeoutSeconds);
  return {
    intervalSeconds,
    maxAttempts: Math.ceil(timeoutSeconds / intervalSeconds),
  };
}

/**
 * Runs one domain through method change, token submission, CNAME creation,
 * status polling and CNAME removal. Never rejects: every outcome, failures
 * included, comes back as a ValidationResult.
 */
@Injectable()
export class DomainValidationWorkflow {
  private readonly logger = new Logger(DomainValidationWorkflow.name);

  constructor(
    @Inject(CA_CLIENT) private readonly ca: CaClient,
    @Inject(DNS_CLIENT) private readonly dns: DnsClient,
    @Inject(DELAY) private readonly delay: Delay,
    @Inject(DCV_OPTIONS) private readonly options: DcvOptions,
  ) {}

  async validate(
    domain: Domain,
    timeoutSeconds: number,
  ): Promise<ValidationResult> {
    const result: ValidationResult = {
      domainName: domain.name,
      valid: false,
      cleanedUp: false,
      message: SUCCESS_MESSAGE,
    };

    let state: WorkflowState = 'MethodCheck';
    let record: DnsRecord;
    try {
      if (domain.dcvMethod !== DNS_CNAME_TOKEN) {
        await this.ca.changeValidationMethod(domain.id, DNS_CNAME_TOKEN);
        this.logger.log(`DCV method of ${domain.name} changed to ${DNS_CNAME_TOKEN}.`);
      }

      state = 'TokenSubmit';
      const token: ValidationToken = await this.ca.submitForValidation(domain.id);
      this.logger.log(`Submitted ${domain.name} for validation.`);

      state = 'RecordCreate';
      record = await this.dns.createCname(
        domain.name,
        token.token,
        token.verificationValue,
      );
      this.logger.log(`CNAME: ${record.label}.${record.zone} created.`);
    } catch (err) {
      return this.fail(result, state, err);
    }

    const outcome = await this.poll(domain, timeoutSeconds);
    result.valid = outcome.valid;
    result.message = outcome.message;

    await this.cleanup(record, result);
    this.logger.debug(`${domain.name}: Done (valid=${result.valid}, cleanedUp=${result.cleanedUp}).`);
    return result;
  }

  private fail(
    result: ValidationResult,
    state: WorkflowState,
    err: unknown,
  ): ValidationResult {
    result.message = describeError(err);
    this.logger.error(`${result.domainName}: ${state} failed, moving to next domain. ${result.message}`);
    return result;
  }

  private async poll(domain: Domain, timeoutSeconds: number): Promise<PollOutcome> {
    const { intervalSeconds, maxAttempts } = pollSchedule(
      timeoutSeconds,
      this.options.pollIntervalSeconds,
    );
    if (maxAttempts === 0) {
      return {
        valid: false,
        message: `Timeout is 0, validation of ${domain.name} was not checked; verify it manually.`,
      };
    }

    for (let attempt = 1; attempt <= maxAttempts; attempt++) {
      await this.delay(intervalSeconds * 1000);
      this.logger.log(`Checking ${domain.name} for validation, attempt #${attempt}.`);
      if (await this.isValidated(domain)) {
        this.logger.log(`Domain ${domain.name} successfully validated!`);
        return { valid: true, message: SUCCESS_MESSAGE };
      }
    }

    this.logger.warn(`Giving up on ${domain.name} after ${maxAttempts} attempt(s).`);
    return {
      valid: false,
      message: `Domain ${domain.name} was not validated within ${timeoutSeconds} seconds.`,
    };
  }

  // a failed status check only means "not yet"; the next attempt may succeed
  private async isValidated(domain: Domain): Promise<boolean> {
    try {
      return isFullyValidated(await this.ca.checkValidationStatus(domain.id));
    } catch (err) {
      this.logger.warn(`Check for validation failed on ${domain.name}: ${describeError(err)}`);
      return false;
    }
  }

  private async cleanup(record: DnsRecord, result: ValidationResult): Promise<void> {
    const fqdn = `${record.label}.${record.zone}`;
    try {
      await this.dns.deleteCname(record.zone, record.label);
      result.cleanedUp = true;
      this.logger.log(`DNS for ${record.zone} cleaned up.`);
    } catch (err) {
      result.message =
        err instanceof RecordNotFoundError
          ? `CNAME ${fqdn} was already gone at cleanup.`
          : describeError(err);
      this.logger.error(`${result.message} ${fqdn} was not cleaned up.`);
    }
  }
}
