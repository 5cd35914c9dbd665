// src/validation/validation.scheduler.ts
import { Inject, Injectable, Logger } from '@nestjs/common';
import { from, lastValueFrom, mergeMap, toArray } from 'rxjs';
import { Domain, SkippedDomain, ValidationResult } from '../domains/entities/domain.entity';
import { DNS_CLIENT, DnsClient } from '../dns/dns-client.interface';
import { DCV_OPTIONS, DcvOptions } from '../config/dcv.config';
import { CONFIRMER, Confirmer } from '../confirmation/confirmation.service';
import { ResultReportService, ValidationReport } from '../reporting/result-report.service';
import { DomainValidationWorkflow } from './domain-validation.workflow';
import { DomainSource, DomainSourceService } from './domain-source.service';

// DigiCert allows ~100 requests per 5 seconds; a workflow makes 4-6 outside polling.
export const RATE_GATE_THRESHOLD = 40;
export const RATE_GATE_LIMIT = 20;

/** Max in-flight workflows for a run of `count` domains. */
export function rateGateFor(count: number): number {
  return count >= RATE_GATE_THRESHOLD ? RATE_GATE_LIMIT : Infinity;
}

export type RunOutcome =
  | { status: 'completed'; report: ValidationReport }
  | { status: 'nothing-to-do'; skipped: SkippedDomain[] }
  | { status: 'aborted'; candidates: Domain[] };

export interface RunRequest extends DomainSource {
  timeoutSeconds: number;
}

@Injectable()
export class ValidationScheduler {
  private readonly logger = new Logger(ValidationScheduler.name);

  constructor(
    private readonly workflow: DomainValidationWorkflow,
    private readonly sources: DomainSourceService,
    private readonly reporter: ResultReportService,
    @Inject(DNS_CLIENT) private readonly dns: DnsClient,
    @Inject(CONFIRMER) private readonly confirmer: Confirmer,
    @Inject(DCV_OPTIONS) private readonly options: DcvOptions,
  ) {}

  /**
   * Full run: DNS login, candidate selection, operator confirmation, then
   * dispatch. A DnsAuthenticationError rejects before anything is dispatched.
   */
  async run(request: RunRequest): Promise<RunOutcome> {
    this.logger.log('-------- DCV: Beginning new run --------');

    await this.dns.authenticate(this.options.dnsUsername, this.options.dnsPassword);

    const { domains, skipped } = await this.sources.resolve(request);
    this.reporter.listCandidates(domains);
    if (!domains.length) {
      return { status: 'nothing-to-do', skipped };
    }

    const confirmed = await this.confirmer.confirm(
      `The above ${domains.length} domain(s) will be validated, continue?`,
    );
    if (!confirmed) {
      this.logger.log('Aborting validation steps.');
      return { status: 'aborted', candidates: domains };
    }

    const results = await this.runAll(domains, request.timeoutSeconds);
    const report = this.reporter.report(results, skipped);
    this.logger.log('-------- DCV: Run complete --------');
    return { status: 'completed', report };
  }

  /** Results arrive in completion order, not input order. */
  async runAll(
    domains: Domain[],
    timeoutSeconds: number,
  ): Promise<ValidationResult[]> {
    const concurrency = rateGateFor(domains.length);
    if (Number.isFinite(concurrency)) {
      this.logger.log(
        `${domains.length} domains: limiting to ${concurrency} concurrent validations.`,
      );
    }

    return lastValueFrom(
      from(domains).pipe(
        mergeMap((domain) => this.workflow.validate(domain, timeoutSeconds), concurrency),
        toArray(),
      ),
    );
  }
}
