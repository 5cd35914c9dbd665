// src/reporting/result-report.service.ts
import { Injectable, Logger } from '@nestjs/common';
import { format } from 'date-fns';
import {
  Domain,
  SkippedDomain,
  ValidationResult,
} from '../domains/entities/domain.entity';
import { earliestExpiration } from '../domains/expiration.selector';

export interface ValidationReport {
  total: number;
  validated: number;
  notValidated: number;
  cleanedUp: number;
  notCleanedUp: number;
  results: ValidationResult[];
  skipped: SkippedDomain[];
}

@Injectable()
export class ResultReportService {
  private readonly logger = new Logger(ResultReportService.name);

  summarize(
    results: ValidationResult[],
    skipped: SkippedDomain[] = [],
  ): ValidationReport {
    const validated = results.filter((r) => r.valid).length;
    const cleanedUp = results.filter((r) => r.cleanedUp).length;
    return {
      total: results.length,
      validated,
      notValidated: results.length - validated,
      cleanedUp,
      notCleanedUp: results.length - cleanedUp,
      results,
      skipped,
    };
  }

  describe(result: ValidationResult): string {
    const valid = result.valid ? 'validated' : 'NOT VALIDATED';
    const cleanup = result.cleanedUp ? 'been cleaned up' : 'NOT BEEN CLEANED UP';
    return `Domain ${result.domainName} is ${valid} and the CNAME has ${cleanup}: ${result.message}`;
  }

  describeExpiring(domain: Domain): string {
    const expiry = earliestExpiration(domain);
    return expiry
      ? `${domain.name} expires ${format(expiry, 'yyyy-MM-dd')}`
      : `${domain.name} has no expiration, never validated`;
  }

  listCandidates(domains: Domain[]): void {
    if (!domains.length) {
      this.logger.log('No expiring domains found.');
      return;
    }
    this.logger.log(`Domains to validate (${domains.length}):`);
    domains.forEach((d) => this.logger.log(`  ${this.describeExpiring(d)}`));
  }

  report(
    results: ValidationResult[],
    skipped: SkippedDomain[] = [],
  ): ValidationReport {
    const summary = this.summarize(results, skipped);
    this.logger.log(
      `Domain Validation complete: ${summary.validated}/${summary.total} validated, ` +
        `${summary.cleanedUp}/${summary.total} cleaned up.`,
    );
    for (const result of results) {
      const line = this.describe(result);
      if (result.valid && result.cleanedUp) this.logger.log(line);
      else this.logger.warn(line);
    }
    for (const s of skipped) {
      this.logger.log(`Skipped ${s.name}: ${s.reason}.`);
    }
    return summary;
  }
}
