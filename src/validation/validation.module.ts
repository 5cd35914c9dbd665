import { Module } from '@nestjs/common';
import { CertificateAuthorityModule } from '../certificate-authority/certificate-authority.module';
import { DnsModule } from '../dns/dns.module';
import { ReportingModule } from '../reporting/reporting.module';
import { ConfirmationModule } from '../confirmation/confirmation.module';
import { DomainValidationWorkflow } from './domain-validation.workflow';
import { DomainSourceService } from './domain-source.service';
import { ValidationScheduler } from './validation.scheduler';
import { delayProvider } from './delay.provider';

@Module({
  imports: [
    CertificateAuthorityModule,
    DnsModule,
    ReportingModule,
    ConfirmationModule,
  ],
  providers: [
    delayProvider,
    DomainValidationWorkflow,
    DomainSourceService,
    ValidationScheduler,
  ],
  exports: [ValidationScheduler],
})
export class ValidationModule {}
