import { Module } from '@nestjs/common';
import { CertificateAuthorityModule } from '../certificate-authority/certificate-authority.module';
import { DomainStatusService } from './domain-status.service';

@Module({
  imports: [CertificateAuthorityModule],
  providers: [DomainStatusService],
  exports: [DomainStatusService],
})
export class StatusModule {}
