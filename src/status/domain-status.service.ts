// src/status/domain-status.service.ts
import { Inject, Injectable } from '@nestjs/common';
import { CA_CLIENT, CaClient } from '../certificate-authority/ca-client.interface';
import { earliestExpiration, selectExpiring } from '../domains/expiration.selector';
import { DataError, DomainNotFoundError } from '../common/errors/dcv.errors';

export interface ExpiringDomain {
  name: string;
  expiresOn: Date | null;
}

export interface DomainStatus {
  name: string;
  dcvStatus: string; // "<ov>/<ev>"
  ovExpiration: Date | null;
}

@Injectable()
export class DomainStatusService {
  constructor(@Inject(CA_CLIENT) private readonly ca: CaClient) {}

  async checkExpiring(horizonDays: number): Promise<ExpiringDomain[]> {
    const domains = selectExpiring(await this.ca.listDomains(), horizonDays);
    return domains.map((d) => ({ name: d.name, expiresOn: earliestExpiration(d) }));
  }

  async checkSingle(name: string): Promise<DomainStatus> {
    const wanted = name.trim().toLowerCase();
    const found = (await this.ca.listDomains({ name: wanted })).find(
      (d) => d.name.toLowerCase() === wanted,
    );
    if (!found) throw new DomainNotFoundError(wanted);

    const detail = await this.ca.getDomainDetail(found.id);
    if (!detail.expiration) {
      throw new DomainNotFoundError(
        wanted,
        `Info/Ignored domain: no expiration date on ${wanted}, it has likely never been validated.`,
      );
    }

    const ov = detail.validations.find((v) => v.type === 'ov');
    const ev = detail.validations.find((v) => v.type === 'ev');
    if (!ov || !ev) {
      throw new DataError(`Failed to retrieve validations from ${wanted}.`);
    }

    return {
      name: detail.name,
      dcvStatus: `${ov.status}/${ev.status}`,
      ovExpiration: detail.expiration.ov,
    };
  }
}
