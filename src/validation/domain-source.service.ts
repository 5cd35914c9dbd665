// src/validation/domain-source.service.ts
import { Inject, Injectable, Logger } from '@nestjs/common';
import { readFile } from 'node:fs/promises';
import { CA_CLIENT, CaClient } from '../certificate-authority/ca-client.interface';
import { DNS_CLIENT, DnsClient } from '../dns/dns-client.interface';
import { Domain, SkippedDomain } from '../domains/entities/domain.entity';
import { earliestExpiration, selectExpiring } from '../domains/expiration.selector';
import { ConfigurationError, describeError } from '../common/errors/dcv.errors';

export interface DomainSource {
  names?: string[];
  file?: string;
  horizonDays: number;
}

export interface ResolvedDomains {
  domains: Domain[];
  skipped: SkippedDomain[];
}

function normalizeName(v: string): string {
  return v.trim().toLowerCase().replace(/\.$/, '');
}

export function parseDomainFile(contents: string): string[] {
  return [...new Set(contents.split(/\r?\n/).map(normalizeName).filter(Boolean))];
}

@Injectable()
export class DomainSourceService {
  private readonly logger = new Logger(DomainSourceService.name);

  constructor(
    @Inject(CA_CLIENT) private readonly ca: CaClient,
    @Inject(DNS_CLIENT) private readonly dns: DnsClient,
  ) {}

  /** Explicit list beats file, file beats the expiration query. */
  async resolve(source: DomainSource): Promise<ResolvedDomains> {
    if (source.names?.length) return this.fromNames(source.names);
    if (source.file) return this.fromFile(source.file, source.horizonDays);
    return this.fromExpiration(source.horizonDays);
  }

  /**
   * Manual validation: every name must exist at the CA and have a DNS zone,
   * expiration is not considered. Each domain is returned once. Requires an
   * authenticated DNS session.
   */
  async fromNames(names: string[]): Promise<ResolvedDomains> {
    const domains: Domain[] = [];
    const skipped: SkippedDomain[] = [];

    for (const name of new Set(names.map(normalizeName))) {
      const found = (await this.ca.listDomains({ name })).find(
        (d) => normalizeName(d.name) === name,
      );
      if (found && domains.some((d) => d.id === found.id)) continue;
      if (!found) {
        skipped.push({ name, reason: 'not found in DigiCert' });
        this.logger.warn(`Domain ${name} not found in DigiCert, skipping.`);
        continue;
      }

      const zone = await this.dns.getZone(found.name);
      if (!zone) {
        skipped.push({ name, reason: 'DNS zone not found in UltraDNS' });
        this.logger.warn(`DNS zone ${name} not found in UltraDNS, skipping.`);
        continue;
      }
      domains.push(found);
    }
    return { domains, skipped };
  }

  async fromFile(path: string, horizonDays: number): Promise<ResolvedDomains> {
    let contents: string;
    try {
      contents = await readFile(path, 'utf8');
    } catch (err) {
      throw new ConfigurationError(`Error loading file ${path}: ${describeError(err)}`);
    }

    const wanted = new Set(parseDomainFile(contents));
    const matched = (await this.ca.listDomains()).filter((d) =>
      wanted.delete(normalizeName(d.name)),
    );

    const skipped: SkippedDomain[] = [...wanted].map((name) => {
      this.logger.warn(`Warning: domain ${name} not found! Check spelling.`);
      return { name, reason: 'not found in DigiCert' };
    });

    return { domains: this.expiring(matched, horizonDays), skipped };
  }

  async fromExpiration(horizonDays: number): Promise<ResolvedDomains> {
    const all = await this.ca.listDomains();
    return { domains: this.expiring(all, horizonDays), skipped: [] };
  }

  private expiring(domains: Domain[], horizonDays: number): Domain[] {
    const selected = selectExpiring(domains, horizonDays);
    for (const d of selected) {
      if (earliestExpiration(d) === null) {
        this.logger.log(
          `Info: no expiration on ${d.name}, it has likely never been validated.`,
        );
      }
    }
    return selected;
  }
}
