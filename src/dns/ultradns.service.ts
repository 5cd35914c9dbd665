// src/dns/ultradns.service.ts
import { Inject, Injectable, Logger } from '@nestjs/common';
import { AxiosInstance, isAxiosError } from 'axios';
import { DnsRecord } from '../domains/entities/domain.entity';
import {
  ApiError,
  describeError,
  DnsAuthenticationError,
  RecordNotFoundError,
  toApiError,
} from '../common/errors/dcv.errors';
import { DNS_HTTP, DnsClient, DnsZone } from './dns-client.interface';

type TokenResponse = { access_token?: string; expiresIn?: string };

type ZoneResponse = {
  properties?: {
    name?: string;
    type?: string;
    status?: string;
  };
};

export function withTrailingDot(name: string): string {
  return name.endsWith('.') ? name : `${name}.`;
}

@Injectable()
export class UltraDnsService implements DnsClient {
  private readonly logger = new Logger(UltraDnsService.name);
  private accessToken: string | null = null;

  constructor(@Inject(DNS_HTTP) private readonly api: AxiosInstance) {}

  private authHeaders(): Record<string, string> {
    if (!this.accessToken) {
      throw new DnsAuthenticationError('Not logged into UltraDNS.');
    }
    return { Authorization: `Bearer ${this.accessToken}` };
  }

  private rrsetPath(zone: string, label: string): string {
    return `/zones/${withTrailingDot(zone)}/rrsets/CNAME/${label}`;
  }

  async authenticate(username: string, password: string): Promise<void> {
    let token: string | undefined;
    try {
      const res = await this.api.post<TokenResponse>(
        '/authorization/token',
        new URLSearchParams({ grant_type: 'password', username, password }),
        { headers: { 'Content-Type': 'application/x-www-form-urlencoded' } },
      );
      token = res.data.access_token;
    } catch (err) {
      const message = `Logging into UltraDNS failed: ${describeError(err)}`;
      this.logger.error(message);
      throw new DnsAuthenticationError(message);
    }

    if (!token) {
      throw new DnsAuthenticationError(
        'Unknown error logging into UltraDNS, could not get access_token.',
      );
    }
    this.accessToken = token;
  }

  async getZone(name: string): Promise<DnsZone | null> {
    try {
      const res = await this.api.get<ZoneResponse>(`/zones/${name}`, {
        headers: this.authHeaders(),
      });
      const props = res.data.properties ?? {};
      return {
        name: (props.name ?? name).replace(/\.$/, ''),
        type: props.type,
        status: props.status,
      };
    } catch (err) {
      if (isAxiosError(err) && err.response?.status === 404) return null;
      const error = toApiError(err, `Retrieving zone ${name} failed`);
      this.logger.error(error.message);
      throw error;
    }
  }

  async createCname(
    zone: string,
    label: string,
    target: string,
  ): Promise<DnsRecord> {
    const record: DnsRecord = { zone, label, target: withTrailingDot(target) };
    const context = `Creating CNAME record ${label}.${zone} failed`;
    try {
      const res = await this.api.post<{ message?: string }>(
        this.rrsetPath(zone, label),
        { rdata: [record.target] },
        { headers: this.authHeaders() },
      );
      if (res.data.message !== 'Successful') {
        throw new ApiError(
          `${context}: provider answered "${res.data.message ?? 'no message'}".`,
          res.status,
        );
      }
      return record;
    } catch (err) {
      const error = toApiError(err, context);
      this.logger.error(error.message);
      throw error;
    }
  }

  async deleteCname(zone: string, label: string): Promise<void> {
    const context = `Failed to delete CNAME ${label}.${zone}`;
    try {
      const res = await this.api.delete(this.rrsetPath(zone, label), {
        headers: this.authHeaders(),
      });
      if (res.status !== 204) {
        throw new ApiError(`${context}: unexpected status ${res.status}.`, res.status);
      }
    } catch (err) {
      if (isAxiosError(err) && err.response?.status === 404) {
        throw new RecordNotFoundError(`CNAME ${label}.${zone} does not exist.`);
      }
      const error = toApiError(err, context);
      this.logger.error(error.message);
      throw error;
    }
  }
}
