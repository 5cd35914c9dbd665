import { DnsRecord } from '../domains/entities/domain.entity';

export const DNS_CLIENT = Symbol('DNS_CLIENT');
export const DNS_HTTP = Symbol('DNS_HTTP');

export interface DnsZone {
  name: string;
  type?: string;
  status?: string;
}

/** DNS provider capability. One authenticated session is shared by a whole run. */
export interface DnsClient {
  authenticate(username: string, password: string): Promise<void>;
  getZone(name: string): Promise<DnsZone | null>;
  createCname(zone: string, label: string, target: string): Promise<DnsRecord>;
  /** Rejects with RecordNotFoundError when the provider reports the record absent. */
  deleteCname(zone: string, label: string): Promise<void>;
}
