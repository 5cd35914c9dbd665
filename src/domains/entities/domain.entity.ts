export const DNS_CNAME_TOKEN = 'dns-cname-token';

/** Either side may be missing on a domain that was only partially validated. */
export interface DcvExpiration {
  ov: Date | null;
  ev: Date | null;
}

export interface Domain {
  id: number;
  name: string; // FQDN
  dcvMethod: string; // email | dns-cname-token | dns-txt-token | ...
  expiration?: DcvExpiration; // absent: never validated
}

export interface DomainValidation {
  type: string; // ov | ev
  status: string; // active | pending | ...
  dcvStatus: string; // complete | pending | ...
}

export interface DomainDetail extends Domain {
  validations: DomainValidation[];
}

export interface ValidationToken {
  token: string;
  verificationValue: string;
}

export interface DnsRecord {
  zone: string;
  label: string;
  target: string;
}

export interface ValidationResult {
  domainName: string;
  valid: boolean;
  cleanedUp: boolean;
  message: string;
}

export interface SkippedDomain {
  name: string;
  reason: string;
}
