// src/certificate-authority/digicert.service.ts
import { Inject, Injectable, Logger } from '@nestjs/common';
import { AxiosInstance } from 'axios';
import { isValid, parse } from 'date-fns';
import {
  DcvExpiration,
  DNS_CNAME_TOKEN,
  Domain,
  DomainDetail,
  DomainValidation,
  ValidationToken,
} from '../domains/entities/domain.entity';
import {
  ApiError,
  DataError,
  toApiError,
} from '../common/errors/dcv.errors';
import { CA_HTTP, CaClient, ListDomainsFilter } from './ca-client.interface';

type RawExpiration = { ov?: string | null; ev?: string | null };

type RawValidation = {
  type: string;
  name?: string;
  status?: string;
  dcv_status?: string;
};

type RawDomain = {
  id: number;
  name: string;
  dcv_method?: string;
  dcv_expiration?: RawExpiration | null;
  validations?: RawValidation[];
};

type RawDcvToken = {
  token?: string;
  verification_value?: string;
  status?: string;
  expiration_date?: string;
};

type DcvTokenResponse = { dcv_token?: RawDcvToken };

@Injectable()
export class DigicertService implements CaClient {
  private readonly logger = new Logger(DigicertService.name);

  constructor(@Inject(CA_HTTP) private readonly api: AxiosInstance) {}

  // -------------------- mapping --------------------

  private parseDate(value?: string | null): Date | null {
    if (!value) return null;
    const d = parse(value, 'yyyy-MM-dd', new Date());
    return isValid(d) ? d : null;
  }

  private toExpiration(raw?: RawExpiration | null): DcvExpiration | undefined {
    if (!raw) return undefined;
    const ov = this.parseDate(raw.ov);
    const ev = this.parseDate(raw.ev);
    return ov || ev ? { ov, ev } : undefined;
  }

  private toDomain(raw: RawDomain): Domain {
    const expiration = this.toExpiration(raw.dcv_expiration);
    return {
      id: raw.id,
      name: raw.name,
      dcvMethod: raw.dcv_method ?? '',
      ...(expiration ? { expiration } : {}),
    };
  }

  private toValidation(raw: RawValidation): DomainValidation {
    return {
      type: raw.type,
      status: raw.status ?? '',
      dcvStatus: raw.dcv_status ?? '',
    };
  }

  private toToken(data: DcvTokenResponse, context: string): ValidationToken {
    const token = data.dcv_token?.token;
    const verificationValue = data.dcv_token?.verification_value;
    if (!token || !verificationValue) {
      throw new DataError(`${context}: response carried no dcv_token.`);
    }
    return { token, verificationValue };
  }

  private fail(err: unknown, context: string): Error {
    const error = toApiError(err, context);
    this.logger.error(error.message);
    return error;
  }

  // -------------------- domains --------------------

  async listDomains(filter: ListDomainsFilter = {}): Promise<Domain[]> {
    const params: Record<string, string | number> = {};
    if (filter.name) params['filters[search]'] = filter.name;
    if (filter.limit) params.limit = filter.limit;

    const context = 'Listing DigiCert domains failed';
    try {
      const res = await this.api.get<{ domains?: RawDomain[] }>('/domain', {
        params,
      });
      if (!res.data.domains) {
        throw new DataError(`${context}: response carried no domains.`);
      }
      return res.data.domains.map((d) => this.toDomain(d));
    } catch (err) {
      throw this.fail(err, context);
    }
  }

  async getDomainDetail(id: number): Promise<DomainDetail> {
    const context = `Retrieving domain ${id} failed`;
    try {
      const res = await this.api.get<RawDomain>(`/domain/${id}`, {
        params: { include_dcv: true },
      });
      return {
        ...this.toDomain(res.data),
        validations: (res.data.validations ?? []).map((v) =>
          this.toValidation(v),
        ),
      };
    } catch (err) {
      throw this.fail(err, context);
    }
  }

  // -------------------- DCV --------------------

  async changeValidationMethod(
    id: number,
    method: string = DNS_CNAME_TOKEN,
  ): Promise<ValidationToken> {
    const context = `Changing DCV method of domain ${id} to ${method} failed`;
    try {
      const res = await this.api.put<DcvTokenResponse>(
        `/domain/${id}/dcv/method`,
        { dcv_method: method },
      );
      return this.toToken(res.data, context);
    } catch (err) {
      throw this.fail(err, context);
    }
  }

  async submitForValidation(id: number): Promise<ValidationToken> {
    const context = `Submitting domain ${id} for validation failed`;
    try {
      const res = await this.api.post<DcvTokenResponse>(
        `/domain/${id}/validation`,
        {
          validations: [{ type: 'ov' }, { type: 'ev' }],
          dcv_method: DNS_CNAME_TOKEN,
        },
      );
      if (res.status !== 201) {
        throw new ApiError(
          `${context}: unexpected status ${res.status}.`,
          res.status,
        );
      }
      return this.toToken(res.data, context);
    } catch (err) {
      throw this.fail(err, context);
    }
  }

  async checkValidationStatus(id: number): Promise<DomainValidation[]> {
    const context = `Checking validation of domain ${id} failed`;
    try {
      const res = await this.api.get<{ validations?: RawValidation[] }>(
        `/domain/${id}/validation`,
      );
      const validations = res.data.validations;
      if (!validations?.length) {
        throw new DataError(`${context}: response carried no validations.`);
      }
      return validations.map((v) => this.toValidation(v));
    } catch (err) {
      throw this.fail(err, context);
    }
  }
}
