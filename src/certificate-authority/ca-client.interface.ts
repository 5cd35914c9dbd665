import {
  Domain,
  DomainDetail,
  DomainValidation,
  ValidationToken,
} from '../domains/entities/domain.entity';

export const CA_CLIENT = Symbol('CA_CLIENT');
export const CA_HTTP = Symbol('CA_HTTP');

export interface ListDomainsFilter {
  name?: string;
  limit?: number;
}

/**
 * Certificate authority capability consumed by the validation workflow.
 * Every method rejects with a DcvError subtype; none of them retries.
 */
export interface CaClient {
  listDomains(filter?: ListDomainsFilter): Promise<Domain[]>;
  getDomainDetail(id: number): Promise<DomainDetail>;
  changeValidationMethod(id: number, method: string): Promise<ValidationToken>;
  submitForValidation(id: number): Promise<ValidationToken>;
  checkValidationStatus(id: number): Promise<DomainValidation[]>;
}
