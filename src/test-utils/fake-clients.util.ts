import { CaClient } from '../certificate-authority/ca-client.interface';
import { DnsClient } from '../dns/dns-client.interface';
import { DcvCommand, DcvOptions } from '../config/dcv.config';
import { Domain } from '../domains/entities/domain.entity';

export function fakeCaClient(): jest.Mocked<CaClient> {
  return {
    listDomains: jest.fn().mockResolvedValue([]),
    getDomainDetail: jest.fn(),
    changeValidationMethod: jest
      .fn()
      .mockResolvedValue({ token: 'method-token', verificationValue: 'dcv.digicert.com' }),
    submitForValidation: jest
      .fn()
      .mockResolvedValue({ token: 'tok', verificationValue: 'dcv.digicert.com' }),
    checkValidationStatus: jest.fn().mockResolvedValue([
      { type: 'ov', status: 'active', dcvStatus: 'complete' },
      { type: 'ev', status: 'active', dcvStatus: 'complete' },
    ]),
  };
}

export function fakeDnsClient(): jest.Mocked<DnsClient> {
  return {
    authenticate: jest.fn().mockResolvedValue(undefined),
    getZone: jest.fn().mockImplementation(async (name: string) => ({ name })),
    createCname: jest
      .fn()
      .mockImplementation(async (zone: string, label: string, target: string) => ({
        zone,
        label,
        target: `${target}.`,
      })),
    deleteCname: jest.fn().mockResolvedValue(undefined),
  };
}

export function testOptions(overrides: Partial<DcvOptions> = {}): DcvOptions {
  return {
    command: DcvCommand.RUNALL,
    caApiBase: 'https://ca.test',
    caApiKey: 'test-key',
    dnsApiBase: 'https://dns.test',
    dnsUsername: 'test-user',
    dnsPassword: 'test-password',
    horizonDays: 90,
    timeoutSeconds: 180,
    pollIntervalSeconds: 60,
    domainNames: [],
    assumeYes: false,
    httpTimeoutMs: 1000,
    ...overrides,
  };
}

export function makeDomain(
  name: string,
  overrides: Partial<Domain> = {},
): Domain {
  return { id: name.length, name, dcvMethod: 'email', ...overrides };
}
