import { Test, TestingModule } from '@nestjs/testing';
import { Logger } from '@nestjs/common';
import {
  DomainValidationWorkflow,
  isFullyValidated,
  pollSchedule,
} from './domain-validation.workflow';
import { DELAY } from './delay.provider';
import { CA_CLIENT, CaClient } from '../certificate-authority/ca-client.interface';
import { DNS_CLIENT, DnsClient } from '../dns/dns-client.interface';
import { DCV_OPTIONS } from '../config/dcv.config';
import {
  fakeCaClient,
  fakeDnsClient,
  makeDomain,
  testOptions,
} from '../test-utils/fake-clients.util';
import {
  ApiError,
  DataError,
  RecordNotFoundError,
} from '../common/errors/dcv.errors';

const PENDING = [
  { type: 'ov', status: 'pending', dcvStatus: 'pending' },
  { type: 'ev', status: 'pending', dcvStatus: 'pending' },
];

describe('isFullyValidated', () => {
  it('requires both OV and EV active and complete', () => {
    expect(
      isFullyValidated([
        { type: 'ov', status: 'active', dcvStatus: 'complete' },
        { type: 'ev', status: 'active', dcvStatus: 'complete' },
      ]),
    ).toBe(true);
    expect(
      isFullyValidated([
        { type: 'ov', status: 'active', dcvStatus: 'complete' },
        { type: 'ev', status: 'active', dcvStatus: 'pending' },
      ]),
    ).toBe(false);
    expect(
      isFullyValidated([{ type: 'ov', status: 'active', dcvStatus: 'complete' }]),
    ).toBe(false);
    expect(isFullyValidated([])).toBe(false);
  });
});

describe('pollSchedule', () => {
  it('splits the timeout into poll intervals', () => {
    expect(pollSchedule(180, 60)).toEqual({ intervalSeconds: 60, maxAttempts: 3 });
    expect(pollSchedule(150, 60)).toEqual({ intervalSeconds: 60, maxAttempts: 3 });
  });

  it('polls once when the timeout is shorter than the interval', () => {
    expect(pollSchedule(30, 60)).toEqual({ intervalSeconds: 30, maxAttempts: 1 });
  });

  it('does not poll at all for a zero timeout', () => {
    expect(pollSchedule(0, 60)).toEqual({ intervalSeconds: 0, maxAttempts: 0 });
  });
});

describe('DomainValidationWorkflow', () => {
  let workflow: DomainValidationWorkflow;
  let ca: jest.Mocked<CaClient>;
  let dns: jest.Mocked<DnsClient>;
  let delay: jest.Mock<Promise<void>, [number]>;

  beforeAll(() => {
    jest.spyOn(Logger.prototype, 'log').mockImplementation(() => undefined);
    jest.spyOn(Logger.prototype, 'warn').mockImplementation(() => undefined);
    jest.spyOn(Logger.prototype, 'error').mockImplementation(() => undefined);
    jest.spyOn(Logger.prototype, 'debug').mockImplementation(() => undefined);
  });

  afterAll(() => {
    jest.restoreAllMocks();
  });

  beforeEach(async () => {
    ca = fakeCaClient();
    dns = fakeDnsClient();
    delay = jest.fn<Promise<void>, [number]>().mockResolvedValue(undefined);

    const module: TestingModule = await Test.createTestingModule({
      providers: [
        DomainValidationWorkflow,
        { provide: CA_CLIENT, useValue: ca },
        { provide: DNS_CLIENT, useValue: dns },
        { provide: DELAY, useValue: delay },
        { provide: DCV_OPTIONS, useValue: testOptions({ pollIntervalSeconds: 60 }) },
      ],
    }).compile();

    workflow = module.get<DomainValidationWorkflow>(DomainValidationWorkflow);
  });

  it('validates and cleans up on a full successful run', async () => {
    const result = await workflow.validate(makeDomain('a.com', { id: 7 }), 180);

    expect(result).toEqual({
      domainName: 'a.com',
      valid: true,
      cleanedUp: true,
      message: 'Success',
    });
    expect(ca.changeValidationMethod).toHaveBeenCalledWith(7, 'dns-cname-token');
    expect(ca.submitForValidation).toHaveBeenCalledWith(7);
    expect(dns.createCname).toHaveBeenCalledWith('a.com', 'tok', 'dcv.digicert.com');
    expect(ca.checkValidationStatus).toHaveBeenCalledTimes(1);
    expect(delay).toHaveBeenCalledWith(60_000);
    expect(dns.deleteCname).toHaveBeenCalledWith('a.com', 'tok');
  });

  it('skips the method change when the domain already uses cname tokens', async () => {
    await workflow.validate(makeDomain('a.com', { dcvMethod: 'dns-cname-token' }), 60);

    expect(ca.changeValidationMethod).not.toHaveBeenCalled();
    expect(ca.submitForValidation).toHaveBeenCalledTimes(1);
  });

  it("stops with the CA's message when the method change fails", async () => {
    ca.changeValidationMethod.mockRejectedValue(
      new ApiError('Changing DCV method of domain 5 to dns-cname-token failed: Invalid DCV method.', 400),
    );

    const result = await workflow.validate(makeDomain('a.com'), 180);

    expect(result).toEqual({
      domainName: 'a.com',
      valid: false,
      cleanedUp: false,
      message:
        'Changing DCV method of domain 5 to dns-cname-token failed: Invalid DCV method.',
    });
    expect(ca.submitForValidation).not.toHaveBeenCalled();
    expect(dns.createCname).not.toHaveBeenCalled();
    expect(dns.deleteCname).not.toHaveBeenCalled();
  });

  it('makes no DNS call when submission fails', async () => {
    ca.submitForValidation.mockRejectedValue(new DataError('no dcv_token'));

    const result = await workflow.validate(makeDomain('a.com'), 180);

    expect(result).toMatchObject({ valid: false, cleanedUp: false, message: 'no dcv_token' });
    expect(dns.createCname).not.toHaveBeenCalled();
    expect(dns.deleteCname).not.toHaveBeenCalled();
  });

  it('names the step that failed in the error log', async () => {
    const errorSpy = jest.spyOn(Logger.prototype, 'error');
    ca.submitForValidation.mockRejectedValue(new DataError('no dcv_token'));

    await workflow.validate(makeDomain('a.com'), 180);

    expect(errorSpy).toHaveBeenLastCalledWith(
      'a.com: TokenSubmit failed, moving to next domain. no dcv_token',
    );
  });

  it('does not clean up when record creation fails', async () => {
    dns.createCname.mockRejectedValue(
      new ApiError('Creating CNAME record tok.a.com failed: Zone does not exist.', 404),
    );

    const result = await workflow.validate(makeDomain('a.com'), 180);

    expect(result).toEqual({
      domainName: 'a.com',
      valid: false,
      cleanedUp: false,
      message: 'Creating CNAME record tok.a.com failed: Zone does not exist.',
    });
    expect(ca.checkValidationStatus).not.toHaveBeenCalled();
    expect(dns.deleteCname).not.toHaveBeenCalled();
  });

  it('gives up after the polling budget and still cleans up once', async () => {
    ca.checkValidationStatus.mockResolvedValue(PENDING);

    const result = await workflow.validate(makeDomain('a.com'), 180);

    expect(result).toEqual({
      domainName: 'a.com',
      valid: false,
      cleanedUp: true,
      message: 'Domain a.com was not validated within 180 seconds.',
    });
    expect(ca.checkValidationStatus).toHaveBeenCalledTimes(3);
    expect(delay).toHaveBeenCalledTimes(3);
    expect(dns.deleteCname).toHaveBeenCalledTimes(1);
  });

  it('keeps polling through failed status checks', async () => {
    ca.checkValidationStatus
      .mockRejectedValueOnce(new ApiError('Checking validation of domain 5 failed: timeout'))
      .mockRejectedValueOnce(new DataError('no validations'))
      .mockResolvedValueOnce([
        { type: 'ov', status: 'active', dcvStatus: 'complete' },
        { type: 'ev', status: 'active', dcvStatus: 'complete' },
      ]);

    const result = await workflow.validate(makeDomain('a.com'), 180);

    expect(result.valid).toBe(true);
    expect(ca.checkValidationStatus).toHaveBeenCalledTimes(3);
  });

  it('skips polling on a zero timeout but still cleans up', async () => {
    const result = await workflow.validate(makeDomain('a.com'), 0);

    expect(result).toEqual({
      domainName: 'a.com',
      valid: false,
      cleanedUp: true,
      message: 'Timeout is 0, validation of a.com was not checked; verify it manually.',
    });
    expect(delay).not.toHaveBeenCalled();
    expect(ca.checkValidationStatus).not.toHaveBeenCalled();
    expect(dns.deleteCname).toHaveBeenCalledTimes(1);
  });

  it('records a failed delete without touching validity', async () => {
    dns.deleteCname.mockRejectedValue(
      new ApiError('Failed to delete CNAME tok.a.com: Internal error.', 500),
    );

    const result = await workflow.validate(makeDomain('a.com'), 60);

    expect(result).toEqual({
      domainName: 'a.com',
      valid: true,
      cleanedUp: false,
      message: 'Failed to delete CNAME tok.a.com: Internal error.',
    });
    expect(dns.deleteCname).toHaveBeenCalledTimes(1);
  });

  it('reports a record already gone at cleanup', async () => {
    dns.deleteCname.mockRejectedValue(new RecordNotFoundError('gone'));

    const result = await workflow.validate(makeDomain('a.com'), 60);

    expect(result).toMatchObject({
      valid: true,
      cleanedUp: false,
      message: 'CNAME tok.a.com was already gone at cleanup.',
    });
  });
});
