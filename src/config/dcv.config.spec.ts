import { ConfigService } from '@nestjs/config';
import {
  buildDcvOptions,
  DcvCommand,
  EnvironmentVariables,
  parseDomainList,
  validate,
} from './dcv.config';
import { ConfigurationError } from '../common/errors/dcv.errors';

describe('dcv config', () => {
  const base = {
    DIGICERT_KEY: 'test-key',
    NEU_USERNAME: 'test-user',
    NEU_PASSWORD: 'test-password',
  };

  it('applies defaults', () => {
    const env = validate(base);

    expect(env).toMatchObject({
      DCV_COMMAND: DcvCommand.RUNALL,
      DCV_NUM_DAYS: 90,
      DCV_TIMEOUT: 180,
      DCV_POLL_INTERVAL: 60,
      DCV_ASSUME_YES: false,
      DIGICERT_API_BASE: 'https://www.digicert.com/services/v2',
      ULTRADNS_API_BASE: 'https://api.ultradns.com',
    });
  });

  it('converts numeric and boolean strings', () => {
    const env = validate({
      ...base,
      DCV_NUM_DAYS: '-5',
      DCV_TIMEOUT: '0',
      DCV_ASSUME_YES: 'true',
    });

    expect(env.DCV_NUM_DAYS).toBe(-5);
    expect(env.DCV_TIMEOUT).toBe(0);
    expect(env.DCV_ASSUME_YES).toBe(true);
  });

  it('rejects a negative timeout', () => {
    expect(() => validate({ ...base, DCV_TIMEOUT: '-1' })).toThrow(
      ConfigurationError,
    );
  });

  it('requires the CA key', () => {
    expect(() => validate({ NEU_USERNAME: 'u', NEU_PASSWORD: 'p' })).toThrow(
      ConfigurationError,
    );
  });

  it('requires DNS credentials except for check', () => {
    expect(() => validate({ DIGICERT_KEY: 'test-key' })).toThrow(
      'NEU_USERNAME and NEU_PASSWORD are required for "runall".',
    );
    expect(
      validate({ DIGICERT_KEY: 'test-key', DCV_COMMAND: 'check' }).DCV_COMMAND,
    ).toBe(DcvCommand.CHECK);
  });

  it('parses the explicit domain list', () => {
    expect(parseDomainList(' A.com, b.com.,,c.com ')).toEqual([
      'a.com',
      'b.com',
      'c.com',
    ]);
    expect(parseDomainList(undefined)).toEqual([]);
  });

  it('keeps one entry per domain in the explicit list', () => {
    expect(parseDomainList('a.com, A.com., b.com,a.com')).toEqual([
      'a.com',
      'b.com',
    ]);
  });

  it('requires named domains for validate', () => {
    expect(() => validate({ ...base, DCV_COMMAND: 'validate' })).toThrow(
      'DCV_DOMAINS is required for "validate".',
    );
    expect(() =>
      validate({ ...base, DCV_COMMAND: 'validate', DCV_DOMAINS: ' , ' }),
    ).toThrow(ConfigurationError);
    expect(
      validate({ ...base, DCV_COMMAND: 'validate', DCV_DOMAINS: 'a.com' })
        .DCV_DOMAINS,
    ).toBe('a.com');
  });

  it('builds run options from the validated environment', () => {
    const env = validate({ ...base, DCV_DOMAINS: 'a.com,b.com', DCV_TIMEOUT: '30' });
    const config = new ConfigService<EnvironmentVariables, true>({ ...env });

    expect(buildDcvOptions(config)).toMatchObject({
      caApiKey: 'test-key',
      dnsUsername: 'test-user',
      timeoutSeconds: 30,
      domainNames: ['a.com', 'b.com'],
      assumeYes: false,
    });
  });
});
