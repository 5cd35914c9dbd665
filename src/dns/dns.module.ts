import { Module } from '@nestjs/common';
import axios from 'axios';
import { DCV_OPTIONS, DcvOptions } from '../config/dcv.config';
import { DNS_CLIENT, DNS_HTTP } from './dns-client.interface';
import { UltraDnsService } from './ultradns.service';

@Module({
  providers: [
    {
      provide: DNS_HTTP,
      inject: [DCV_OPTIONS],
      useFactory: (options: DcvOptions) =>
        axios.create({
          baseURL: options.dnsApiBase,
          headers: { 'Content-Type': 'application/json' },
          timeout: options.httpTimeoutMs,
        }),
    },
    UltraDnsService,
    { provide: DNS_CLIENT, useExisting: UltraDnsService },
  ],
  exports: [DNS_CLIENT],
})
export class DnsModule {}
