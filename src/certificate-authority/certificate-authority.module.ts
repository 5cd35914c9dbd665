import { Module } from '@nestjs/common';
import axios from 'axios';
import { DCV_OPTIONS, DcvOptions } from '../config/dcv.config';
import { CA_CLIENT, CA_HTTP } from './ca-client.interface';
import { DigicertService } from './digicert.service';

@Module({
  providers: [
    {
      provide: CA_HTTP,
      inject: [DCV_OPTIONS],
      useFactory: (options: DcvOptions) =>
        axios.create({
          baseURL: options.caApiBase,
          headers: {
            'X-DC-DEVKEY': options.caApiKey,
            'Content-Type': 'application/json',
          },
          timeout: options.httpTimeoutMs,
        }),
    },
    DigicertService,
    { provide: CA_CLIENT, useExisting: DigicertService },
  ],
  exports: [CA_CLIENT],
})
export class CertificateAuthorityModule {}
