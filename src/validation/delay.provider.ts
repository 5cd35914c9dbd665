import { Provider } from '@nestjs/common';
import { setTimeout as sleep } from 'node:timers/promises';

export const DELAY = Symbol('DELAY');

export type Delay = (ms: number) => Promise<void>;

export const delayProvider: Provider<Delay> = {
  provide: DELAY,
  useValue: async (ms: number) => {
    await sleep(ms);
  },
};
