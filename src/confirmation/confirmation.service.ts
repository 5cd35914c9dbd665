// src/confirmation/confirmation.service.ts
import { Inject, Injectable } from '@nestjs/common';
import { createInterface } from 'node:readline/promises';
import { stdin, stdout } from 'node:process';
import { DCV_OPTIONS, DcvOptions } from '../config/dcv.config';

export const CONFIRMER = Symbol('CONFIRMER');

export interface Confirmer {
  confirm(question: string): Promise<boolean>;
}

export function isAffirmative(answer: string): boolean {
  return ['y', 'yes'].includes(answer.trim().toLowerCase());
}

/** Asks once on the terminal; anything but y/yes is a no. */
@Injectable()
export class ConsoleConfirmationService implements Confirmer {
  constructor(@Inject(DCV_OPTIONS) private readonly options: DcvOptions) {}

  async confirm(question: string): Promise<boolean> {
    if (this.options.assumeYes) return true;

    const rl = createInterface({ input: stdin, output: stdout });
    try {
      return isAffirmative(await rl.question(`${question} [y/n] `));
    } finally {
      rl.close();
    }
  }
}
