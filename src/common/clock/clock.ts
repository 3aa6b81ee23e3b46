import { Injectable } from '@nestjs/common';

export const CLOCK = 'CLOCK';

/** Source of "now" for every timestamp the services write. */
export interface Clock {
  now(): Date;
}

@Injectable()
export class SystemClock implements Clock {
  now(): Date {
    return new Date();
  }
}
