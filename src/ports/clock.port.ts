import { Injectable } from '@nestjs/common';
import moment from 'moment';

export const CLOCK_PORT = 'CLOCK_PORT';

export interface ClockPort {
  // unix seconds
  now(): number;
}

@Injectable()
export class SystemClock implements ClockPort {
  now(): number {
    return moment().unix();
  }
}
