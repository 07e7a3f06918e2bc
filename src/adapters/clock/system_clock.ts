import type { ClockPort } from '../../app/ports/clock_port';
import { sleep } from '../../app/usecases/usecase_utils';

export class SystemClock implements ClockPort {
  now(): Date {
    return new Date();
  }

  sleep(ms: number): Promise<void> {
    return sleep(ms);
  }
}
