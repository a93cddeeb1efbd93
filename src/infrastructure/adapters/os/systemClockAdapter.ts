import { ClockPort } from '../../../domain/ports/clock';

export class SystemClockAdapter implements ClockPort {
  now(): number {
    return Date.now();
  }

  sleep(ms: number): Promise<void> {
    return new Promise(resolve => setTimeout(resolve, ms));
  }
}
