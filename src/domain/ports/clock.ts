// Port: Clock
// Time source for the grace window and stop wait

export interface ClockPort {
  now(): number;
  sleep(ms: number): Promise<void>;
}
