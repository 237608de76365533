/**
 * Clock Adapter for CLI
 *
 * This is the composition root - it's allowed to read the system clock here.
 */

import { DateTime } from 'luxon';

export interface ClockPort {
  now(): DateTime;
}

export class SystemClockAdapter implements ClockPort {
  now(): DateTime {
    return DateTime.now();
  }
}
