// src/models/RankedSlot.ts

import type { Weekday } from './Slot';

/**
 * A common slot together with how many participants prefer it
 *
 * Invariant: 0 <= score <= number of participants
 */
export interface RankedSlot {
    day: Weekday;
    hour: number;
    score: number;
}
