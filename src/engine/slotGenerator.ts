// src/engine/slotGenerator.ts

import { Slot, Weekday, WORK_DAYS, WORKDAY_END_HOUR, WORKDAY_START_HOUR } from '../models/Slot';

/**
 * Generate every one-hour slot of the work week
 *
 * Pure function - no side effects
 *
 * Order: by day (Monday first), then by hour. With the defaults this is the
 * full 5 x 8 domain the extractor is asked to answer in.
 *
 * @param days Days to cover
 * @param startHour First start hour (inclusive)
 * @param endHour End of the work day (exclusive)
 */
export function generateWorkWeekSlots(
    days: readonly Weekday[] = WORK_DAYS,
    startHour: number = WORKDAY_START_HOUR,
    endHour: number = WORKDAY_END_HOUR
): Slot[] {
    const slots: Slot[] = [];

    for (const day of days) {
        for (let hour = startHour; hour < endHour; hour++) {
            slots.push({ day, hour });
        }
    }

    return slots;
}
