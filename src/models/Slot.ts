// src/models/Slot.ts

/**
 * Working days a meeting can be placed on
 */
export enum Weekday {
    MONDAY = 'Monday',
    TUESDAY = 'Tuesday',
    WEDNESDAY = 'Wednesday',
    THURSDAY = 'Thursday',
    FRIDAY = 'Friday'
}

/**
 * Ordinal of each weekday, used as the second sort key for ranked slots
 */
export const DAY_RANK: Record<Weekday, number> = {
    [Weekday.MONDAY]: 1,
    [Weekday.TUESDAY]: 2,
    [Weekday.WEDNESDAY]: 3,
    [Weekday.THURSDAY]: 4,
    [Weekday.FRIDAY]: 5
};

export const WORK_DAYS: readonly Weekday[] = [
    Weekday.MONDAY,
    Weekday.TUESDAY,
    Weekday.WEDNESDAY,
    Weekday.THURSDAY,
    Weekday.FRIDAY
];

export const WORKDAY_START_HOUR = 9;
export const WORKDAY_END_HOUR = 17;  // Exclusive: 16 is the last valid start

/**
 * Slot model - one-hour meeting window starting at `hour`
 *
 * Data only. Two slots are the same slot iff day and hour match.
 */
export interface Slot {
    day: Weekday;
    hour: number;
}

/**
 * Identity key for set membership (e.g. "Monday@9")
 */
export function slotKey(slot: Slot): string {
    return `${slot.day}@${slot.hour}`;
}
