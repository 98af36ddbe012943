// src/engine/slotMatcher.ts

import { DAY_RANK, Slot, slotKey } from '../models/Slot';
import type { ParticipantSchedule } from '../models/ParticipantSchedule';
import type { RankedSlot } from '../models/RankedSlot';

/**
 * Slot matcher - finds the times every participant can make
 *
 * Pure functions, no state kept between calls. Slots outside the nominal
 * work-week domain are treated as ordinary data.
 */

function toSlotMap(slots: Slot[]): Map<string, Slot> {
    const map = new Map<string, Slot>();
    for (const slot of slots) {
        map.set(slotKey(slot), slot);
    }
    return map;
}

/**
 * Intersect the available slots of all participants, in input order
 *
 * Stops as soon as the running intersection is empty: no later
 * participant can bring a slot back.
 *
 * @returns Common slots keyed by slotKey (empty for no participants)
 */
export function intersectAvailability(schedules: readonly ParticipantSchedule[]): Map<string, Slot> {
    if (schedules.length === 0) {
        return new Map();
    }

    let candidates = toSlotMap(schedules[0].availableSlots);

    for (const schedule of schedules.slice(1)) {
        if (candidates.size === 0) {
            break;
        }

        const available = toSlotMap(schedule.availableSlots);
        const common = new Map<string, Slot>();
        for (const [key, slot] of candidates) {
            if (available.has(key)) {
                common.set(key, slot);
            }
        }
        candidates = common;
    }

    return candidates;
}

/**
 * Count, per slot, how many participants prefer it
 *
 * Each participant's distinct preferred slots are visited once, so a
 * participant adds at most 1 to any slot.
 */
export function countPreferences(schedules: readonly ParticipantSchedule[]): Map<string, number> {
    const counts = new Map<string, number>();

    for (const schedule of schedules) {
        const preferred = new Set(schedule.preferredSlots.map(slotKey));
        for (const key of preferred) {
            counts.set(key, (counts.get(key) ?? 0) + 1);
        }
    }

    return counts;
}

/**
 * Sort order: highest score, then earliest weekday, then earliest hour
 */
export function compareRankedSlots(a: RankedSlot, b: RankedSlot): number {
    return (b.score - a.score) || (DAY_RANK[a.day] - DAY_RANK[b.day]) || (a.hour - b.hour);
}

/**
 * Find the slots common to all participants, ranked by preference
 *
 * @param schedules One schedule per participant
 * @returns Ranked common slots; empty when there are no participants or no overlap
 */
export function findBestTimes(schedules: readonly ParticipantSchedule[]): RankedSlot[] {
    const candidates = intersectAvailability(schedules);
    if (candidates.size === 0) {
        return [];
    }

    const preferenceCounts = countPreferences(schedules);

    const ranked: RankedSlot[] = [];
    for (const [key, slot] of candidates) {
        ranked.push({
            day: slot.day,
            hour: slot.hour,
            score: preferenceCounts.get(key) ?? 0
        });
    }

    return ranked.sort(compareRankedSlots);
}
