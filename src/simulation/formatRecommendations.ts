// src/simulation/formatRecommendations.ts

import { generateWorkWeekSlots } from '../engine/slotGenerator';
import type { ParticipantSchedule } from '../models/ParticipantSchedule';
import type { RankedSlot } from '../models/RankedSlot';
import { slotKey } from '../models/Slot';

export const NO_OVERLAP_MESSAGE = 'No overlapping times found.';

/**
 * One line per slot, one star per participant preferring it
 * e.g. "- Tuesday at 10:00 ⭐⭐"
 */
export function formatRecommendations(ranked: RankedSlot[]): string[] {
    if (ranked.length === 0) {
        return [NO_OVERLAP_MESSAGE];
    }

    return ranked.map(slot => `- ${slot.day} at ${slot.hour}:00 ${'⭐'.repeat(slot.score)}`.trimEnd());
}

/**
 * How much of the work week a participant is free for
 * e.g. "16/40 work-week slots across Monday, Tuesday"
 */
export function describeCoverage(schedule: ParticipantSchedule): string {
    const workWeek = generateWorkWeekSlots();
    const available = new Set(schedule.availableSlots.map(slotKey));

    const covered = workWeek.filter(slot => available.has(slotKey(slot)));
    const days = [...new Set(covered.map(slot => slot.day))];

    return `${covered.length}/${workWeek.length} work-week slots across ${days.join(', ') || 'no days'}`;
}
