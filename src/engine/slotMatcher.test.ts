import { describe, it, expect } from 'vitest';
import {
    compareRankedSlots,
    countPreferences,
    findBestTimes,
    intersectAvailability
} from './slotMatcher';
import { generateWorkWeekSlots } from './slotGenerator';
import type { ParticipantSchedule } from '../models/ParticipantSchedule';
import { Slot, Weekday } from '../models/Slot';

const { MONDAY, TUESDAY, WEDNESDAY, THURSDAY, FRIDAY } = Weekday;

function schedule(availableSlots: Slot[], preferredSlots: Slot[] = []): ParticipantSchedule {
    return { availableSlots, preferredSlots };
}

function keysOf(slots: Slot[]): string[] {
    return slots.map(s => `${s.day}@${s.hour}`).sort();
}

describe('findBestTimes', () => {
    it('returns nothing for zero participants', () => {
        expect(findBestTimes([])).toEqual([]);
    });

    it('ranks the single common slot preferred by both participants', () => {
        const a = schedule([{ day: MONDAY, hour: 9 }, { day: MONDAY, hour: 10 }], [{ day: MONDAY, hour: 9 }]);
        const b = schedule([{ day: MONDAY, hour: 9 }], [{ day: MONDAY, hour: 9 }]);

        expect(findBestTimes([a, b])).toEqual([{ day: MONDAY, hour: 9, score: 2 }]);
    });

    it('returns nothing when a third participant shares no slot with the others', () => {
        const a = schedule([{ day: MONDAY, hour: 9 }, { day: TUESDAY, hour: 11 }]);
        const b = schedule([{ day: MONDAY, hour: 9 }, { day: TUESDAY, hour: 11 }, { day: FRIDAY, hour: 15 }]);
        const c = schedule([{ day: FRIDAY, hour: 15 }], [{ day: FRIDAY, hour: 15 }]);

        expect(findBestTimes([a, b, c])).toEqual([]);
    });

    it('scores a lone participant with no preferences at zero', () => {
        expect(findBestTimes([schedule([{ day: TUESDAY, hour: 10 }])])).toEqual([
            { day: TUESDAY, hour: 10, score: 0 }
        ]);
    });

    it('breaks score ties by weekday', () => {
        const both = [{ day: TUESDAY, hour: 10 }, { day: MONDAY, hour: 9 }];
        const a = schedule(both, [{ day: TUESDAY, hour: 10 }]);
        const b = schedule(both, [{ day: MONDAY, hour: 9 }]);

        expect(findBestTimes([a, b])).toEqual([
            { day: MONDAY, hour: 9, score: 1 },
            { day: TUESDAY, hour: 10, score: 1 }
        ]);
    });

    it('orders by score, then weekday, then hour', () => {
        const available = [
            { day: FRIDAY, hour: 9 },
            { day: MONDAY, hour: 14 },
            { day: MONDAY, hour: 10 },
            { day: WEDNESDAY, hour: 9 },
            { day: THURSDAY, hour: 16 }
        ];
        const a = schedule(available, [{ day: FRIDAY, hour: 9 }, { day: THURSDAY, hour: 16 }]);
        const b = schedule(available, [{ day: FRIDAY, hour: 9 }]);

        expect(findBestTimes([a, b])).toEqual([
            { day: FRIDAY, hour: 9, score: 2 },
            { day: THURSDAY, hour: 16, score: 1 },
            { day: MONDAY, hour: 10, score: 0 },
            { day: MONDAY, hour: 14, score: 0 },
            { day: WEDNESDAY, hour: 9, score: 0 }
        ]);
    });

    it('matches a single participant exactly, scoring preferred slots 1', () => {
        const available = [{ day: MONDAY, hour: 9 }, { day: MONDAY, hour: 9 }, { day: THURSDAY, hour: 13 }];
        const result = findBestTimes([schedule(available, [{ day: THURSDAY, hour: 13 }])]);

        expect(result).toEqual([
            { day: THURSDAY, hour: 13, score: 1 },
            { day: MONDAY, hour: 9, score: 0 }
        ]);
    });

    it('returns the same slots whatever the participant order', () => {
        const a = schedule(generateWorkWeekSlots([MONDAY, TUESDAY]));
        const b = schedule(generateWorkWeekSlots([TUESDAY, WEDNESDAY], 9, 12));
        const c = schedule([{ day: TUESDAY, hour: 9 }, { day: TUESDAY, hour: 11 }, { day: WEDNESDAY, hour: 10 }]);

        const expected = ['Tuesday@11', 'Tuesday@9'];
        expect(keysOf(findBestTimes([a, b, c]))).toEqual(expected);
        expect(keysOf(findBestTimes([c, b, a]))).toEqual(expected);
        expect(keysOf(findBestTimes([b, a, c]))).toEqual(expected);
    });

    it('returns nothing when any two participants are disjoint, even if listed last', () => {
        const a = schedule(generateWorkWeekSlots());
        const b = schedule([{ day: MONDAY, hour: 9 }]);
        const c = schedule([{ day: MONDAY, hour: 10 }]);

        expect(findBestTimes([a, b, c])).toEqual([]);
        expect(findBestTimes([b, c, a])).toEqual([]);
    });

    it('returns nothing when a participant has no available slots', () => {
        expect(findBestTimes([schedule([]), schedule([{ day: MONDAY, hour: 9 }])])).toEqual([]);
        expect(findBestTimes([schedule([{ day: MONDAY, hour: 9 }]), schedule([])])).toEqual([]);
    });

    it('counts preferences from participants regardless of their own availability', () => {
        const a = schedule([{ day: MONDAY, hour: 9 }]);
        // Wednesday 12 is preferred but never declared available
        const b = schedule([{ day: MONDAY, hour: 9 }], [{ day: WEDNESDAY, hour: 12 }]);
        const c = schedule([{ day: MONDAY, hour: 9 }, { day: MONDAY, hour: 10 }], [{ day: MONDAY, hour: 9 }]);

        expect(findBestTimes([a, b, c])).toEqual([{ day: MONDAY, hour: 9, score: 1 }]);
    });

    it('counts a participant once even when a preference is repeated', () => {
        const a = schedule([{ day: MONDAY, hour: 9 }], [{ day: MONDAY, hour: 9 }, { day: MONDAY, hour: 9 }]);
        const b = schedule([{ day: MONDAY, hour: 9 }]);

        expect(findBestTimes([a, b])).toEqual([{ day: MONDAY, hour: 9, score: 1 }]);
    });

    it('keeps hours outside the work day as ordinary slots', () => {
        const a = schedule([{ day: MONDAY, hour: 18 }, { day: MONDAY, hour: 9 }], [{ day: MONDAY, hour: 18 }]);
        const b = schedule([{ day: MONDAY, hour: 18 }, { day: MONDAY, hour: 9 }]);

        expect(findBestTimes([a, b])).toEqual([
            { day: MONDAY, hour: 18, score: 1 },
            { day: MONDAY, hour: 9, score: 0 }
        ]);
    });

    it('never scores above the number of participants', () => {
        const week = generateWorkWeekSlots();
        const group = [schedule(week, week), schedule(week, week.slice(0, 5)), schedule(week)];

        const result = findBestTimes(group);

        expect(result).toHaveLength(40);
        for (const slot of result) {
            expect(slot.score).toBeGreaterThanOrEqual(0);
            expect(slot.score).toBeLessThanOrEqual(group.length);
        }
        expect(result.slice(0, 5).map(s => s.score)).toEqual([2, 2, 2, 2, 2]);
        expect(result[5]).toEqual({ day: MONDAY, hour: 14, score: 1 });
    });

    it('does not modify its input', () => {
        const available = [{ day: TUESDAY, hour: 10 }, { day: MONDAY, hour: 9 }];
        const input = [schedule(available, [{ day: TUESDAY, hour: 10 }])];

        findBestTimes(input);

        expect(input[0].availableSlots).toEqual([{ day: TUESDAY, hour: 10 }, { day: MONDAY, hour: 9 }]);
    });
});

describe('intersectAvailability', () => {
    it('is empty for no participants', () => {
        expect(intersectAvailability([]).size).toBe(0);
    });

    it('collapses duplicate slots', () => {
        const common = intersectAvailability([
            schedule([{ day: FRIDAY, hour: 16 }, { day: FRIDAY, hour: 16 }])
        ]);

        expect([...common.keys()]).toEqual(['Friday@16']);
    });
});

describe('countPreferences', () => {
    it('counts each participant at most once per slot', () => {
        const counts = countPreferences([
            schedule([], [{ day: MONDAY, hour: 9 }, { day: MONDAY, hour: 9 }, { day: MONDAY, hour: 10 }]),
            schedule([], [{ day: MONDAY, hour: 9 }])
        ]);

        expect(counts.get('Monday@9')).toBe(2);
        expect(counts.get('Monday@10')).toBe(1);
        expect(counts.has('Tuesday@9')).toBe(false);
    });
});

describe('compareRankedSlots', () => {
    it('puts higher scores first', () => {
        expect(compareRankedSlots(
            { day: FRIDAY, hour: 16, score: 3 },
            { day: MONDAY, hour: 9, score: 1 }
        )).toBeLessThan(0);
    });

    it('puts earlier hours first on the same day and score', () => {
        expect(compareRankedSlots(
            { day: MONDAY, hour: 15, score: 0 },
            { day: MONDAY, hour: 9, score: 0 }
        )).toBeGreaterThan(0);
    });
});
