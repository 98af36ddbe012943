// src/models/ParticipantSchedule.ts

import { z } from 'zod';
import { Slot, Weekday, WORKDAY_END_HOUR, WORKDAY_START_HOUR } from './Slot';

/**
 * ParticipantSchedule model - what one participant said about their week
 *
 * Produced once per message by the extractor, consumed once by the matcher.
 * preferredSlots is NOT required to be a subset of availableSlots.
 */
export interface ParticipantSchedule {
    availableSlots: Slot[];
    preferredSlots: Slot[];
}

export const slotSchema = z.object({
    day: z.nativeEnum(Weekday),
    hour: z.number().int().min(WORKDAY_START_HOUR).max(WORKDAY_END_HOUR - 1)
});

/**
 * Wire shape the language model must answer with
 */
export const extractedScheduleSchema = z.object({
    available_slots: z.array(slotSchema),
    preferred_slots: z.array(slotSchema)
});

export type ExtractedSchedule = z.infer<typeof extractedScheduleSchema>;

export function toParticipantSchedule(extracted: ExtractedSchedule): ParticipantSchedule {
    return {
        availableSlots: extracted.available_slots,
        preferredSlots: extracted.preferred_slots
    };
}
