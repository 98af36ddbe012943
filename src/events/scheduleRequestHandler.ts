// src/events/scheduleRequestHandler.ts

import { z } from 'zod';
import { ExtractionError, RequestValidationError } from '../errors';
import type { ScheduleExtractor } from '../extraction/availabilityExtractor';
import { findBestTimes } from '../engine/slotMatcher';
import type { ParticipantSchedule } from '../models/ParticipantSchedule';
import type { RankedSlot } from '../models/RankedSlot';
import type { Logger } from '../utils/logger';

const MISSING_MESSAGES = 'Missing "messages" list in request body';
const MESSAGES_NOT_STRINGS = '"messages" must be a list of strings';

const scheduleRequestSchema = z.object(
    {
        messages: z.array(
            z.string({ invalid_type_error: MESSAGES_NOT_STRINGS }),
            { required_error: MISSING_MESSAGES, invalid_type_error: MESSAGES_NOT_STRINGS }
        )
    },
    { required_error: MISSING_MESSAGES, invalid_type_error: MISSING_MESSAGES }
);

/**
 * Validate a batch request body
 *
 * @returns One message per participant, in request order
 * @throws RequestValidationError before any extraction is attempted
 */
export function parseScheduleRequest(body: unknown): string[] {
    const parsed = scheduleRequestSchema.safeParse(body);
    if (!parsed.success) {
        throw new RequestValidationError(parsed.error.issues[0].message);
    }
    return parsed.data.messages;
}

/**
 * Extract every participant's schedule and rank the common slots
 *
 * Extractions run concurrently; results keep request order so scoring
 * does not depend on completion order. One failed extraction fails the
 * batch and the matcher never runs.
 *
 * State transition: messages → schedules → ranked slots
 */
export async function handleScheduleRequest(
    messages: string[],
    extractor: ScheduleExtractor,
    logger: Logger
): Promise<RankedSlot[]> {
    if (messages.length === 0) {
        return [];
    }

    const schedules = await Promise.all(
        messages.map((message, index) => extractParticipant(message, index + 1, extractor, logger))
    );

    const ranked = findBestTimes(schedules);

    if (ranked.length === 0) {
        logger.info(`No common slot for ${schedules.length} participants`);
    } else {
        logger.info(`Found ${ranked.length} common slots for ${schedules.length} participants`);
    }

    return ranked;
}

async function extractParticipant(
    message: string,
    participant: number,
    extractor: ScheduleExtractor,
    logger: Logger
): Promise<ParticipantSchedule> {
    let schedule: ParticipantSchedule;
    try {
        schedule = await extractor.extract(message);
    } catch (error) {
        const reason = error instanceof Error ? error.message : String(error);
        throw new ExtractionError(`Failed to extract schedule for participant ${participant}: ${reason}`, {
            cause: error
        });
    }

    const days = [...new Set(schedule.availableSlots.map(slot => slot.day))];
    logger.debug(
        `Participant ${participant}: ${schedule.availableSlots.length} available, ` +
        `${schedule.preferredSlots.length} preferred, days: ${days.join(', ') || 'none'}`
    );

    return schedule;
}
