// src/extraction/prompts.ts

export const SCHEDULING_SYSTEM_PROMPT = `You are a scheduling assistant. Standard Work Hours: 09:00 to 17:00 (5 PM).
Days are Monday to Friday. Each slot is one hour, named by its start hour (9 to 16).

RULES FOR GENERATING SLOTS:
1. Ranges: "9 to 11" means hours [9, 10]. Do not include the end hour.
2. Explicit Days: If a user says "Free Tuesday", only list Tuesday slots.
3. Negative Constraints: If a user says "Busy Friday", you MUST list ALL available hours for Monday, Tuesday, Wednesday, and Thursday, plus the free hours on Friday.
4. IMPLIED AVAILABILITY: Unless a user explicitly excludes a day, assume they are available 09:00-17:00.
5. Preferences: put slots the user favours in preferred_slots. Leave it empty when they state none.

Answer with JSON only: {"available_slots": [{"day": "Monday", "hour": 9}], "preferred_slots": []}`;

const slotJsonSchema = {
    type: 'object',
    properties: {
        day: { type: 'string', enum: ['Monday', 'Tuesday', 'Wednesday', 'Thursday', 'Friday'] },
        hour: { type: 'integer', minimum: 9, maximum: 16 }
    },
    required: ['day', 'hour'],
    additionalProperties: false
};

/**
 * JSON schema sent as the response format; mirrors extractedScheduleSchema
 */
export const PARTICIPANT_SCHEDULE_JSON_SCHEMA = {
    type: 'object',
    properties: {
        available_slots: { type: 'array', items: slotJsonSchema },
        preferred_slots: { type: 'array', items: slotJsonSchema }
    },
    required: ['available_slots', 'preferred_slots'],
    additionalProperties: false
};
