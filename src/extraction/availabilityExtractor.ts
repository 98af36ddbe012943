// src/extraction/availabilityExtractor.ts

import OpenAI from 'openai';
import type { LlmConfig } from '../config';
import { ExtractionError } from '../errors';
import {
    ParticipantSchedule,
    extractedScheduleSchema,
    toParticipantSchedule
} from '../models/ParticipantSchedule';
import { PARTICIPANT_SCHEDULE_JSON_SCHEMA, SCHEDULING_SYSTEM_PROMPT } from './prompts';

/**
 * Turns one participant's free text into a schedule
 */
export interface ScheduleExtractor {
    extract(text: string): Promise<ParticipantSchedule>;
}

export function createLlmClient(config: LlmConfig): OpenAI {
    return new OpenAI({
        apiKey: config.apiKey,
        baseURL: config.baseURL,
        timeout: config.timeoutMs
    });
}

/**
 * Extractor backed by an OpenAI-compatible chat completions endpoint
 *
 * The answer is constrained by a JSON schema and validated again with zod;
 * the model is trusted for nothing else (preferred slots may fall outside
 * available ones).
 */
export class LlmScheduleExtractor implements ScheduleExtractor {
    private client: OpenAI;
    private model: string;
    private temperature: number;

    constructor(client: OpenAI, config: Pick<LlmConfig, 'model' | 'temperature'>) {
        this.client = client;
        this.model = config.model;
        this.temperature = config.temperature;
    }

    async extract(text: string): Promise<ParticipantSchedule> {
        let content: string | null | undefined;
        try {
            const response = await this.client.chat.completions.create({
                model: this.model,
                messages: [
                    { role: 'system', content: SCHEDULING_SYSTEM_PROMPT },
                    { role: 'user', content: text }
                ],
                temperature: this.temperature,
                response_format: {
                    type: 'json_schema',
                    json_schema: {
                        name: 'participant_schedule',
                        schema: PARTICIPANT_SCHEDULE_JSON_SCHEMA,
                        strict: true
                    }
                }
            });
            content = response.choices[0]?.message?.content;
        } catch (error) {
            const reason = error instanceof Error ? error.message : String(error);
            throw new ExtractionError(`Language model request failed: ${reason}`, { cause: error });
        }

        if (!content) {
            throw new ExtractionError('Language model returned an empty response');
        }

        return parseExtractedSchedule(content);
    }
}

/**
 * Validate the model's raw JSON answer
 *
 * @throws ExtractionError when the content is not JSON or does not match the schema
 */
export function parseExtractedSchedule(content: string): ParticipantSchedule {
    let raw: unknown;
    try {
        raw = JSON.parse(content);
    } catch (error) {
        throw new ExtractionError('Language model response is not valid JSON', { cause: error });
    }

    const parsed = extractedScheduleSchema.safeParse(raw);
    if (!parsed.success) {
        const issue = parsed.error.issues[0];
        throw new ExtractionError(
            `Language model response does not match the schedule schema: ${issue.path.join('.')}: ${issue.message}`,
            { cause: parsed.error }
        );
    }

    return toParticipantSchedule(parsed.data);
}
